import type { RuntimeResource } from '../lifecycle';
import type { TokenizedText } from '../envelopes/ingestion';
import type { PointPayload } from '../envelopes/search';

// Narrow seams around the work this system delegates: page extraction,
// embedding inference, text generation, graph and vector persistence.

export interface PageExtractor extends RuntimeResource {
  /** Fetches `url` and returns its readable text, or '' when nothing was found. */
  extract(url: string): Promise<string>;
}

export interface EmbeddingModel extends RuntimeResource {
  readonly modelName: string;
  readonly dimension: number;
  /** One vector per input sentence, in input order. */
  embed(sentences: string[]): Promise<number[][]>;
}

export interface TextGenerator extends RuntimeResource {
  generate(prompt: string | null, maxLength: number): Promise<string>;
}

export interface GraphStore extends RuntimeResource {
  saveDocument(document: TokenizedText): Promise<void>;
}

export interface VectorPoint {
  id: string;
  vector: number[];
  payload: PointPayload;
}

export interface ScoredPoint {
  id: string;
  score: number;
  payload: PointPayload;
}

export interface VectorStore extends RuntimeResource {
  /** Creates the backing collection when missing. Safe to call repeatedly. */
  ensureCollection(dimension: number): Promise<void>;
  upsert(points: VectorPoint[]): Promise<void>;
  search(vector: number[], limit: number): Promise<ScoredPoint[]>;
}

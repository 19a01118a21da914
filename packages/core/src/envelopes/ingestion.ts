import { z } from 'zod';

export const UrlTaskSchema = z.object({
  url: z.string(),
});

export const RawTextSchema = z.object({
  id: z.string().min(1),
  source_url: z.string(),
  raw_text: z.string(),
  timestamp_ms: z.number().int().nonnegative(),
});

export const TokenizedTextSchema = z.object({
  original_id: z.string().min(1),
  source_url: z.string(),
  tokens: z.array(z.string()),
  sentences: z.array(z.string()),
  timestamp_ms: z.number().int().nonnegative(),
});

export const SentenceEmbeddingSchema = z.object({
  sentence_text: z.string(),
  embedding: z.array(z.number()),
});

export const TextWithEmbeddingsSchema = z.object({
  original_id: z.string().min(1),
  source_url: z.string(),
  embeddings_data: z.array(SentenceEmbeddingSchema),
  model_name: z.string(),
  timestamp_ms: z.number().int().nonnegative(),
});

export type UrlTask = z.infer<typeof UrlTaskSchema>;
export type RawText = z.infer<typeof RawTextSchema>;
export type TokenizedText = z.infer<typeof TokenizedTextSchema>;
export type SentenceEmbedding = z.infer<typeof SentenceEmbeddingSchema>;
export type TextWithEmbeddings = z.infer<typeof TextWithEmbeddingsSchema>;

import { z } from 'zod';

export const QueryForEmbeddingTaskSchema = z.object({
  request_id: z.string(),
  text_to_embed: z.string(),
});

export const QueryEmbeddingResultSchema = z.object({
  request_id: z.string(),
  embedding: z.array(z.number()).nullish(),
  model_name: z.string().nullish(),
  error_message: z.string().nullish(),
});

/** Provenance denormalized onto every stored vector point. */
export const PointPayloadSchema = z.object({
  original_document_id: z.string(),
  source_url: z.string(),
  sentence_text: z.string(),
  sentence_order: z.number().int().nonnegative(),
  model_name: z.string(),
  processed_at_ms: z.number().int().nonnegative(),
});

export const ResultItemSchema = z.object({
  qdrant_point_id: z.string(),
  score: z.number(),
  payload: PointPayloadSchema,
});

export const SearchTaskSchema = z.object({
  request_id: z.string(),
  query_embedding: z.array(z.number()),
  top_k: z.number().int().positive(),
});

export const SearchResultSchema = z.object({
  request_id: z.string(),
  results: z.array(ResultItemSchema),
  error_message: z.string().nullish(),
});

export const ApiSearchRequestSchema = z.object({
  query_text: z.string(),
  top_k: z.number().int().positive(),
});

export const ApiSearchResponseSchema = z.object({
  search_request_id: z.string(),
  results: z.array(ResultItemSchema),
  error_message: z.string().nullish(),
});

export type QueryForEmbeddingTask = z.infer<typeof QueryForEmbeddingTaskSchema>;
export type QueryEmbeddingResult = z.infer<typeof QueryEmbeddingResultSchema>;
export type PointPayload = z.infer<typeof PointPayloadSchema>;
export type ResultItem = z.infer<typeof ResultItemSchema>;
export type SearchTask = z.infer<typeof SearchTaskSchema>;
export type SearchResult = z.infer<typeof SearchResultSchema>;
export type ApiSearchRequest = z.infer<typeof ApiSearchRequestSchema>;
export type ApiSearchResponse = z.infer<typeof ApiSearchResponseSchema>;

/** Reply envelopes that can report a failure of the replying service. */
export interface RemoteReply {
  error_message?: string | null | undefined;
}

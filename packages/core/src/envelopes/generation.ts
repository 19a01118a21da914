import { z } from 'zod';

export const GENERATION_MAX_LENGTH = { MIN: 1, MAX: 1000 } as const;

/**
 * Consumers drop a task whose `max_length` falls outside [1, 1000]. Ingress
 * checks the same range first so callers get a specific validation message.
 */
export const GenerateTextTaskSchema = z.object({
  task_id: z.string(),
  prompt: z.string().nullish(),
  max_length: z.number().int().min(GENERATION_MAX_LENGTH.MIN).max(GENERATION_MAX_LENGTH.MAX),
});

export const GeneratedTextSchema = z.object({
  original_task_id: z.string(),
  generated_text: z.string(),
  timestamp_ms: z.number().int().nonnegative(),
});

export type GenerateTextTask = z.infer<typeof GenerateTextTaskSchema>;
export type GeneratedText = z.infer<typeof GeneratedTextSchema>;

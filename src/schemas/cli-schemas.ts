import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();

// Search command options schema
export const SEARCH_OPTIONS_SCHEMA = z.object({
  topK: positiveInt.optional(),
  results: positiveInt.optional(),
  output: z.enum(['line', 'json']).default('line'),
});

// Batch command options schema
export const BATCH_OPTIONS_SCHEMA = z.object({
  topK: positiveInt.optional(),
  concurrency: positiveInt.optional(),
  output: z.enum(['line', 'json']).default('line'),
});

// Inferred types
export type SearchOptions = z.infer<typeof SEARCH_OPTIONS_SCHEMA>;
export type BatchOptions = z.infer<typeof BATCH_OPTIONS_SCHEMA>;
export type OutputFormat = SearchOptions['output'];

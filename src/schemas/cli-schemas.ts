import { z } from 'zod';

// Options of the `translate` command
export const TRANSLATE_OPTIONS_SCHEMA = z.object({
  to: z.string().min(1),
  fragments: z.enum(['none', 'lines', 'paragraphs']).default('none'),
  output: z.enum(['line', 'json']).default('line'),
  verbose: z.boolean().default(false),
  maxChunkChars: z.coerce.number().int().positive().optional(),
  concurrency: z.coerce.number().int().min(1).max(8).optional(),
});

// Inferred types
export type TranslateOptions = z.infer<typeof TRANSLATE_OPTIONS_SCHEMA>;

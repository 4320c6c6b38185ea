import { z } from 'zod';

export const HUGGINGFACE_TRANSLATION_SCHEMA = z
  .object({
    translation_text: z.string().optional(),
    generated_text: z.string().optional(),
  })
  .refine((item) => item.translation_text !== undefined || item.generated_text !== undefined, {
    message: 'Expected translation_text or generated_text',
  });

// The inference API answers with a one-element array for text2text models
export const HUGGINGFACE_RESPONSE_SCHEMA = z.union([
  z.array(HUGGINGFACE_TRANSLATION_SCHEMA).min(1),
  HUGGINGFACE_TRANSLATION_SCHEMA,
]);

export const HUGGINGFACE_ERROR_SCHEMA = z.object({
  error: z.union([z.string(), z.array(z.string())]).optional(),
  estimated_time: z.number().optional(),
});

export type HuggingFaceTranslation = z.infer<typeof HUGGINGFACE_TRANSLATION_SCHEMA>;

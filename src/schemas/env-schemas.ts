import { z } from 'zod';
import { ProviderType } from '../providers/provider-factory';
import { GeminiDefaultConfig } from '../providers/gemini-provider';
import { HuggingFaceDefaultConfig } from '../providers/huggingface-provider';
import { DEFAULT_MAX_CHUNK_CHARS } from '../chunking/types';

// Blank values count as absent so an empty `.env` entry does not enable a provider
const OPTIONAL_TEXT = z.preprocess(
  (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);
const OPTIONAL_SECRET = OPTIONAL_TEXT;

const PROVIDER_LIST_SCHEMA = z
  .string()
  .default(`${ProviderType.Gemini},${ProviderType.HuggingFace}`)
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim().toLowerCase())
      .filter(Boolean)
  )
  .pipe(z.array(z.nativeEnum(ProviderType)).min(1));

export const ENV_SCHEMA = z.object({
  GEMINI_API_KEY: OPTIONAL_SECRET,
  GEMINI_MODEL: z.string().min(1).default(GeminiDefaultConfig.model),
  GEMINI_TEMPERATURE: z.coerce.number().min(0).max(1).optional(),
  GEMINI_DIRECTIVE: OPTIONAL_TEXT,
  HUGGINGFACE_API_TOKEN: OPTIONAL_SECRET,
  HUGGINGFACE_MODEL_PREFIX: z.string().min(1).default(HuggingFaceDefaultConfig.modelPrefix),
  TRANSLATION_PROVIDERS: PROVIDER_LIST_SCHEMA,
  MAX_CHUNK_CHARS: z.coerce.number().int().positive().default(DEFAULT_MAX_CHUNK_CHARS),
  TRANSLATION_CONCURRENCY: z.coerce.number().int().min(1).max(8).default(4),
  REQUEST_TIMEOUT: z.coerce.number().positive().default(30),
  MAX_CONTENT_LENGTH: z.coerce.number().int().positive().default(1_000_000),
});

// Inferred types
export type EnvConfig = z.infer<typeof ENV_SCHEMA>;

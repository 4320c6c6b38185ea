import type { EnvConfig } from '../schemas/env-schemas';
import { ProviderType } from '../providers/provider-factory';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from '../dispatch/retry-policy';

export type ProviderSettings =
  | { type: ProviderType.Gemini; apiKey: string; model: string; temperature?: number; directive?: string }
  | { type: ProviderType.HuggingFace; apiToken: string; modelPrefix: string };

/*
 * Everything a translation job needs to know about its environment, passed
 * in explicitly at call time. Providers appear in priority order and only
 * when a credential for them exists.
 */
export interface ProviderConfiguration {
  providers: ProviderSettings[];
  maxChunkChars: number;
  concurrency: number;
  maxContentLength: number;
  retry: RetryPolicy;
}

export function buildProviderConfiguration(env: EnvConfig): ProviderConfiguration {
  const providers: ProviderSettings[] = [];

  for (const type of new Set(env.TRANSLATION_PROVIDERS)) {
    switch (type) {
      case ProviderType.Gemini:
        if (env.GEMINI_API_KEY) {
          providers.push({
            type,
            apiKey: env.GEMINI_API_KEY,
            model: env.GEMINI_MODEL,
            ...(env.GEMINI_TEMPERATURE !== undefined && { temperature: env.GEMINI_TEMPERATURE }),
            ...(env.GEMINI_DIRECTIVE !== undefined && { directive: env.GEMINI_DIRECTIVE }),
          });
        }
        break;
      case ProviderType.HuggingFace:
        if (env.HUGGINGFACE_API_TOKEN) {
          providers.push({
            type,
            apiToken: env.HUGGINGFACE_API_TOKEN,
            modelPrefix: env.HUGGINGFACE_MODEL_PREFIX,
          });
        }
        break;
    }
  }

  return {
    providers,
    maxChunkChars: env.MAX_CHUNK_CHARS,
    concurrency: env.TRANSLATION_CONCURRENCY,
    maxContentLength: env.MAX_CONTENT_LENGTH,
    retry: { ...DEFAULT_RETRY_POLICY, timeoutMs: env.REQUEST_TIMEOUT * 1000 },
  };
}

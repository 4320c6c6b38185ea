import fetch from 'node-fetch';
import type { TranslationProvider } from './translation-provider';
import type { LanguageInfo } from '../config/languages';
import { type Chunk, type ProviderOutcome, fatal, retryable, success } from '../types/translation';
import {
  HUGGINGFACE_ERROR_SCHEMA,
  HUGGINGFACE_RESPONSE_SCHEMA,
  type HuggingFaceTranslation,
} from '../schemas/huggingface-responses';
import { handleUnknownError } from '../errors/index';
import { debug } from '../output/logger';

export interface HuggingFaceConfig {
  apiToken: string;
  modelPrefix?: string;
  baseUrl?: string;
}

export const HuggingFaceDefaultConfig = {
  modelPrefix: 'Helsinki-NLP/opus-mt-en-',
  baseUrl: 'https://api-inference.huggingface.co/models/',
};

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

function errorMessage(body: string): { message: string; loading: boolean } {
  const parsed = HUGGINGFACE_ERROR_SCHEMA.safeParse(parseJson(body));
  if (!parsed.success) {
    return { message: body.slice(0, 200), loading: false };
  }
  const raw = parsed.data.error;
  const message = Array.isArray(raw) ? raw.join('; ') : raw ?? body.slice(0, 200);
  const loading = parsed.data.estimated_time !== undefined || /loading/i.test(message);
  return { message, loading };
}

function pickText(item: HuggingFaceTranslation): string {
  return (item.translation_text ?? item.generated_text ?? '').trim();
}

/*
 * Fallback provider backed by the Hugging Face inference API and the
 * per-language opus-mt models. A cold model answers 503 while it loads,
 * which can take up to a minute; that is reported as ModelLoading. Languages
 * without a published model are refused without a request.
 */
export class HuggingFaceProvider implements TranslationProvider {
  readonly name = 'huggingface';
  private config: Required<HuggingFaceConfig>;

  constructor(config: HuggingFaceConfig) {
    this.config = {
      apiToken: config.apiToken,
      modelPrefix: config.modelPrefix ?? HuggingFaceDefaultConfig.modelPrefix,
      baseUrl: config.baseUrl ?? HuggingFaceDefaultConfig.baseUrl,
    };
  }

  modelFor(targetLanguage: LanguageInfo): string | undefined {
    if (targetLanguage.opusMtTarget === undefined) return undefined;
    return `${this.config.modelPrefix}${targetLanguage.opusMtTarget}`;
  }

  async translate(chunk: Chunk, targetLanguage: LanguageInfo, signal?: AbortSignal): Promise<ProviderOutcome> {
    const model = this.modelFor(targetLanguage);
    if (model === undefined) {
      return fatal('Other', `No Hugging Face translation model for ${targetLanguage.displayName}`);
    }
    debug('Sending request to Hugging Face:', { model, chunk: chunk.id, chars: chunk.text.length });

    let status: number;
    let body: string;
    try {
      const response = await fetch(`${this.config.baseUrl}${model}`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.apiToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ inputs: chunk.text }),
        ...(signal !== undefined && { signal }),
      });
      status = response.status;
      body = await response.text();
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Hugging Face API call');
      return retryable('NetworkError', `Hugging Face API call failed: ${err.message}`);
    }

    if (status >= 200 && status < 300) {
      const parsed = HUGGINGFACE_RESPONSE_SCHEMA.safeParse(parseJson(body));
      if (!parsed.success) {
        return retryable('Other', `Invalid Hugging Face response structure: ${parsed.error.message}`);
      }
      const first = Array.isArray(parsed.data) ? parsed.data[0] : parsed.data;
      const text = first ? pickText(first) : '';
      return text ? success(text) : retryable('Other', 'Empty response from Hugging Face API (no text).');
    }

    const { message, loading } = errorMessage(body);
    if (status === 503 && loading) {
      return retryable('ModelLoading', `Model ${model} is loading: ${message}`);
    }
    if (status === 401 || status === 403) {
      return fatal('Unauthenticated', `Hugging Face rejected the API token: ${message}`);
    }
    if (status === 429) {
      return retryable('RateLimited', `Hugging Face rate limit exceeded: ${message}`);
    }
    if (status >= 500) {
      return retryable('NetworkError', `Hugging Face API error (${status}): ${message}`);
    }
    return fatal('Other', `Hugging Face API error (${status}): ${message}`);
  }
}

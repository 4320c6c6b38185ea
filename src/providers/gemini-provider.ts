import {
    GoogleGenerativeAI,
    GoogleGenerativeAIFetchError,
    GoogleGenerativeAIResponseError,
    type GenerativeModel,
} from '@google/generative-ai';
import type { TranslationProvider } from './translation-provider';
import { DefaultRequestBuilder, type RequestBuilder } from './request-builder';
import type { LanguageInfo } from '../config/languages';
import { type Chunk, type ProviderOutcome, fatal, retryable, success } from '../types/translation';
import { handleUnknownError } from '../errors/index';
import { debug } from '../output/logger';

export interface GeminiConfig {
    apiKey: string;
    model?: string;
    temperature?: number;
}

export const GeminiDefaultConfig = {
    model: 'gemini-1.5-flash',
    temperature: 0.2,
};

const INVALID_KEY_PATTERN = /api[ _]?key/i;

/*
 * Maps an SDK failure onto the dispatcher's outcome vocabulary.
 * Bad credentials surface either as 401/403 or as a 400 mentioning the key.
 */
export function classifyGeminiError(e: unknown): ProviderOutcome {
    if (e instanceof GoogleGenerativeAIFetchError) {
        const status = e.status ?? 0;
        if (status === 401 || status === 403 || (status === 400 && INVALID_KEY_PATTERN.test(e.message))) {
            return fatal('Unauthenticated', `Gemini rejected the API key: ${e.message}`);
        }
        if (status === 429) {
            return retryable('RateLimited', `Gemini rate limit exceeded: ${e.message}`);
        }
        if (status >= 500) {
            return retryable('NetworkError', `Gemini API error (${status}): ${e.message}`);
        }
        if (status >= 400) {
            return fatal('Other', `Gemini API error (${status}): ${e.message}`);
        }
        return retryable('NetworkError', `Gemini request failed: ${e.message}`);
    }
    if (e instanceof GoogleGenerativeAIResponseError) {
        return retryable('Other', `Gemini returned an unusable response: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Gemini API call');
    return retryable('NetworkError', `Gemini API call failed: ${err.message}`);
}

export class GeminiProvider implements TranslationProvider {
    readonly name = 'gemini';
    private client: GoogleGenerativeAI;
    private model: GenerativeModel;
    private config: Required<GeminiConfig>;
    private builder: RequestBuilder;

    constructor(config: GeminiConfig, builder?: RequestBuilder) {
        this.client = new GoogleGenerativeAI(config.apiKey);
        this.config = {
            apiKey: config.apiKey,
            model: config.model ?? GeminiDefaultConfig.model,
            temperature: config.temperature ?? GeminiDefaultConfig.temperature,
        };
        this.model = this.client.getGenerativeModel({
            model: this.config.model,
            generationConfig: { temperature: this.config.temperature },
        });
        this.builder = builder ?? new DefaultRequestBuilder();
    }

    async translate(chunk: Chunk, targetLanguage: LanguageInfo, signal?: AbortSignal): Promise<ProviderOutcome> {
        const prompt = this.builder.buildTranslationPrompt(chunk.text, targetLanguage);

        debug('Sending request to Gemini:', {
            model: this.config.model,
            chunk: chunk.id,
            chars: chunk.text.length,
        });

        try {
            const result = await this.model.generateContent(prompt, signal ? { signal } : {});
            const text = result.response.text().trim();
            if (!text) {
                return retryable('Other', 'Empty response from Gemini API (no text).');
            }
            return success(text);
        } catch (e: unknown) {
            return classifyGeminiError(e);
        }
    }
}

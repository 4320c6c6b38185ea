import type { Chunk, ProviderOutcome } from '../types/translation';
import type { LanguageInfo } from '../config/languages';

/*
 * A translation capability. Implementations never throw for provider-side
 * failures; they report them as Retryable or Fatal outcomes so the
 * dispatcher can decide what to do next.
 */
export interface TranslationProvider {
  readonly name: string;
  translate(chunk: Chunk, targetLanguage: LanguageInfo, signal?: AbortSignal): Promise<ProviderOutcome>;
}

import type { TranslationProvider } from './translation-provider';
import { GeminiProvider, type GeminiConfig } from './gemini-provider';
import { HuggingFaceProvider } from './huggingface-provider';
import { DefaultRequestBuilder } from './request-builder';
import type { ProviderSettings } from '../config/config';

export enum ProviderType {
  Gemini = 'gemini',
  HuggingFace = 'huggingface',
}

/**
 * Creates the translation provider described by one settings entry
 * @param settings - Credentials and model options for a single provider
 */
export function createProvider(settings: ProviderSettings): TranslationProvider {
  switch (settings.type) {
    case ProviderType.Gemini: {
      const geminiConfig: GeminiConfig = {
        apiKey: settings.apiKey,
        model: settings.model,
        ...(settings.temperature !== undefined && { temperature: settings.temperature }),
      };
      return new GeminiProvider(geminiConfig, new DefaultRequestBuilder(settings.directive));
    }

    case ProviderType.HuggingFace:
      return new HuggingFaceProvider({
        apiToken: settings.apiToken,
        modelPrefix: settings.modelPrefix,
      });
  }
}

/**
 * Creates providers in priority order, primary first.
 */
export function createProviders(settings: readonly ProviderSettings[]): TranslationProvider[] {
  return settings.map((entry) => createProvider(entry));
}

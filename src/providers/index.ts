export type { TranslationProvider } from './translation-provider';
export { GeminiProvider, type GeminiConfig } from './gemini-provider';
export { HuggingFaceProvider, type HuggingFaceConfig } from './huggingface-provider';
export { createProvider, createProviders, ProviderType } from './provider-factory';
export { type RequestBuilder, DefaultRequestBuilder } from './request-builder';

export type {
  Chunk,
  FragmentRange,
  ProviderFailureKind,
  ProviderOutcome,
  RewriteInstruction,
  TextFragment,
  TranslationAttempt,
  TranslationResult,
} from './types/translation';
export { split, SentenceChunker, assignFragmentRanges } from './chunking/splitter';
export { recombine } from './chunking/merger';
export { align } from './alignment/word-aligner';
export { captureFragment, captureFragments, fragmentTexts, type FragmentMode } from './alignment/fragments';
export { RetryingDispatcher, type DispatchResult, type DispatcherOptions } from './dispatch/retrying-dispatcher';
export { DEFAULT_RETRY_POLICY, nextStep, type RetryPolicy } from './dispatch/retry-policy';
export { TranslationOrchestrator, type OrchestratorOptions, type PageTranslation } from './pipeline/orchestrator';
export { handleTranslateRequest, type TranslateRequestDeps } from './pipeline/translate-request';
export type { TranslateResponse, TranslateSuccessResponse, TranslateFailureResponse } from './schemas/api-schemas';
export { buildProviderConfiguration, type ProviderConfiguration, type ProviderSettings } from './config/config';
export { SUPPORTED_LANGUAGES, resolveLanguage, type LanguageInfo } from './config/languages';
export { parseEnvironment } from './boundaries/env-parser';
export * from './providers/index';
export { TranslationError, ValidationError, ConfigError, type TranslationErrorKind } from './errors/index';

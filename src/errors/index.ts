// Base error class for all pagelingo errors
export class PagelingoError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'PagelingoError';
  }
}

// Validation error for schema validation failures
export class ValidationError extends PagelingoError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error for environment or option issues
export class ConfigError extends PagelingoError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export type TranslationErrorKind =
  | 'UnsupportedLanguage'
  | 'NoProviderConfigured'
  | 'Unauthenticated'
  | 'ModelLoading'
  | 'RateLimited'
  | 'NetworkError'
  | 'AllProvidersExhausted'
  | 'IncompleteResults'
  | 'Cancelled'
  | 'InvalidRequest'
  | 'Other';

/*
 * Terminal failure of a translation job. The kind is what callers branch on;
 * the message is for humans.
 */
export class TranslationError extends PagelingoError {
  constructor(
    message: string,
    public readonly kind: TranslationErrorKind,
    public readonly hint?: string
  ) {
    super(message, 'TRANSLATION_ERROR');
    this.name = 'TranslationError';
  }
}

export function isTranslationError(error: unknown): error is TranslationError {
  return error instanceof TranslationError;
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}

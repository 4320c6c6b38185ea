/**
 * One atomic span of page text whose boundaries must survive translation
 * (a DOM text node on the client side).
 */
export interface TextFragment {
  readonly index: number;
  readonly rawText: string;
  readonly leadingWhitespace: string;
  readonly trailingWhitespace: string;
  readonly trailingPunctuation?: string;
}

/** Inclusive range of fragment indices a chunk was cut from. */
export type FragmentRange = readonly [start: number, end: number];

export interface Chunk {
  id: number;
  text: string;
  startOffset: number;
  endOffset: number;
  sourceFragmentRange: FragmentRange;
}

export type ProviderFailureKind =
  | 'Unauthenticated'
  | 'ModelLoading'
  | 'RateLimited'
  | 'NetworkError'
  | 'Other';

export type ProviderOutcome =
  | { type: 'success'; text: string }
  | { type: 'retryable'; kind: ProviderFailureKind; message: string }
  | { type: 'fatal'; kind: ProviderFailureKind; message: string };

export interface TranslationAttempt {
  chunkId: number;
  providerName: string;
  attemptNumber: number;
  outcome:
    | { status: 'success'; text: string }
    | { status: 'failure'; kind: ProviderFailureKind; message: string };
}

export interface TranslationResult {
  chunkId: number;
  translatedText: string;
  providerUsed: string;
}

export interface RewriteInstruction {
  fragmentIndex: number;
  newText: string;
}

export function success(text: string): ProviderOutcome {
  return { type: 'success', text };
}

export function retryable(kind: ProviderFailureKind, message: string): ProviderOutcome {
  return { type: 'retryable', kind, message };
}

export function fatal(kind: ProviderFailureKind, message: string): ProviderOutcome {
  return { type: 'fatal', kind, message };
}

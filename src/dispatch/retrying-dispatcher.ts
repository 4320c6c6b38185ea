import type { TranslationProvider } from '../providers/translation-provider';
import type { LanguageInfo } from '../config/languages';
import {
  type Chunk,
  type ProviderOutcome,
  type TranslationAttempt,
  type TranslationResult,
  retryable,
} from '../types/translation';
import { TranslationError, handleUnknownError } from '../errors/index';
import { debug, warn } from '../output/logger';
import {
  DEFAULT_RETRY_POLICY,
  INITIAL_DISPATCH_STATE,
  type DispatchState,
  type RetryPolicy,
  nextStep,
} from './retry-policy';

export type Sleep = (ms: number) => Promise<void>;

export interface DispatcherOptions {
  policy?: Partial<RetryPolicy>;
  sleep?: Sleep;
  onAttempt?: (attempt: TranslationAttempt) => void;
}

export type DispatchResult =
  | { ok: true; result: TranslationResult; attempts: TranslationAttempt[] }
  | { ok: false; error: TranslationError; attempts: TranslationAttempt[] };

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const CREDENTIAL_HINT =
  'Check GEMINI_API_KEY and HUGGINGFACE_API_TOKEN in your environment or .env file.';

/*
 * Translates one chunk, walking providers in priority order and retrying
 * each according to the policy. Retry decisions come from nextStep(); this
 * class only performs the calls and the sleeps.
 */
export class RetryingDispatcher {
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly onAttempt: ((attempt: TranslationAttempt) => void) | undefined;

  constructor(options: DispatcherOptions = {}) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
    this.sleep = options.sleep ?? defaultSleep;
    this.onAttempt = options.onAttempt;
  }

  async dispatch(
    chunk: Chunk,
    targetLanguage: LanguageInfo,
    providers: readonly TranslationProvider[],
    signal?: AbortSignal
  ): Promise<DispatchResult> {
    const attempts: TranslationAttempt[] = [];
    if (providers.length === 0) {
      return {
        ok: false,
        error: new TranslationError('No translation provider is configured', 'NoProviderConfigured', CREDENTIAL_HINT),
        attempts,
      };
    }

    let state: DispatchState = INITIAL_DISPATCH_STATE;
    let lastFailure: { providerName: string; message: string } | undefined;
    let sawUnauthenticated = false;

    for (;;) {
      if (signal?.aborted) {
        return { ok: false, error: new TranslationError('Translation was cancelled', 'Cancelled'), attempts };
      }

      const provider = providers[state.providerIndex];
      if (!provider) break;

      const outcome = await this.callWithTimeout(provider, chunk, targetLanguage);
      const attempt = this.record(chunk, provider, state.retries + 1, outcome);
      attempts.push(attempt);

      if (outcome.type !== 'success') {
        lastFailure = { providerName: provider.name, message: outcome.message };
        if (outcome.kind === 'Unauthenticated') sawUnauthenticated = true;
      }

      const step = nextStep(state, outcome, this.policy, providers.length);
      switch (step.type) {
        case 'done':
          return {
            ok: true,
            result: { chunkId: chunk.id, translatedText: step.text, providerUsed: provider.name },
            attempts,
          };
        case 'retry':
          debug(`Chunk ${chunk.id}: retrying ${provider.name} in ${step.delayMs}ms`);
          await this.sleep(step.delayMs);
          state = step.state;
          break;
        case 'next-provider': {
          const next = providers[step.state.providerIndex];
          warn(`Chunk ${chunk.id}: ${provider.name} failed, falling back to ${next?.name ?? 'next provider'}`);
          state = step.state;
          break;
        }
        case 'exhausted':
          return { ok: false, error: this.exhaustedError(chunk, lastFailure, sawUnauthenticated), attempts };
      }
    }

    return { ok: false, error: this.exhaustedError(chunk, lastFailure, sawUnauthenticated), attempts };
  }

  /*
   * Races the provider call against the per-call timeout. The job's own
   * cancellation signal is deliberately not forwarded: calls already in
   * flight run to completion.
   */
  private async callWithTimeout(
    provider: TranslationProvider,
    chunk: Chunk,
    targetLanguage: LanguageInfo
  ): Promise<ProviderOutcome> {
    const controller = new AbortController();
    const timeoutMs = this.policy.timeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<ProviderOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(retryable('NetworkError', `${provider.name} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    const call = provider.translate(chunk, targetLanguage, controller.signal).catch((e: unknown) => {
      const err = handleUnknownError(e, `${provider.name} translate`);
      return retryable('Other', `${provider.name} failed unexpectedly: ${err.message}`);
    });

    try {
      return await Promise.race([call, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private record(
    chunk: Chunk,
    provider: TranslationProvider,
    attemptNumber: number,
    outcome: ProviderOutcome
  ): TranslationAttempt {
    const attempt: TranslationAttempt = {
      chunkId: chunk.id,
      providerName: provider.name,
      attemptNumber,
      outcome:
        outcome.type === 'success'
          ? { status: 'success', text: outcome.text }
          : { status: 'failure', kind: outcome.kind, message: outcome.message },
    };

    if (attempt.outcome.status === 'failure') {
      debug(
        `Chunk ${chunk.id}: ${provider.name} attempt ${attemptNumber} failed (${attempt.outcome.kind}): ${attempt.outcome.message}`
      );
    } else {
      debug(`Chunk ${chunk.id}: ${provider.name} attempt ${attemptNumber} succeeded`);
    }
    this.onAttempt?.(attempt);
    return attempt;
  }

  private exhaustedError(
    chunk: Chunk,
    lastFailure: { providerName: string; message: string } | undefined,
    sawUnauthenticated: boolean
  ): TranslationError {
    const detail = lastFailure ? ` Last error from ${lastFailure.providerName}: ${lastFailure.message}` : '';
    return new TranslationError(
      `All translation providers failed for chunk ${chunk.id}.${detail}`,
      'AllProvidersExhausted',
      sawUnauthenticated ? CREDENTIAL_HINT : undefined
    );
  }
}

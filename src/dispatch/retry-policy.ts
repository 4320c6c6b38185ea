import type { ProviderOutcome } from '../types/translation';

export interface RetryPolicy {
  /** Counted attempts per provider before falling through to the next one. */
  maxAttempts: number;
  /** Delay before each retry of the same provider; the last step repeats. */
  backoffScheduleMs: readonly number[];
  /** ModelLoading retries are not counted as attempts but are capped here. */
  maxModelLoadingRetries: number;
  /** Per-call timeout; expiry counts as a NetworkError. */
  timeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffScheduleMs: [2000, 4000, 6000],
  maxModelLoadingRetries: 5,
  timeoutMs: 30_000,
};

export interface DispatchState {
  providerIndex: number;
  /** Attempts on the current provider that count against maxAttempts. */
  countedAttempts: number;
  /** Retries of the current provider so far, counted or not. */
  retries: number;
  modelLoadingRetries: number;
}

export type DispatchStep =
  | { type: 'done'; text: string }
  | { type: 'retry'; delayMs: number; state: DispatchState }
  | { type: 'next-provider'; state: DispatchState }
  | { type: 'exhausted' };

export const INITIAL_DISPATCH_STATE: DispatchState = {
  providerIndex: 0,
  countedAttempts: 0,
  retries: 0,
  modelLoadingRetries: 0,
};

export function backoffDelay(policy: RetryPolicy, retryIndex: number): number {
  const schedule = policy.backoffScheduleMs;
  if (schedule.length === 0) return 0;
  return schedule[Math.min(retryIndex, schedule.length - 1)] ?? 0;
}

function advanceProvider(state: DispatchState, providerCount: number): DispatchStep {
  const providerIndex = state.providerIndex + 1;
  if (providerIndex >= providerCount) return { type: 'exhausted' };
  return { type: 'next-provider', state: { ...INITIAL_DISPATCH_STATE, providerIndex } };
}

function retry(state: DispatchState, policy: RetryPolicy, patch: Partial<DispatchState>): DispatchStep {
  return {
    type: 'retry',
    delayMs: backoffDelay(policy, state.retries),
    state: { ...state, ...patch, retries: state.retries + 1 },
  };
}

/**
 * Decides what the dispatcher does after an attempt finishes. Pure: the
 * same state, outcome and policy always give the same step.
 */
export function nextStep(
  state: DispatchState,
  outcome: ProviderOutcome,
  policy: RetryPolicy,
  providerCount: number
): DispatchStep {
  switch (outcome.type) {
    case 'success':
      return { type: 'done', text: outcome.text };

    case 'fatal':
      return advanceProvider(state, providerCount);

    case 'retryable': {
      if (outcome.kind === 'ModelLoading') {
        if (state.modelLoadingRetries < policy.maxModelLoadingRetries) {
          return retry(state, policy, { modelLoadingRetries: state.modelLoadingRetries + 1 });
        }
        return advanceProvider(state, providerCount);
      }

      const countedAttempts = state.countedAttempts + 1;
      if (countedAttempts < policy.maxAttempts) {
        return retry(state, policy, { countedAttempts });
      }
      return advanceProvider(state, providerCount);
    }
  }
}

import { setTimeout as delay } from 'timers/promises';
import { RetrySettings, TransferOutcome } from './types.js';
import { logger, ScopedLogger } from '../utils/logger.js';

const log = (): ScopedLogger => logger().child('retry');

/** Milliseconds to wait before retry number `retry` (1-based). */
export type BackoffFn = (retry: number) => number;

export type RetryPredicate = (outcome: TransferOutcome, previous: TransferOutcome | undefined) => boolean;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryPolicy {
  maxRetries: number;
  backoff: BackoffFn;
  shouldRetry: RetryPredicate;
  sleep: SleepFn;
}

export interface RetryResult {
  outcome: TransferOutcome;
  attempts: number;
}

export function exponentialBackoff(settings: Omit<RetrySettings, 'maxRetries'>): BackoffFn {
  return (retry) => Math.min(settings.initialDelayMs * settings.factor ** (retry - 1), settings.maxDelayMs);
}

/**
 * Retries transient and integrity failures, but stops once a failure repeats
 * identically: the same probe status twice, or the same wrong digest twice.
 * Cancellation is never retried.
 */
export const retryUnlessDeterministic: RetryPredicate = (outcome, previous) => {
  switch (outcome.kind) {
    case 'success':
    case 'cancelled':
      return false;
    case 'transient-failure':
      if (outcome.reason === 'transport') {
        return true;
      }
      return !(
        previous?.kind === 'transient-failure' &&
        previous.reason === 'probe' &&
        previous.status === outcome.status
      );
    case 'integrity-failure':
      return !(previous?.kind === 'integrity-failure' && previous.actualHash === outcome.actualHash);
  }
};

export const abortableSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export function createRetryPolicy(settings: RetrySettings, overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxRetries: settings.maxRetries,
    backoff: exponentialBackoff(settings),
    shouldRetry: retryUnlessDeterministic,
    sleep: abortableSleep,
    ...overrides,
  };
}

/**
 * Runs `attempt` until it succeeds, the policy declines a retry, or
 * `maxRetries` retries have been spent. Attempts never overlap.
 */
export async function runWithRetry(
  attempt: (attemptNumber: number) => Promise<TransferOutcome>,
  policy: RetryPolicy,
  signal?: AbortSignal
): Promise<RetryResult> {
  let previous: TransferOutcome | undefined;
  let attemptNumber = 1;

  for (;;) {
    const outcome = await attempt(attemptNumber);

    if (outcome.kind === 'success') {
      return { outcome, attempts: attemptNumber };
    }

    const retriesUsed = attemptNumber - 1;
    if (retriesUsed >= policy.maxRetries || !policy.shouldRetry(outcome, previous)) {
      if (outcome.kind !== 'cancelled') {
        log().warn('Giving up', { attempts: attemptNumber, outcome: outcome.kind });
      }
      return { outcome, attempts: attemptNumber };
    }

    const wait = policy.backoff(attemptNumber);
    log().info('Retrying', { attempt: attemptNumber + 1, of: policy.maxRetries + 1, waitMs: wait, after: outcome.kind });

    try {
      await policy.sleep(wait, signal);
    } catch (error) {
      if (signal?.aborted) {
        return { outcome: { kind: 'cancelled', bytesWritten: 0, partialFileRetained: false }, attempts: attemptNumber };
      }
      throw error;
    }

    if (signal?.aborted) {
      return { outcome: { kind: 'cancelled', bytesWritten: 0, partialFileRetained: false }, attempts: attemptNumber };
    }

    previous = outcome;
    attemptNumber++;
  }
}

import { logger } from './logger.js';
import { throwIfCancelled } from './cancellation.js';
import { TransientError } from './errors.js';
import { sleep, type SleepFn } from './humanize.js';

/**
 * Result of a single upstream attempt. Only `retryable` makes the retry loop
 * try again; the loop hands every other outcome straight back.
 */
export type FetchOutcome<T> =
  | { kind: 'success'; data: T }
  | { kind: 'soft-end'; reason: string }
  | { kind: 'retryable'; error: Error }
  | { kind: 'fatal'; error: Error };

export interface RetryPolicy {
  /** Total attempts, including the first. */
  maxRetries: number;
  /** Delay after attempt n is baseDelayMs * n. */
  baseDelayMs: number;
}

export interface RetryOptions {
  label: string;
  signal?: AbortSignal;
  sleep?: SleepFn;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

export const success = <T>(data: T): FetchOutcome<T> => ({ kind: 'success', data });
export const softEnd = <T>(reason: string): FetchOutcome<T> => ({ kind: 'soft-end', reason });
export const retryable = <T>(error: Error): FetchOutcome<T> => ({ kind: 'retryable', error });
export const fatal = <T>(error: Error): FetchOutcome<T> => ({ kind: 'fatal', error });

export type FailedOutcome = Exclude<FetchOutcome<unknown>, { kind: 'success' }>;

export const failureReason = (outcome: FailedOutcome): string =>
  outcome.kind === 'soft-end' ? outcome.reason : outcome.error.message;

// Linear backoff loop; returns the last retryable outcome once attempts run out
export async function withRetry<T>(
  attempt: (attemptNumber: number) => Promise<FetchOutcome<T>>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<FetchOutcome<T>> {
  const wait = options.sleep ?? sleep;
  let last: FetchOutcome<T> = retryable(new TransientError(`${options.label}: no attempts made`));

  for (let attemptNumber = 1; attemptNumber <= policy.maxRetries; attemptNumber++) {
    throwIfCancelled(options.signal);

    const outcome = await attempt(attemptNumber);
    if (outcome.kind !== 'retryable') {
      return outcome;
    }
    last = outcome;

    if (attemptNumber < policy.maxRetries) {
      const delay = policy.baseDelayMs * attemptNumber;
      logger.warn(`${options.label}: attempt ${attemptNumber} failed, retrying in ${delay}ms`, {
        error: outcome.error.message,
      });
      options.onRetry?.(attemptNumber, outcome.error, delay);
      await wait(delay, options.signal);
    }
  }

  logger.error(`${options.label}: failed after ${policy.maxRetries} attempts`, {
    error: last.kind === 'success' ? undefined : failureReason(last),
  });
  return last;
}

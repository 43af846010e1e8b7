import { CancelledError } from './errors.js';

/**
 * Cancellation token shared by every task of one pipeline run.
 */
export interface CancellationToken {
  readonly signal: AbortSignal;
  readonly isCancelled: boolean;
  cancel(reason?: string): void;
}

export function createCancellationToken(): CancellationToken {
  const controller = new AbortController();
  return {
    signal: controller.signal,
    get isCancelled() {
      return controller.signal.aborted;
    },
    cancel(reason = 'Operation cancelled') {
      if (!controller.signal.aborted) {
        controller.abort(new CancelledError(reason));
      }
    },
  };
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw cancellationReason(signal);
  }
}

export function cancellationReason(signal: AbortSignal): CancelledError {
  const reason: unknown = signal.reason;
  return reason instanceof CancelledError ? reason : new CancelledError();
}

/**
 * Time source for deadlines. Calls through to the global timers at
 * invocation time so fake timers apply in tests.
 */
export interface Clock {
  now(): number;
  /** Runs `fn` after `ms`; the returned function cancels the timer. */
  schedule(ms: number, fn: () => void): () => void;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  schedule(ms, fn) {
    const handle = setTimeout(fn, ms);
    return () => clearTimeout(handle);
  },
};

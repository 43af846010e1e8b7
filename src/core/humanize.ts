import { cancellationReason } from './cancellation.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

// Cancellable sleep; rejects with CancelledError once the signal aborts
export const sleep: SleepFn = (ms, signal) => {
  if (signal?.aborted) {
    return Promise.reject(cancellationReason(signal));
  }
  if (ms <= 0) {
    return Promise.resolve();
  }
  if (!signal) {
    return new Promise<void>(resolve => setTimeout(resolve, ms));
  }

  const abortSignal = signal;
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(cancellationReason(abortSignal));
    };
    const timer = setTimeout(() => {
      abortSignal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    abortSignal.addEventListener('abort', onAbort, { once: true });
  });
};

// Random delay between min and max milliseconds
export function randomDelay(
  min: number,
  max: number,
  signal?: AbortSignal,
  wait: SleepFn = sleep,
  random: () => number = Math.random,
): Promise<void> {
  if (max <= 0) {
    return wait(0, signal);
  }
  const delay = min + random() * (max - min);
  return wait(delay, signal);
}

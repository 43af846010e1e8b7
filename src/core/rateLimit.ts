import { cancellationReason } from './cancellation.js';

interface Waiter {
  grant: () => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export interface PermitState {
  capacity: number;
  inFlight: number;
  waiting: number;
  peakInFlight: number;
}

/**
 * Counting permit pool bounding in-flight upstream requests.
 * Waiters are granted permits in FIFO order.
 */
export class RequestPermits {
  private inFlight = 0;
  private peakInFlight = 0;
  private readonly queue: Waiter[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Permit capacity must be a positive integer, got ${capacity}`);
    }
  }

  // Wait for a permit; resolves with a release function that must be called exactly once
  acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(cancellationReason(signal));
    }

    if (this.inFlight < this.capacity) {
      this.take();
      return Promise.resolve(this.releaser());
    }

    return new Promise<() => void>((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => resolve(this.releaser()),
        signal,
      };

      if (signal) {
        const abortSignal = signal;
        waiter.onAbort = () => {
          const index = this.queue.indexOf(waiter);
          if (index !== -1) {
            this.queue.splice(index, 1);
            reject(cancellationReason(abortSignal));
          }
        };
        abortSignal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      this.queue.push(waiter);
    });
  }

  // Run fn while holding a permit
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  // Get current state for monitoring
  getState(): PermitState {
    return {
      capacity: this.capacity,
      inFlight: this.inFlight,
      waiting: this.queue.length,
      peakInFlight: this.peakInFlight,
    };
  }

  private take(): void {
    this.inFlight += 1;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.inFlight -= 1;
      this.dispatch();
    };
  }

  private dispatch(): void {
    while (this.inFlight < this.capacity && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) break;
      if (next.signal && next.onAbort) {
        next.signal.removeEventListener('abort', next.onAbort);
      }
      this.take();
      next.grant();
    }
  }
}

/**
 * Error taxonomy for the harvest pipeline.
 *
 * Only `ConfigurationError` is meant to surface to a caller. The rest are
 * turned into result strings or soft ends at the component that owns them.
 */

export class HarvestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing or unusable configuration, such as absent credentials. */
export class ConfigurationError extends HarvestError {}

/** The upstream service has no record of the item reference. */
export class ResolutionError extends HarvestError {
  readonly itemRef: string;

  constructor(itemRef: string, message: string) {
    super(message);
    this.itemRef = itemRef;
  }
}

/** Network failure, rate limiting, a bad status or an unreadable payload. */
export class TransientError extends HarvestError {
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.status = status;
  }
}

/** Raised at a suspension point once the run's deadline has fired. */
export class CancelledError extends HarvestError {
  constructor(reason = 'Operation cancelled') {
    super(reason);
  }
}

export function isCancelled(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

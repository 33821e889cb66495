/**
 * Error types raised by the transport layer
 */

/**
 * Base class for every error the flagwire client reports
 */
export class FlagClientError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FlagClientError';
    this.code = code;
  }
}

/**
 * An `only-if-cached` request found nothing in the store
 */
export class CacheMissError extends FlagClientError {
  readonly url: string;

  constructor(url: string) {
    super(`No cached response for ${url}`, 'CACHE_MISS');
    this.name = 'CacheMissError';
    this.url = url;
  }
}

/**
 * The whole exchange ran past the session's resource timeout
 */
export class ResourceTimeoutError extends FlagClientError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Resource timeout of ${timeoutMs}ms exceeded`, 'RESOURCE_TIMEOUT');
    this.name = 'ResourceTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The operation was cancelled before it finished
 */
export class OperationCancelledError extends FlagClientError {
  constructor() {
    super('Operation cancelled', 'CANCELLED');
    this.name = 'OperationCancelledError';
  }
}

/**
 * Check whether a value is one of the client's own errors
 */
export function isFlagClientError(error: unknown): error is FlagClientError {
  return error instanceof FlagClientError;
}

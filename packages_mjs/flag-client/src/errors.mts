/**
 * Error taxonomy for the flag client
 */

import { CacheMissError, FlagClientError, isFlagClientError } from '@flagwire/fetch-transport';

export { CacheMissError, FlagClientError, isFlagClientError };

/**
 * No credential was set, or it is empty
 */
export class MissingCredentialError extends FlagClientError {
  constructor() {
    super('An environment key is required before making requests', 'MISSING_CREDENTIAL');
    this.name = 'MissingCredentialError';
  }
}

/**
 * The request builder could not form a request
 */
export class RequestBuildError extends FlagClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'REQUEST_BUILD', options);
    this.name = 'RequestBuildError';
  }
}

/**
 * The transport failed; `cause` is the transport's own error
 */
export class UnhandledTransportError extends FlagClientError {
  constructor(cause: unknown) {
    super(
      cause instanceof Error ? `Request failed: ${cause.message}` : 'Request failed',
      'UNHANDLED',
      { cause }
    );
    this.name = 'UnhandledTransportError';
  }
}

/**
 * The response body did not decode into the expected shape
 */
export class DecodeError extends FlagClientError {
  constructor(cause: unknown) {
    super(
      cause instanceof Error ? `Failed to decode response: ${cause.message}` : 'Failed to decode response',
      'DECODE',
      { cause }
    );
    this.name = 'DecodeError';
  }
}

/**
 * Return client errors unchanged and wrap anything else as a transport failure
 */
export function toFlagClientError(error: unknown): FlagClientError {
  return isFlagClientError(error) ? error : new UnhandledTransportError(error);
}

/**
 * Shared helpers for transport tests
 */

import { Headers } from 'undici';
import type { Session } from '../src/session.mjs';
import type { DataOperation, TransportRequest } from '../src/types.mjs';

export const ORIGIN = 'https://api.test';

export interface OperationOutcome {
  operation: DataOperation;
  statusCode?: number;
  headers?: Record<string, string>;
  body: string;
  error?: Error;
  completions: number;
}

export function getRequest(path: string, overrides: Partial<TransportRequest> = {}): TransportRequest {
  return {
    url: `${ORIGIN}${path}`,
    method: 'GET',
    headers: {},
    cacheDirective: 'no-store',
    ...overrides,
  };
}

/**
 * Run one operation to completion and collect what the delegate saw
 */
export function runOperation(session: Session, request: TransportRequest): Promise<OperationOutcome> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    let statusCode: number | undefined;
    let headers: Record<string, string> | undefined;
    let completions = 0;

    const operation = session.dataOperation(request, {
      didReceiveResponse: (_op, status, responseHeaders) => {
        statusCode = status;
        headers = responseHeaders;
      },
      didReceiveData: (_op, chunk) => {
        chunks.push(chunk);
      },
      didComplete: (op, error) => {
        completions++;
        resolve({
          operation: op,
          statusCode,
          headers,
          body: Buffer.concat(chunks).toString(),
          error,
          completions,
        });
      },
    });
    operation.resume();
  });
}

/**
 * Plain record of the headers a mock reply callback was given
 */
export function headersOf(headers: Headers | Record<string, string> | undefined): Record<string, string> {
  if (!headers) return {};
  if (headers instanceof Headers) return Object.fromEntries(headers.entries());
  return { ...headers };
}

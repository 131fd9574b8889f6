/**
 * @sift/search — Error taxonomy
 *
 * Every failure raised by the adapter extends SearchError and carries a
 * stable `code`. Backend failures are wrapped once at the transport boundary
 * and then propagated unchanged.
 */

import type { BulkItemFailure } from './types.js';

export type SearchErrorCode =
  | 'INVALID_REQUEST'
  | 'BACKEND_UNAVAILABLE'
  | 'BACKEND_RESPONSE'
  | 'INDEX_ADMIN'
  | 'BULK_WRITE';

export class SearchError extends Error {
  constructor(
    message: string,
    public readonly code: SearchErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SearchError';
  }
}

/** Malformed or nonsensical input, raised before any network call. */
export class InvalidRequestError extends SearchError {
  constructor(message: string) {
    super(message, 'INVALID_REQUEST');
    this.name = 'InvalidRequestError';
  }
}

/** The transport could not reach the backend (connection, timeout, no nodes). */
export class BackendUnavailableError extends SearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'BACKEND_UNAVAILABLE', options);
    this.name = 'BackendUnavailableError';
  }
}

/** The backend answered with an error status. */
export class BackendResponseError extends SearchError {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorType: string | undefined,
    public readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(message, 'BACKEND_RESPONSE', options);
    this.name = 'BackendResponseError';
  }
}

export type IndexAdminOperation = 'exists' | 'create' | 'delete' | 'putMapping';

/** An index administration call was rejected by the backend. */
export class IndexAdminError extends SearchError {
  constructor(
    public readonly operation: IndexAdminOperation,
    public readonly index: string,
    public readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Index ${operation} failed for "${index}": ${reason}`, 'INDEX_ADMIN', options);
    this.name = 'IndexAdminError';
  }
}

/** A bulk call completed but one or more items were rejected. */
export class BulkWriteError extends SearchError {
  constructor(public readonly failures: BulkItemFailure[]) {
    const sample = failures
      .slice(0, 5)
      .map((f) => `${f.action} ${f.id}: ${f.reason}`)
      .join('; ');
    super(`Bulk write errors (${failures.length}): ${sample}`, 'BULK_WRITE');
    this.name = 'BulkWriteError';
  }
}

export function isSearchError(value: unknown): value is SearchError {
  return value instanceof SearchError;
}

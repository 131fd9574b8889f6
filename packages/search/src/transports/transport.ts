/**
 * @sift/search — Transport collaborator
 *
 * The network boundary. Implementations perform one backend call per method,
 * return deserialized response bodies, and translate their own failures into
 * BackendUnavailableError / BackendResponseError. They never see records or
 * search requests, only wire shapes.
 */

import type { BulkBatch, IndexMapping, NativeQuery } from '../types.js';

export interface TransportSearchParams {
  index: string;
  type: string;
  body: NativeQuery;
}

export type MappingBody = Record<string, { properties: IndexMapping }>;

export interface TransportPutMappingParams {
  index: string;
  type: string;
  body: MappingBody;
}

export interface SearchTransport {
  /** Returns the raw search response body. */
  search(params: TransportSearchParams): Promise<unknown>;
  /** Returns the raw bulk response body. */
  bulk(body: BulkBatch): Promise<unknown>;
  indexExists(index: string): Promise<boolean>;
  createIndex(index: string): Promise<void>;
  deleteIndex(index: string): Promise<void>;
  putMapping(params: TransportPutMappingParams): Promise<void>;
}

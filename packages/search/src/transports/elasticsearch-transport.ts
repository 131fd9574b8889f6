/**
 * @sift/search — Elasticsearch transport
 *
 * Implements SearchTransport with the official Elasticsearch client. The 7.x
 * client line is used because requests still address document types
 * (`_type`, typed mappings). Retries and timeouts are configured on the
 * client; this class issues exactly one call per method.
 *
 * Searches ask for exact totals (`track_total_hits`); without it the backend
 * stops counting at 10,000 and page counts come out wrong.
 */

import { Client, errors } from '@elastic/elasticsearch';
import { z } from 'zod';
import { BackendResponseError, BackendUnavailableError } from '../errors.js';
import type { BulkBatch } from '../types.js';
import type {
  SearchTransport,
  TransportPutMappingParams,
  TransportSearchParams,
} from './transport.js';

export interface ElasticsearchTransportConfig {
  /** Elasticsearch node URL (e.g., "http://localhost:9200") */
  node: string;
  /** Per-request timeout in milliseconds */
  requestTimeout?: number;
  /** Client-level retries on connection failures */
  maxRetries?: number;
}

const errorBodySchema = z.object({
  error: z.union([
    z.string().transform((reason) => ({ type: undefined, reason })),
    z.object({
      type: z.string().optional(),
      reason: z.string().optional(),
    }),
  ]),
});

function describeErrorBody(body: unknown, fallback: string): { type?: string; reason: string } {
  const parsed = errorBodySchema.safeParse(body);
  if (!parsed.success) return { reason: fallback };
  const { type, reason } = parsed.data.error;
  return { type, reason: reason ?? type ?? fallback };
}

/**
 * Map client errors onto the adapter's taxonomy. An error status from the
 * backend becomes BackendResponseError; every other client failure
 * (connection, timeout, no living nodes, aborted request, undecodable body,
 * unsupported product) becomes BackendUnavailableError. Errors the client
 * did not raise are returned untouched.
 */
export function translateClientError(operation: string, err: unknown): unknown {
  if (err instanceof errors.ResponseError) {
    const { type, reason } = describeErrorBody(err.body, err.message);
    return new BackendResponseError(
      `Elasticsearch ${operation} rejected: ${reason}`,
      err.statusCode,
      type,
      reason,
      { cause: err },
    );
  }

  if (err instanceof errors.ElasticsearchClientError) {
    return new BackendUnavailableError(`Elasticsearch ${operation} failed: ${err.message}`, {
      cause: err,
    });
  }

  return err;
}

export class ElasticsearchTransport implements SearchTransport {
  private readonly client: Client;

  constructor(config: ElasticsearchTransportConfig) {
    this.client = new Client({
      node: config.node,
      ...(config.requestTimeout !== undefined && { requestTimeout: config.requestTimeout }),
      ...(config.maxRetries !== undefined && { maxRetries: config.maxRetries }),
    });
  }

  async search({ index, type, body }: TransportSearchParams): Promise<unknown> {
    return this.call('search', () =>
      this.client.search({ index, type, body, track_total_hits: true }),
    );
  }

  async bulk(body: BulkBatch): Promise<unknown> {
    return this.call('bulk', () => this.client.bulk({ body: [...body] }));
  }

  async indexExists(index: string): Promise<boolean> {
    return this.call('indices.exists', () => this.client.indices.exists({ index }));
  }

  async createIndex(index: string): Promise<void> {
    await this.call('indices.create', () => this.client.indices.create({ index }));
  }

  async deleteIndex(index: string): Promise<void> {
    await this.call('indices.delete', () => this.client.indices.delete({ index }));
  }

  async putMapping({ index, type, body }: TransportPutMappingParams): Promise<void> {
    await this.call('indices.putMapping', () =>
      this.client.indices.putMapping({ index, type, include_type_name: true, body }),
    );
  }

  private async call<T>(operation: string, request: () => Promise<{ body: T }>): Promise<T> {
    try {
      const response = await request();
      return response.body;
    } catch (err) {
      throw translateClientError(operation, err);
    }
  }
}

/**
 * @sift/search — Search engine
 *
 * The single entry point the rest of an application talks to. Composes the
 * resolver, translator, executor, mapper and index manager around one
 * transport, and owns the bulk write path.
 */

import { createLogger } from '@sift/config';
import { buildBulkBatch, deleteOperations, toBulkResult, upsertOperations } from './bulk-batch.js';
import { BulkWriteError } from './errors.js';
import { IndexManager } from './index-manager.js';
import { IndexResolver, type IndexStrategy } from './index-resolver.js';
import { ResultMapper } from './result-mapper.js';
import { SearchExecutor } from './search-executor.js';
import type { SearchTransport } from './transports/transport.js';
import type {
  BulkOperation,
  BulkResult,
  IndexDescriptor,
  PaginatedRawResult,
  PaginatedResult,
  RawSearchResult,
  RecordStore,
  ReconciledResult,
  SearchRequest,
  Searchable,
  SearchableType,
} from './types.js';

const log = createLogger('search-engine');

/** Page size used when a paginated request does not name one. */
export const DEFAULT_PER_PAGE = 15;

export interface SearchEngineOptions {
  transport: SearchTransport;
  strategy: IndexStrategy;
  /** Relevance floor applied to every search. */
  minScore: number;
}

export class SearchEngine {
  private readonly transport: SearchTransport;
  private readonly resolver: IndexResolver;
  private readonly executor: SearchExecutor;
  private readonly mapper = new ResultMapper();
  private readonly indices: IndexManager;

  constructor(options: SearchEngineOptions) {
    this.transport = options.transport;
    this.resolver = new IndexResolver(options.strategy);
    this.executor = new SearchExecutor(this.transport, this.resolver, {
      minScore: options.minScore,
    });
    this.indices = new IndexManager(this.transport);
  }

  // ─── Writes ────────────────────────────────────────────────────────

  /** Upsert the given records into their indices in one bulk call. */
  async update(models: readonly Searchable[]): Promise<BulkResult | null> {
    return this.write(upsertOperations(models, this.resolver));
  }

  /** Remove the given records from their indices in one bulk call. */
  async delete(models: readonly Searchable[]): Promise<BulkResult | null> {
    return this.write(deleteOperations(models, this.resolver));
  }

  /**
   * Send a prepared list of operations as one batch. Returns null when there
   * is nothing to send.
   */
  async write(operations: readonly BulkOperation[]): Promise<BulkResult | null> {
    if (operations.length === 0) return null;

    const batch = buildBulkBatch(operations);
    log.debug({ operations: operations.length, lines: batch.length }, 'Sending bulk batch');

    const result = toBulkResult(await this.transport.bulk(batch));
    if (result.errors) {
      log.warn({ failures: result.failures.slice(0, 5) }, 'Bulk batch had item failures');
      throw new BulkWriteError(result.failures);
    }
    return result;
  }

  // ─── Searches ──────────────────────────────────────────────────────

  search(type: SearchableType, request: SearchRequest): Promise<RawSearchResult> {
    return this.executor.search(type, request);
  }

  paginate(
    type: SearchableType,
    request: SearchRequest,
    perPage: number,
    page: number,
  ): Promise<PaginatedRawResult> {
    return this.executor.paginate(type, request, page, perPage);
  }

  mapIds(raw: RawSearchResult): string[] {
    return this.mapper.mapIds(raw);
  }

  map<TRecord>(raw: RawSearchResult, store: RecordStore<TRecord>): Promise<TRecord[]> {
    return this.mapper.map(raw, store);
  }

  getTotalCount(raw: RawSearchResult): number {
    return this.mapper.totalCount(raw);
  }

  /** Search and resolve hits to stored records, in relevance order. */
  async get<TRecord>(
    type: SearchableType,
    request: SearchRequest,
    store: RecordStore<TRecord>,
  ): Promise<ReconciledResult<TRecord>> {
    const raw = await this.search(type, request);
    return this.mapper.reconcile(raw, store);
  }

  /**
   * Paginated search resolved to stored records. Page and size come from the
   * request, defaulting to the first page of DEFAULT_PER_PAGE.
   */
  async paginateRecords<TRecord>(
    type: SearchableType,
    request: SearchRequest,
    store: RecordStore<TRecord>,
  ): Promise<PaginatedResult<TRecord>> {
    const raw = await this.paginate(
      type,
      request,
      request.perPage ?? DEFAULT_PER_PAGE,
      request.page ?? 1,
    );
    const { records, total } = await this.mapper.reconcile(raw, store);
    return { records, total, page: raw.page, perPage: raw.perPage, pageCount: raw.pageCount };
  }

  // ─── Index administration ──────────────────────────────────────────

  /** Physical index that holds documents of `type`. */
  indexFor(type: SearchableType): string {
    return this.resolver.resolve(type);
  }

  exists(index: string): Promise<boolean> {
    return this.indices.exists(index);
  }

  createIndex(index: string): Promise<void> {
    return this.indices.create(index);
  }

  deleteIndex(index: string): Promise<void> {
    return this.indices.delete(index);
  }

  putMapping(descriptor: IndexDescriptor): Promise<void> {
    return this.indices.putMapping(descriptor.index, descriptor.type, descriptor.mapping);
  }
}

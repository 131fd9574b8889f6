/**
 * @sift/search — Search execution
 *
 * Resolves the target index, translates the request and issues one search
 * call through the transport. This is the only place that owns pagination
 * arithmetic and the relevance floor.
 */

import { z } from 'zod';
import { createLogger } from '@sift/config';
import { InvalidRequestError } from './errors.js';
import type { IndexResolver } from './index-resolver.js';
import { QueryTranslator } from './query-translator.js';
import { toRawSearchResult } from './result-mapper.js';
import type { SearchTransport } from './transports/transport.js';
import type {
  NativeQuery,
  PaginatedRawResult,
  RawSearchResult,
  SearchRequest,
  SearchableType,
} from './types.js';

const log = createLogger('search-executor');

export interface SearchExecutorSettings {
  /** Relevance floor sent as `min_score` on every search. */
  minScore: number;
}

const paginationSchema = z.object({
  page: z.number().int('page must be an integer').min(1, 'page must be at least 1'),
  perPage: z.number().int('perPage must be an integer').positive('perPage must be positive'),
});

const limitSchema = z.number().int('limit must be an integer').min(0, 'limit must not be negative');

function validate<T>(schema: z.ZodType<T>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidRequestError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return parsed.data;
}

/** Number of pages needed to show `total` hits, rounding the last partial page up. */
export function pageCount(total: number, perPage: number): number {
  return Math.ceil(total / perPage);
}

export class SearchExecutor {
  constructor(
    private readonly transport: SearchTransport,
    private readonly resolver: IndexResolver,
    private readonly settings: Readonly<SearchExecutorSettings>,
    private readonly translator: QueryTranslator = new QueryTranslator(),
  ) {}

  /** Single page; bounded by the request limit when one is set. */
  async search(type: SearchableType, request: SearchRequest): Promise<RawSearchResult> {
    const size = request.limit === undefined ? undefined : validate(limitSchema, request.limit);
    const body = this.translator.translate(request, { size, minScore: this.settings.minScore });
    return this.execute(type, body);
  }

  /** One page of `perPage` hits; `page` is 1-based. */
  async paginate(
    type: SearchableType,
    request: SearchRequest,
    page: number,
    perPage: number,
  ): Promise<PaginatedRawResult> {
    validate(paginationSchema, { page, perPage });

    const body = this.translator.translate(request, {
      from: (page - 1) * perPage,
      size: perPage,
      minScore: this.settings.minScore,
    });
    const raw = await this.execute(type, body);

    return { ...raw, page, perPage, pageCount: pageCount(raw.total, perPage) };
  }

  private async execute(type: SearchableType, body: NativeQuery): Promise<RawSearchResult> {
    const index = this.resolver.resolve(type);
    const typeName = type.searchableAs();

    log.debug({ index, type: typeName, body }, 'Executing search');

    const response = await this.transport.search({ index, type: typeName, body });
    return toRawSearchResult(response);
  }
}

/**
 * @sift/search — Search request builder
 *
 * Fluent, immutable construction of SearchRequest values. Every call returns
 * a new builder, so a partially built query can be shared and extended.
 *
 * @example
 * ```ts
 * const request = searchFor(Post, 'release notes')
 *   .where('status', 'published')
 *   .orderBy('publishedAt', 'desc')
 *   .take(20)
 *   .build();
 *
 * const secondPage = searchFor(Post, 'release notes').forPage(2, 25).build();
 * ```
 */

import type {
  FilterValue,
  SearchFilter,
  SearchRequest,
  SearchableType,
  SortDirection,
  SortSpec,
} from './types.js';

interface BuilderState {
  query: string;
  filters: readonly SearchFilter[];
  sorts: readonly SortSpec[];
  limit?: number;
  page?: number;
  perPage?: number;
  boosts: Readonly<Record<string, number>>;
}

export class SearchRequestBuilder {
  private constructor(private readonly state: BuilderState) {}

  static for(query: string, boosts: Readonly<Record<string, number>> = {}): SearchRequestBuilder {
    return new SearchRequestBuilder({ query, filters: [], sorts: [], boosts });
  }

  /** Equality filter; re-declaring a field replaces its value in place. */
  where(field: string, value: FilterValue): SearchRequestBuilder {
    const exists = this.state.filters.some((filter) => filter.field === field);
    const filters = exists
      ? this.state.filters.map((filter) => (filter.field === field ? { field, value } : filter))
      : [...this.state.filters, { field, value }];
    return this.with({ filters });
  }

  orderBy(field: string, direction: SortDirection = 'asc'): SearchRequestBuilder {
    return this.with({ sorts: [...this.state.sorts, { field, direction }] });
  }

  take(limit: number): SearchRequestBuilder {
    return this.with({ limit });
  }

  /** Select a 1-based page of `perPage` records for paginated searches. */
  forPage(page: number, perPage: number): SearchRequestBuilder {
    return this.with({ page, perPage });
  }

  boost(field: string, weight: number): SearchRequestBuilder {
    return this.with({ boosts: { ...this.state.boosts, [field]: weight } });
  }

  withBoosts(boosts: Readonly<Record<string, number>>): SearchRequestBuilder {
    return this.with({ boosts: { ...boosts } });
  }

  build(): SearchRequest {
    const { query, filters, sorts, limit, page, perPage, boosts } = this.state;
    return Object.freeze({
      query,
      filters: Object.freeze([...filters]),
      sorts: Object.freeze([...sorts]),
      ...(limit !== undefined && { limit }),
      ...(page !== undefined && { page }),
      ...(perPage !== undefined && { perPage }),
      ...(Object.keys(boosts).length > 0 && { boosts: Object.freeze({ ...boosts }) }),
    });
  }

  private with(patch: Partial<BuilderState>): SearchRequestBuilder {
    return new SearchRequestBuilder({ ...this.state, ...patch });
  }
}

/** Start a request for `type`, seeded with the type's default boosts. */
export function searchFor(type: SearchableType, query: string): SearchRequestBuilder {
  return SearchRequestBuilder.for(query, type.boosts);
}

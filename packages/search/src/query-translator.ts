/**
 * @sift/search — Query translation
 *
 * Turns a backend-agnostic SearchRequest into the engine's bool query DSL:
 *
 *   {
 *     query: { bool: { must: [query_string, match_phrase...], should: multi_match } },
 *     sort: ['_score', { field: { order } }...],
 *     track_scores: true,
 *     from?, size?, min_score?
 *   }
 *
 * Relevance always sorts first; caller sorts only break ties.
 */

import { InvalidRequestError } from './errors.js';
import type {
  MatchPhraseClause,
  MultiMatchClause,
  MustClause,
  NativeQuery,
  SearchFilter,
  SearchRequest,
  SortClause,
  SortSpec,
  TranslateOptions,
} from './types.js';

/** Query string used when a request carries filters but no text. */
export const MATCH_ALL_QUERY = '*';

const SORT_DIRECTIONS = new Set(['asc', 'desc']);

export class QueryTranslator {
  translate(request: SearchRequest, options: TranslateOptions = {}): NativeQuery {
    const text = request.query.trim();
    if (text === '' && request.filters.length === 0) {
      throw new InvalidRequestError('Search query is empty and no filters were given');
    }

    const must: MustClause[] = [
      { query_string: { query: text === '' ? MATCH_ALL_QUERY : request.query } },
      ...request.filters.map((filter) => this.filterClause(filter)),
    ];

    const boostedFields = this.boostedFields(request.boosts);
    const should: MultiMatchClause | undefined =
      text === '' || boostedFields.length === 0
        ? undefined
        : { multi_match: { query: request.query, fields: boostedFields } };

    const native: NativeQuery = {
      query: { bool: should ? { must, should } : { must } },
      sort: ['_score', ...request.sorts.map((sort) => this.sortClause(sort))],
      track_scores: true,
    };

    if (options.from !== undefined) native.from = options.from;
    if (options.size !== undefined) native.size = options.size;
    if (options.minScore !== undefined) native.min_score = options.minScore;

    return native;
  }

  private filterClause(filter: SearchFilter): MatchPhraseClause {
    if (filter.field.trim() === '') {
      throw new InvalidRequestError('Filter field name must not be empty');
    }
    return { match_phrase: { [filter.field]: filter.value } };
  }

  private sortClause(sort: SortSpec): SortClause {
    if (!SORT_DIRECTIONS.has(sort.direction)) {
      throw new InvalidRequestError(`Unsupported sort direction "${sort.direction}" for ${sort.field}`);
    }
    return { [sort.field]: { order: sort.direction } };
  }

  /**
   * Boosted fields only raise the score of documents that already match the
   * mandatory clauses, so they go in `should`, never `must`.
   */
  private boostedFields(boosts: Readonly<Record<string, number>> | undefined): string[] {
    return Object.entries(boosts ?? {}).map(([field, weight]) => {
      if (!Number.isFinite(weight) || weight < 0) {
        throw new InvalidRequestError(`Boost for ${field} must be a non-negative number`);
      }
      return `${field}^${weight}`;
    });
  }
}

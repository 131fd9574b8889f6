/**
 * @sift/search — Shared types
 *
 * Request, wire and result shapes used across the adapter. Wire shapes are
 * type aliases so they stay assignable to the transport's JSON body types.
 */

// ─── Searchable records ──────────────────────────────────────────────

/** A kind of searchable record, identified by its document type name. */
export interface SearchableType {
  /** Document type name; doubles as the index name in per-type mode. */
  searchableAs(): string;
  /** Default per-field boosts applied to searches on this type. */
  readonly boosts?: Readonly<Record<string, number>>;
}

/** A single record that can be written to the index. */
export interface Searchable extends SearchableType {
  getKey(): string | number;
  toSearchableArray(): Record<string, unknown>;
}

/**
 * Persistence collaborator used to resolve hit ids back to stored records.
 * `findByKeys` must be a single batched lookup.
 */
export interface RecordStore<TRecord> {
  findByKeys(keys: readonly string[]): Promise<readonly TRecord[]>;
  keyOf(record: TRecord): string | number;
}

// ─── Requests ────────────────────────────────────────────────────────

export type FilterValue = string | number | boolean;

export type SortDirection = 'asc' | 'desc';

export interface SearchFilter {
  readonly field: string;
  readonly value: FilterValue;
}

export interface SortSpec {
  readonly field: string;
  readonly direction: SortDirection;
}

/** Backend-agnostic search request. Filters and sorts keep declaration order. */
export interface SearchRequest {
  readonly query: string;
  readonly filters: readonly SearchFilter[];
  readonly sorts: readonly SortSpec[];
  readonly limit?: number;
  readonly page?: number;
  readonly perPage?: number;
  readonly boosts?: Readonly<Record<string, number>>;
}

// ─── Native query (wire) ─────────────────────────────────────────────

export type QueryStringClause = { query_string: { query: string } };

export type MatchPhraseClause = { match_phrase: Record<string, FilterValue> };

export type MustClause = QueryStringClause | MatchPhraseClause;

export type MultiMatchClause = { multi_match: { query: string; fields: string[] } };

export type SortClause = '_score' | Record<string, { order: SortDirection }>;

export type NativeQuery = {
  query: {
    bool: {
      must: MustClause[];
      should?: MultiMatchClause;
    };
  };
  sort: SortClause[];
  track_scores: true;
  from?: number;
  size?: number;
  min_score?: number;
};

/** Scalars the executor may place on a native query. */
export interface TranslateOptions {
  from?: number;
  size?: number;
  minScore?: number;
}

// ─── Results ─────────────────────────────────────────────────────────

export interface SearchHit {
  id: string;
  score: number | null;
}

/** Normalised engine response; `total` is always a scalar. */
export interface RawSearchResult {
  hits: SearchHit[];
  total: number;
  maxScore: number | null;
  took: number;
}

export interface PaginatedRawResult extends RawSearchResult {
  page: number;
  perPage: number;
  pageCount: number;
}

export interface ReconciledResult<TRecord> {
  records: TRecord[];
  total: number;
}

export interface PaginatedResult<TRecord> extends ReconciledResult<TRecord> {
  page: number;
  perPage: number;
  pageCount: number;
}

// ─── Bulk ────────────────────────────────────────────────────────────

export type UpsertOperation = {
  action: 'upsert';
  id: string;
  index: string;
  type: string;
  document: Record<string, unknown>;
};

export type DeleteOperation = {
  action: 'delete';
  id: string;
  index: string;
  type: string;
};

export type BulkOperation = UpsertOperation | DeleteOperation;

export type BulkActionMetadata = { _id: string; _index: string; _type: string };

export type BulkLine =
  | { update: BulkActionMetadata }
  | { delete: BulkActionMetadata }
  | { doc: Record<string, unknown>; doc_as_upsert: true };

export type BulkBatch = readonly BulkLine[];

export interface BulkItemFailure {
  id: string;
  action: string;
  status: number;
  reason: string;
}

export interface BulkResult {
  took: number;
  errors: boolean;
  failures: BulkItemFailure[];
}

// ─── Index administration ────────────────────────────────────────────

export type FieldMapping = {
  type: string;
  [option: string]: unknown;
};

export type IndexMapping = Record<string, FieldMapping>;

export interface IndexDescriptor {
  index: string;
  type: string;
  mapping: IndexMapping;
}

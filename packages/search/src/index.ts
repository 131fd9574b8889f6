/**
 * @sift/search — Search-index adapter
 *
 * Translates backend-agnostic search requests into Elasticsearch queries,
 * batches index writes, administers indices, and reconciles hits with
 * stored records.
 */

// Engine
export { SearchEngine, DEFAULT_PER_PAGE, type SearchEngineOptions } from './engine.js';
export { createSearchEngine, createSearchTransport } from './client-factory.js';

// Building blocks
export {
  IndexResolver,
  globalIndex,
  perTypeIndex,
  indexStrategyFromConfig,
  type IndexStrategy,
} from './index-resolver.js';
export { QueryTranslator, MATCH_ALL_QUERY } from './query-translator.js';
export {
  buildBulkBatch,
  upsertOperations,
  deleteOperations,
  toBulkResult,
} from './bulk-batch.js';
export { SearchExecutor, pageCount, type SearchExecutorSettings } from './search-executor.js';
export { ResultMapper, toRawSearchResult } from './result-mapper.js';
export { IndexManager } from './index-manager.js';
export { SearchRequestBuilder, searchFor } from './search-builder.js';

// Transports
export {
  ElasticsearchTransport,
  translateClientError,
  type ElasticsearchTransportConfig,
} from './transports/elasticsearch-transport.js';
export { InMemorySearchTransport } from './transports/memory-transport.js';
export type {
  SearchTransport,
  TransportSearchParams,
  TransportPutMappingParams,
  MappingBody,
} from './transports/transport.js';

// Errors
export {
  SearchError,
  InvalidRequestError,
  BackendUnavailableError,
  BackendResponseError,
  IndexAdminError,
  BulkWriteError,
  isSearchError,
  type SearchErrorCode,
  type IndexAdminOperation,
} from './errors.js';

// Types
export type {
  Searchable,
  SearchableType,
  RecordStore,
  FilterValue,
  SortDirection,
  SearchFilter,
  SortSpec,
  SearchRequest,
  NativeQuery,
  MustClause,
  QueryStringClause,
  MatchPhraseClause,
  MultiMatchClause,
  SortClause,
  TranslateOptions,
  SearchHit,
  RawSearchResult,
  PaginatedRawResult,
  ReconciledResult,
  PaginatedResult,
  BulkOperation,
  UpsertOperation,
  DeleteOperation,
  BulkActionMetadata,
  BulkLine,
  BulkBatch,
  BulkItemFailure,
  BulkResult,
  FieldMapping,
  IndexMapping,
  IndexDescriptor,
} from './types.js';

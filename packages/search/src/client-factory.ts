/**
 * @sift/search — Transport and engine factories
 *
 * Creates the appropriate SearchTransport implementation based on
 * whether an Elasticsearch URL is provided. Falls back to an
 * in-memory transport for local development and testing.
 */

import { config as processConfig, type Config } from '@sift/config';
import { SearchEngine } from './engine.js';
import { indexStrategyFromConfig } from './index-resolver.js';
import {
  ElasticsearchTransport,
  type ElasticsearchTransportConfig,
} from './transports/elasticsearch-transport.js';
import { InMemorySearchTransport } from './transports/memory-transport.js';
import type { SearchTransport } from './transports/transport.js';

/**
 * Create a SearchTransport instance.
 *
 * @param elasticsearchUrl - Elasticsearch node URL (e.g., "http://localhost:9200").
 *   When provided, returns an ElasticsearchTransport.
 *   When omitted or empty, returns an InMemorySearchTransport.
 */
export function createSearchTransport(
  elasticsearchUrl?: string,
  options: Omit<ElasticsearchTransportConfig, 'node'> = {},
): SearchTransport {
  if (elasticsearchUrl) {
    return new ElasticsearchTransport({ node: elasticsearchUrl, ...options });
  }

  return new InMemorySearchTransport();
}

/** Wire a SearchEngine from configuration (the process configuration by default). */
export function createSearchEngine(cfg: Config = processConfig): SearchEngine {
  return new SearchEngine({
    transport: createSearchTransport(cfg.ELASTICSEARCH_URL, {
      requestTimeout: cfg.SEARCH_REQUEST_TIMEOUT_MS,
      maxRetries: cfg.SEARCH_MAX_RETRIES,
    }),
    strategy: indexStrategyFromConfig(cfg),
    minScore: cfg.SEARCH_MIN_SCORE,
  });
}

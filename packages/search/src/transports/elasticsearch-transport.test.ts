import { describe, it, expect, vi, beforeEach } from 'vitest';

// ─── Hoisted mocks ──────────────────────────────────────────────────

const {
  mockSearch,
  mockBulk,
  mockExists,
  mockCreate,
  mockDelete,
  mockPutMapping,
  clientOptions,
  FakeErrors,
} = vi.hoisted(() => {
  class ElasticsearchClientError extends Error {}
  class ConnectionError extends ElasticsearchClientError {}
  class NoLivingConnectionsError extends ElasticsearchClientError {}
  class TimeoutError extends ElasticsearchClientError {}
  class DeserializationError extends ElasticsearchClientError {}
  class RequestAbortedError extends ElasticsearchClientError {}
  class ProductNotSupportedError extends ElasticsearchClientError {}
  class ResponseError extends ElasticsearchClientError {
    constructor(
      public statusCode: number,
      public body: unknown,
    ) {
      super('Response Error');
    }
  }

  return {
    mockSearch: vi.fn(),
    mockBulk: vi.fn(),
    mockExists: vi.fn(),
    mockCreate: vi.fn(),
    mockDelete: vi.fn(),
    mockPutMapping: vi.fn(),
    clientOptions: [] as Array<Record<string, unknown>>,
    FakeErrors: {
      ElasticsearchClientError,
      ConnectionError,
      NoLivingConnectionsError,
      TimeoutError,
      DeserializationError,
      RequestAbortedError,
      ProductNotSupportedError,
      ResponseError,
    },
  };
});

vi.mock('@elastic/elasticsearch', () => {
  class MockClient {
    constructor(opts: Record<string, unknown>) {
      clientOptions.push(opts);
    }

    search = mockSearch;
    bulk = mockBulk;
    indices = {
      exists: mockExists,
      create: mockCreate,
      delete: mockDelete,
      putMapping: mockPutMapping,
    };
  }

  return { Client: MockClient, errors: FakeErrors };
});

// ─── Import after mocks ─────────────────────────────────────────────

import { ElasticsearchTransport, translateClientError } from './elasticsearch-transport.js';
import { BackendResponseError, BackendUnavailableError } from '../errors.js';
import type { NativeQuery } from '../types.js';

const QUERY: NativeQuery = {
  query: { bool: { must: [{ query_string: { query: 'widgets' } }] } },
  sort: ['_score'],
  track_scores: true,
  min_score: 50,
};

describe('ElasticsearchTransport', () => {
  let transport: ElasticsearchTransport;

  beforeEach(() => {
    vi.resetAllMocks();
    clientOptions.length = 0;
    transport = new ElasticsearchTransport({ node: 'http://localhost:9200', maxRetries: 2 });
  });

  it('configures the client with the node and only the options given', () => {
    expect(clientOptions).toEqual([{ node: 'http://localhost:9200', maxRetries: 2 }]);
  });

  it('sends searches with index, type and body and returns the body', async () => {
    const body = { took: 1, hits: { total: 0, hits: [] } };
    mockSearch.mockResolvedValue({ body, statusCode: 200 });

    const result = await transport.search({ index: 'posts', type: 'post', body: QUERY });

    expect(mockSearch).toHaveBeenCalledWith({
      index: 'posts',
      type: 'post',
      body: QUERY,
      track_total_hits: true,
    });
    expect(result).toBe(body);
  });

  it('sends the bulk lines as the request body', async () => {
    mockBulk.mockResolvedValue({ body: { took: 1, errors: false, items: [] } });
    const lines = [{ delete: { _id: '1', _index: 'posts', _type: 'post' } }];

    await transport.bulk(lines);

    expect(mockBulk).toHaveBeenCalledWith({ body: lines });
  });

  it('answers existence checks from the response body', async () => {
    mockExists.mockResolvedValue({ body: false, statusCode: 404 });

    expect(await transport.indexExists('posts')).toBe(false);
    expect(mockExists).toHaveBeenCalledWith({ index: 'posts' });
  });

  it('creates and deletes indices by name', async () => {
    mockCreate.mockResolvedValue({ body: { acknowledged: true } });
    mockDelete.mockResolvedValue({ body: { acknowledged: true } });

    await transport.createIndex('posts');
    await transport.deleteIndex('posts');

    expect(mockCreate).toHaveBeenCalledWith({ index: 'posts' });
    expect(mockDelete).toHaveBeenCalledWith({ index: 'posts' });
  });

  it('puts typed mappings', async () => {
    mockPutMapping.mockResolvedValue({ body: { acknowledged: true } });
    const body = { post: { properties: { title: { type: 'text' } } } };

    await transport.putMapping({ index: 'posts', type: 'post', body });

    expect(mockPutMapping).toHaveBeenCalledWith({
      index: 'posts',
      type: 'post',
      include_type_name: true,
      body,
    });
  });

  it('asks for exact totals so large result sets page correctly', async () => {
    mockSearch.mockResolvedValue({
      body: { took: 3, hits: { total: { value: 25_431, relation: 'eq' }, hits: [] } },
    });

    const body = await transport.search({ index: 'posts', type: 'post', body: QUERY });

    expect(mockSearch.mock.calls[0][0]).toMatchObject({ track_total_hits: true });
    expect(mockSearch.mock.calls[0][0].body).not.toHaveProperty('track_total_hits');
    expect(body).toMatchObject({ hits: { total: { value: 25_431 } } });
  });

  it('turns connection failures into BackendUnavailableError', async () => {
    mockSearch.mockRejectedValue(new FakeErrors.ConnectionError('connect ECONNREFUSED'));

    const error = await transport
      .search({ index: 'posts', type: 'post', body: QUERY })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BackendUnavailableError);
    expect(error).toMatchObject({
      code: 'BACKEND_UNAVAILABLE',
      message: 'Elasticsearch search failed: connect ECONNREFUSED',
    });
    expect(mockSearch).toHaveBeenCalledTimes(1);
  });

  it('turns error responses into BackendResponseError with the reported reason', async () => {
    mockCreate.mockRejectedValue(
      new FakeErrors.ResponseError(400, {
        error: {
          type: 'resource_already_exists_exception',
          reason: 'index [posts/abc] already exists',
        },
        status: 400,
      }),
    );

    const error = await transport.createIndex('posts').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BackendResponseError);
    expect(error).toMatchObject({
      statusCode: 400,
      errorType: 'resource_already_exists_exception',
      reason: 'index [posts/abc] already exists',
      message: 'Elasticsearch indices.create rejected: index [posts/abc] already exists',
    });
  });
});

describe('translateClientError', () => {
  it('maps timeouts and exhausted node pools to BackendUnavailableError', () => {
    expect(translateClientError('search', new FakeErrors.TimeoutError('Request timed out'))).toBeInstanceOf(
      BackendUnavailableError,
    );
    expect(
      translateClientError('bulk', new FakeErrors.NoLivingConnectionsError('no living connections')),
    ).toBeInstanceOf(BackendUnavailableError);
  });

  it('maps undecodable bodies, aborted requests and unsupported servers to BackendUnavailableError', () => {
    const failures = [
      new FakeErrors.DeserializationError('Unexpected token x in JSON'),
      new FakeErrors.RequestAbortedError('Request aborted'),
      new FakeErrors.ProductNotSupportedError('The client noticed that the server is not Elasticsearch'),
    ];

    for (const failure of failures) {
      const translated = translateClientError('search', failure);

      expect(translated).toBeInstanceOf(BackendUnavailableError);
      expect(translated).toMatchObject({
        code: 'BACKEND_UNAVAILABLE',
        message: `Elasticsearch search failed: ${failure.message}`,
        cause: failure,
      });
    }
  });

  it('accepts string error bodies and falls back to the client message', () => {
    const fromString = translateClientError('search', new FakeErrors.ResponseError(500, { error: 'boom' }));
    const fromUnknown = translateClientError('search', new FakeErrors.ResponseError(502, 'Bad Gateway'));

    expect(fromString).toMatchObject({ statusCode: 500, reason: 'boom', errorType: undefined });
    expect(fromUnknown).toMatchObject({ statusCode: 502, reason: 'Response Error' });
  });

  it('returns other errors untouched', () => {
    const original = new TypeError('bad input');

    expect(translateClientError('search', original)).toBe(original);
  });
});

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemorySearchTransport } from './memory-transport.js';
import { BackendResponseError } from '../errors.js';
import { buildBulkBatch } from '../bulk-batch.js';
import { toRawSearchResult } from '../result-mapper.js';
import type { NativeQuery } from '../types.js';

// ─── Helpers ─────────────────────────────────────────────────────────

function buildQuery(overrides: Partial<NativeQuery> = {}): NativeQuery {
  return {
    query: { bool: { must: [{ query_string: { query: 'widget' } }] } },
    sort: ['_score'],
    track_scores: true,
    ...overrides,
  };
}

function hitIds(body: unknown): string[] {
  return toRawSearchResult(body).hits.map((hit) => hit.id);
}

async function seed(transport: InMemorySearchTransport): Promise<void> {
  await transport.bulk(
    buildBulkBatch([
      {
        action: 'upsert',
        id: '1',
        index: 'catalog',
        type: 'part',
        document: { title: 'Blue widget', body: 'A small widget', status: 'active', rank: 2 },
      },
      {
        action: 'upsert',
        id: '2',
        index: 'catalog',
        type: 'part',
        document: { title: 'Gear', body: 'Widget gear widget', status: 'retired', rank: 1 },
      },
      {
        action: 'upsert',
        id: '3',
        index: 'catalog',
        type: 'part',
        document: { title: 'Red widget', body: 'Large', status: 'active', rank: 3 },
      },
      {
        action: 'upsert',
        id: '4',
        index: 'catalog',
        type: 'supplier',
        document: { title: 'Widget Works', status: 'active' },
      },
    ]),
  );
}

// ─── Tests ───────────────────────────────────────────────────────────

describe('InMemorySearchTransport', () => {
  let transport: InMemorySearchTransport;

  beforeEach(async () => {
    transport = new InMemorySearchTransport();
    await seed(transport);
  });

  it('matches query terms within the requested type only', async () => {
    const body = await transport.search({ index: 'catalog', type: 'part', body: buildQuery() });

    expect(hitIds(body).sort()).toEqual(['1', '2', '3']);
    expect(body).toMatchObject({ hits: { total: { value: 3, relation: 'eq' } } });
  });

  it('applies match_phrase filters', async () => {
    const body = await transport.search({
      index: 'catalog',
      type: 'part',
      body: buildQuery({
        query: {
          bool: {
            must: [{ query_string: { query: 'widget' } }, { match_phrase: { status: 'active' } }],
          },
        },
      }),
    });

    expect(hitIds(body).sort()).toEqual(['1', '3']);
  });

  it('breaks score ties with caller sorts', async () => {
    const body = await transport.search({
      index: 'catalog',
      type: 'part',
      body: buildQuery({
        query: { bool: { must: [{ query_string: { query: '*' } }] } },
        sort: ['_score', { rank: { order: 'desc' } }],
      }),
    });

    expect(hitIds(body)).toEqual(['3', '1', '2']);
  });

  it('raises scores of documents matching boosted fields', async () => {
    const body = await transport.search({
      index: 'catalog',
      type: 'part',
      body: buildQuery({
        query: {
          bool: {
            must: [{ query_string: { query: 'widget' } }],
            should: { multi_match: { query: 'widget', fields: ['title^5'] } },
          },
        },
        sort: ['_score', { rank: { order: 'asc' } }],
      }),
    });

    // 1 and 3 match in the title (1 + 5); 2 only in the body (1).
    expect(hitIds(body)).toEqual(['1', '3', '2']);
  });

  it('pages with from and size', async () => {
    const body = await transport.search({
      index: 'catalog',
      type: 'part',
      body: buildQuery({ sort: ['_score', { rank: { order: 'asc' } }], from: 1, size: 1 }),
    });

    expect(hitIds(body)).toEqual(['1']);
    expect(body).toMatchObject({ hits: { total: { value: 3 } } });
  });

  it('merges upserts into existing documents', async () => {
    const response = await transport.bulk(
      buildBulkBatch([
        { action: 'upsert', id: '1', index: 'catalog', type: 'part', document: { status: 'retired' } },
      ]),
    );

    expect(response).toEqual({
      took: 0,
      errors: false,
      items: [
        {
          update: { _index: 'catalog', _type: 'part', _id: '1', status: 200, result: 'updated' },
        },
      ],
    });
    expect(transport.getDocument('catalog', '1')).toEqual({
      title: 'Blue widget',
      body: 'A small widget',
      status: 'retired',
      rank: 2,
    });
  });

  it('reports deletes of missing documents as not found without errors', async () => {
    const response = await transport.bulk(
      buildBulkBatch([
        { action: 'delete', id: '1', index: 'catalog', type: 'part' },
        { action: 'delete', id: '99', index: 'catalog', type: 'part' },
      ]),
    );

    expect(response).toMatchObject({
      errors: false,
      items: [
        { delete: { _id: '1', status: 200, result: 'deleted' } },
        { delete: { _id: '99', status: 404, result: 'not_found' } },
      ],
    });
    expect(transport.getDocument('catalog', '1')).toBeUndefined();
  });

  it('flags an update without a document line', async () => {
    const response = await transport.bulk([{ update: { _id: '5', _index: 'catalog', _type: 'part' } }]);

    expect(response).toMatchObject({
      errors: true,
      items: [{ update: { _id: '5', status: 400 } }],
    });
  });

  it('rejects searches against a missing index', async () => {
    await expect(
      transport.search({ index: 'missing', type: 'part', body: buildQuery() }),
    ).rejects.toBeInstanceOf(BackendResponseError);
  });
});

/**
 * @sift/search — Result reconciliation
 *
 * Maps raw engine hits back to stored records. Ids are fetched from the
 * record store in a single batched call and re-emitted in hit order; hits
 * whose record no longer exists are dropped.
 */

import { z } from 'zod';
import { BackendResponseError } from './errors.js';
import type { RawSearchResult, ReconciledResult, RecordStore } from './types.js';

// ─── Raw response normalisation ──────────────────────────────────────

const hitSchema = z.object({
  _id: z.union([z.string(), z.number()]).transform(String),
  _score: z.number().nullable().optional(),
});

const searchResponseSchema = z.object({
  took: z.number().default(0),
  hits: z.object({
    total: z.union([
      z.number(),
      z.object({ value: z.number() }).transform((total) => total.value),
    ]),
    max_score: z.number().nullable().optional(),
    hits: z.array(hitSchema),
  }),
});

/**
 * Normalise a deserialized search response. `hits.total` may be a plain
 * number or `{ value, relation }` depending on backend version.
 */
export function toRawSearchResult(body: unknown): RawSearchResult {
  const parsed = searchResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new BackendResponseError(
      'Unrecognised search response',
      502,
      undefined,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    );
  }

  const { took, hits } = parsed.data;
  return {
    hits: hits.hits.map((hit) => ({ id: hit._id, score: hit._score ?? null })),
    total: hits.total,
    maxScore: hits.max_score ?? null,
    took,
  };
}

// ─── Mapper ──────────────────────────────────────────────────────────

export class ResultMapper {
  /** Ordered hit ids, without a persistence round trip. */
  mapIds(raw: RawSearchResult): string[] {
    return raw.hits.map((hit) => hit.id);
  }

  totalCount(raw: RawSearchResult): number {
    return raw.total;
  }

  async map<TRecord>(raw: RawSearchResult, store: RecordStore<TRecord>): Promise<TRecord[]> {
    if (raw.total === 0) {
      return [];
    }

    const ids = this.mapIds(raw);
    // A page past the last hit still reports the full total.
    if (ids.length === 0) {
      return [];
    }

    const records = await store.findByKeys(ids);
    const byKey = new Map(records.map((record) => [String(store.keyOf(record)), record]));

    return ids.flatMap((id) => {
      const record = byKey.get(id);
      return record === undefined ? [] : [record];
    });
  }

  async reconcile<TRecord>(
    raw: RawSearchResult,
    store: RecordStore<TRecord>,
  ): Promise<ReconciledResult<TRecord>> {
    return {
      records: await this.map(raw, store),
      total: this.totalCount(raw),
    };
  }
}

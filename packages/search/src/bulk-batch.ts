/**
 * @sift/search — Bulk batch assembly
 *
 * Folds an ordered list of upsert/delete operations into the backend's
 * paired-line bulk body. Each operation contributes an action line; upserts
 * are followed by their document line. Order is preserved because the bulk
 * endpoint applies operations on the same id in sequence.
 */

import { z } from 'zod';
import { BackendResponseError } from './errors.js';
import type { IndexResolver } from './index-resolver.js';
import type {
  BulkBatch,
  BulkItemFailure,
  BulkLine,
  BulkResult,
  BulkOperation,
  DeleteOperation,
  Searchable,
  UpsertOperation,
} from './types.js';

function linesFor(operation: BulkOperation): BulkLine[] {
  const metadata = { _id: operation.id, _index: operation.index, _type: operation.type };

  switch (operation.action) {
    case 'upsert':
      return [{ update: metadata }, { doc: operation.document, doc_as_upsert: true }];
    case 'delete':
      return [{ delete: metadata }];
  }
}

/** Build the full bulk body; nothing is sent until the caller passes it on. */
export function buildBulkBatch(operations: readonly BulkOperation[]): BulkBatch {
  return Object.freeze(operations.flatMap(linesFor));
}

export function upsertOperations(
  models: readonly Searchable[],
  resolver: IndexResolver,
): UpsertOperation[] {
  return models.map((model) => ({
    action: 'upsert',
    id: String(model.getKey()),
    index: resolver.resolve(model),
    type: model.searchableAs(),
    document: model.toSearchableArray(),
  }));
}

export function deleteOperations(
  models: readonly Searchable[],
  resolver: IndexResolver,
): DeleteOperation[] {
  return models.map((model) => ({
    action: 'delete',
    id: String(model.getKey()),
    index: resolver.resolve(model),
    type: model.searchableAs(),
  }));
}

// ─── Response ────────────────────────────────────────────────────────

const bulkItemSchema = z.object({
  _id: z.union([z.string(), z.number()]).transform(String).optional(),
  status: z.number(),
  error: z
    .object({
      type: z.string().optional(),
      reason: z.string().optional(),
    })
    .optional(),
});

const bulkResponseSchema = z.object({
  took: z.number().default(0),
  errors: z.boolean(),
  items: z.array(z.record(bulkItemSchema)),
});

/** Normalise a bulk response body, collecting the items the backend rejected. */
export function toBulkResult(body: unknown): BulkResult {
  const parsed = bulkResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new BackendResponseError(
      'Unrecognised bulk response',
      502,
      undefined,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    );
  }

  const failures: BulkItemFailure[] = parsed.data.items.flatMap((item) =>
    Object.entries(item).flatMap(([action, result]) =>
      result.error
        ? [
            {
              id: result._id ?? '',
              action,
              status: result.status,
              reason: result.error.reason ?? result.error.type ?? 'unknown error',
            },
          ]
        : [],
    ),
  );

  return { took: parsed.data.took, errors: parsed.data.errors, failures };
}

/**
 * @sift/search — In-memory transport
 *
 * An in-process stand-in for the search backend, used for local development
 * (no ELASTICSEARCH_URL) and in tests. It accepts the same wire shapes as the
 * real backend and answers with the same response shapes.
 *
 * Matching is deliberately simple: query_string matches any plain term,
 * match_phrase is a case-insensitive substring check, and boosted fields add
 * their weight per matching term. `min_score` is ignored because these
 * scores are not on the backend's scale.
 */

import { BackendResponseError } from '../errors.js';
import { MATCH_ALL_QUERY } from '../query-translator.js';
import type {
  BulkActionMetadata,
  BulkBatch,
  IndexMapping,
  MustClause,
  MultiMatchClause,
  NativeQuery,
  SortClause,
} from '../types.js';
import type {
  SearchTransport,
  TransportPutMappingParams,
  TransportSearchParams,
} from './transport.js';

/** Backend default page size when a search carries no `size`. */
const DEFAULT_SIZE = 10;

interface StoredDocument {
  type: string;
  source: Record<string, unknown>;
}

interface MemoryIndex {
  documents: Map<string, StoredDocument>;
  mappings: Map<string, IndexMapping>;
}

interface ScoredDocument {
  id: string;
  source: Record<string, unknown>;
  score: number;
}

interface BulkItemResult {
  _index: string;
  _type: string;
  _id: string;
  status: number;
  result?: 'created' | 'updated' | 'deleted' | 'not_found';
  error?: { type: string; reason: string };
}

// ─── Text helpers ────────────────────────────────────────────────────

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

function getNestedValue(source: unknown, path: string): unknown {
  let current = source;
  for (const part of path.split('.')) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, part);
  }
  return current;
}

function collectText(value: unknown, out: string[] = []): string[] {
  if (typeof value === 'string') {
    out.push(value);
  } else if (typeof value === 'number' || typeof value === 'boolean') {
    out.push(String(value));
  } else if (Array.isArray(value)) {
    value.forEach((item) => collectText(item, out));
  } else if (value !== null && typeof value === 'object') {
    Object.values(value).forEach((item) => collectText(item, out));
  }
  return out;
}

function countMatches(queryTokens: string[], text: string[]): number {
  const documentTokens = new Set(text.flatMap(tokenize));
  return queryTokens.filter((token) => documentTokens.has(token)).length;
}

function phraseMatches(fieldValue: unknown, phrase: string): boolean {
  if (Array.isArray(fieldValue)) {
    return fieldValue.some((item) => phraseMatches(item, phrase));
  }
  if (fieldValue === undefined || fieldValue === null || typeof fieldValue === 'object') {
    return false;
  }
  return String(fieldValue).toLowerCase().includes(phrase.toLowerCase());
}

// ─── Scoring ─────────────────────────────────────────────────────────

/** Score one mandatory clause, or null when the document does not match. */
function scoreMust(source: Record<string, unknown>, clause: MustClause): number | null {
  if ('query_string' in clause) {
    const { query } = clause.query_string;
    if (query.trim() === MATCH_ALL_QUERY) return 1;
    const matched = countMatches(tokenize(query), collectText(source));
    return matched > 0 ? matched : null;
  }

  for (const [field, value] of Object.entries(clause.match_phrase)) {
    if (!phraseMatches(getNestedValue(source, field), String(value))) return null;
  }
  return 0;
}

function scoreShould(source: Record<string, unknown>, clause: MultiMatchClause): number {
  const queryTokens = tokenize(clause.multi_match.query);
  return clause.multi_match.fields.reduce((total, boostedField) => {
    const [field, weight = '1'] = boostedField.split('^');
    const matched = countMatches(queryTokens, collectText(getNestedValue(source, field)));
    return total + matched * Number(weight);
  }, 0);
}

function scoreDocument(source: Record<string, unknown>, body: NativeQuery): number | null {
  let score = 0;
  for (const clause of body.query.bool.must) {
    const clauseScore = scoreMust(source, clause);
    if (clauseScore === null) return null;
    score += clauseScore;
  }
  if (body.query.bool.should) {
    score += scoreShould(source, body.query.bool.should);
  }
  return score;
}

// ─── Sorting ─────────────────────────────────────────────────────────

function compareValues(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === undefined || a === null) return 1;
  if (b === undefined || b === null) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a).localeCompare(String(b));
}

function compareBy(sort: SortClause[]) {
  return (a: ScoredDocument, b: ScoredDocument): number => {
    for (const clause of sort) {
      if (clause === '_score') {
        if (a.score !== b.score) return b.score - a.score;
        continue;
      }
      for (const [field, { order }] of Object.entries(clause)) {
        const cmp = compareValues(getNestedValue(a.source, field), getNestedValue(b.source, field));
        if (cmp !== 0) return order === 'desc' ? -cmp : cmp;
      }
    }
    return 0;
  };
}

// ─── Transport ───────────────────────────────────────────────────────

export class InMemorySearchTransport implements SearchTransport {
  private readonly indices = new Map<string, MemoryIndex>();

  async search({ index, type, body }: TransportSearchParams): Promise<unknown> {
    const memoryIndex = this.requireIndex(index);

    const matched: ScoredDocument[] = [];
    for (const [id, document] of memoryIndex.documents) {
      if (document.type !== type) continue;
      const score = scoreDocument(document.source, body);
      if (score !== null) matched.push({ id, source: document.source, score });
    }
    matched.sort(compareBy(body.sort));

    const from = body.from ?? 0;
    const page = matched.slice(from, from + (body.size ?? DEFAULT_SIZE));

    return {
      took: 0,
      timed_out: false,
      hits: {
        total: { value: matched.length, relation: 'eq' },
        max_score: matched.length > 0 ? Math.max(...matched.map((hit) => hit.score)) : null,
        hits: page.map((hit) => ({
          _index: index,
          _type: type,
          _id: hit.id,
          _score: hit.score,
          _source: hit.source,
        })),
      },
    };
  }

  async bulk(body: BulkBatch): Promise<unknown> {
    const items: Array<Record<string, BulkItemResult>> = [];

    for (let i = 0; i < body.length; i++) {
      const line = body[i];

      if ('update' in line) {
        const next = body[i + 1];
        if (next && 'doc' in next) {
          i++;
          items.push({ update: this.upsert(line.update, next.doc) });
        } else {
          items.push({
            update: {
              ...line.update,
              status: 400,
              error: {
                type: 'action_request_validation_exception',
                reason: 'update requires a document line',
              },
            },
          });
        }
      } else if ('delete' in line) {
        items.push({ delete: this.remove(line.delete) });
      } else {
        items.push({
          update: {
            _index: '',
            _type: '',
            _id: '',
            status: 400,
            error: { type: 'illegal_argument_exception', reason: 'document line without action' },
          },
        });
      }
    }

    return {
      took: 0,
      errors: items.some((item) => Object.values(item).some((result) => result.error)),
      items,
    };
  }

  async indexExists(index: string): Promise<boolean> {
    return this.indices.has(index);
  }

  async createIndex(index: string): Promise<void> {
    if (this.indices.has(index)) {
      throw new BackendResponseError(
        `index [${index}] already exists`,
        400,
        'resource_already_exists_exception',
        `index [${index}] already exists`,
      );
    }
    this.indices.set(index, { documents: new Map(), mappings: new Map() });
  }

  async deleteIndex(index: string): Promise<void> {
    this.requireIndex(index);
    this.indices.delete(index);
  }

  async putMapping({ index, type, body }: TransportPutMappingParams): Promise<void> {
    const memoryIndex = this.requireIndex(index);
    const mapping = body[type];
    if (!mapping) {
      throw new BackendResponseError(
        `mapping body has no entry for type [${type}]`,
        400,
        'mapper_parsing_exception',
        `mapping body has no entry for type [${type}]`,
      );
    }
    memoryIndex.mappings.set(type, { ...memoryIndex.mappings.get(type), ...mapping.properties });
  }

  /** Stored mapping for a type, if one was put. */
  getMapping(index: string, type: string): IndexMapping | undefined {
    return this.indices.get(index)?.mappings.get(type);
  }

  /** Stored source for a document, if present. */
  getDocument(index: string, id: string): Record<string, unknown> | undefined {
    return this.indices.get(index)?.documents.get(id)?.source;
  }

  private upsert(metadata: BulkActionMetadata, doc: Record<string, unknown>): BulkItemResult {
    const memoryIndex = this.ensureIndex(metadata._index);
    const existing = memoryIndex.documents.get(metadata._id);
    memoryIndex.documents.set(metadata._id, {
      type: metadata._type,
      source: { ...existing?.source, ...doc },
    });
    return existing
      ? { ...metadata, status: 200, result: 'updated' }
      : { ...metadata, status: 201, result: 'created' };
  }

  private remove(metadata: BulkActionMetadata): BulkItemResult {
    const documents = this.indices.get(metadata._index)?.documents;
    if (!documents?.delete(metadata._id)) {
      return { ...metadata, status: 404, result: 'not_found' };
    }
    return { ...metadata, status: 200, result: 'deleted' };
  }

  /** Bulk writes create missing indices, as the backend does. */
  private ensureIndex(index: string): MemoryIndex {
    let memoryIndex = this.indices.get(index);
    if (!memoryIndex) {
      memoryIndex = { documents: new Map(), mappings: new Map() };
      this.indices.set(index, memoryIndex);
    }
    return memoryIndex;
  }

  private requireIndex(index: string): MemoryIndex {
    const memoryIndex = this.indices.get(index);
    if (!memoryIndex) {
      throw new BackendResponseError(
        `no such index [${index}]`,
        404,
        'index_not_found_exception',
        `no such index [${index}]`,
      );
    }
    return memoryIndex;
  }
}

/**
 * @sift/search — Index administration
 *
 * Thin wrappers over the backend's index endpoints. Each operation is a
 * single call; a backend rejection surfaces as IndexAdminError carrying the
 * backend's reason, while connection failures pass through untouched.
 */

import { createLogger } from '@sift/config';
import { BackendResponseError, IndexAdminError, InvalidRequestError } from './errors.js';
import type { IndexAdminOperation } from './errors.js';
import type { SearchTransport } from './transports/transport.js';
import type { IndexMapping } from './types.js';

const log = createLogger('index-manager');

function requireName(kind: string, value: string): void {
  if (value.trim() === '') {
    throw new InvalidRequestError(`${kind} name must not be empty`);
  }
}

export class IndexManager {
  constructor(private readonly transport: SearchTransport) {}

  async exists(index: string): Promise<boolean> {
    requireName('Index', index);
    return this.run('exists', index, () => this.transport.indexExists(index));
  }

  async create(index: string): Promise<void> {
    requireName('Index', index);
    await this.run('create', index, () => this.transport.createIndex(index));
    log.info({ index }, 'Index created');
  }

  async delete(index: string): Promise<void> {
    requireName('Index', index);
    await this.run('delete', index, () => this.transport.deleteIndex(index));
    log.info({ index }, 'Index deleted');
  }

  /** Replace the field mapping of `type` within `index`. */
  async putMapping(index: string, type: string, mapping: IndexMapping): Promise<void> {
    requireName('Index', index);
    requireName('Type', type);
    await this.run('putMapping', index, () =>
      this.transport.putMapping({ index, type, body: { [type]: { properties: mapping } } }),
    );
    log.info({ index, type, fields: Object.keys(mapping).length }, 'Mapping updated');
  }

  private async run<T>(
    operation: IndexAdminOperation,
    index: string,
    call: () => Promise<T>,
  ): Promise<T> {
    try {
      return await call();
    } catch (err) {
      if (err instanceof BackendResponseError) {
        throw new IndexAdminError(operation, index, err.reason, { cause: err });
      }
      throw err;
    }
  }
}

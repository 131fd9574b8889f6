/**
 * @sift/search — Index resolution
 *
 * Decides which physical index a document type lives in. Either every type
 * shares one globally configured index, or each type gets its own index
 * named after `searchableAs()`.
 */

import type { Config } from '@sift/config';
import type { SearchableType } from './types.js';

export type IndexStrategy =
  | { readonly kind: 'global'; readonly index: string }
  | { readonly kind: 'per-type' };

export function globalIndex(index: string): IndexStrategy {
  return Object.freeze({ kind: 'global', index });
}

export const perTypeIndex: IndexStrategy = Object.freeze({ kind: 'per-type' });

export function indexStrategyFromConfig(
  cfg: Pick<Config, 'SEARCH_INDEX' | 'SEARCH_PER_TYPE_INDEX'>,
): IndexStrategy {
  return cfg.SEARCH_PER_TYPE_INDEX ? perTypeIndex : globalIndex(cfg.SEARCH_INDEX);
}

export class IndexResolver {
  constructor(private readonly strategy: IndexStrategy) {}

  resolve(type: SearchableType): string {
    switch (this.strategy.kind) {
      case 'global':
        return this.strategy.index;
      case 'per-type':
        return type.searchableAs();
    }
  }
}

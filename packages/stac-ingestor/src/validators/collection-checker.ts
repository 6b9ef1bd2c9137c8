/**
 * Collection Existence Checker
 *
 * Confirms an item's parent collection is registered in the catalog store.
 * Reads go through the store's read path, never the batch write path.
 *
 * CACHING:
 * - Positive lookups are cached per collection id for `cacheTtlMs`
 * - Negative lookups are never cached, so a collection published moments
 *   ago is seen by the next record
 * - Concurrent lookups of one id share a single store read
 */

import type { CatalogStore, PartialVerdict, StacItem } from '../core/types.js';

export interface CollectionCheckerOptions {
  /** TTL for positive lookups in milliseconds (0 disables caching) */
  readonly cacheTtlMs: number;
  /** Clock override for tests */
  readonly now?: () => number;
}

export class CollectionExistenceChecker {
  private readonly knownUntil = new Map<string, number>();
  private readonly inFlight = new Map<string, Promise<boolean>>();
  private readonly now: () => number;

  constructor(
    private readonly store: Pick<CatalogStore, 'collectionExists'>,
    private readonly options: CollectionCheckerOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * @throws Whatever the store throws for a failed lookup
   */
  async checkCollection(item: StacItem): Promise<PartialVerdict> {
    const collectionId = item.collection;

    if (await this.exists(collectionId)) {
      return { check: 'collection', reasons: [] };
    }

    return {
      check: 'collection',
      reasons: [
        {
          category: 'collection_missing',
          code: 'not_found',
          collectionId,
          message: `Collection '${collectionId}' does not exist in the catalog`,
        },
      ],
    };
  }

  /**
   * Drop cached knowledge of a collection (e.g. after it was deleted)
   */
  invalidate(collectionId?: string): void {
    if (collectionId === undefined) {
      this.knownUntil.clear();
    } else {
      this.knownUntil.delete(collectionId);
    }
  }

  private async exists(collectionId: string): Promise<boolean> {
    const expiresAt = this.knownUntil.get(collectionId);
    if (expiresAt !== undefined) {
      if (expiresAt > this.now()) {
        return true;
      }
      this.knownUntil.delete(collectionId);
    }

    const pending = this.inFlight.get(collectionId);
    if (pending) {
      return pending;
    }

    const lookup = this.store
      .collectionExists(collectionId)
      .then((exists) => {
        if (exists && this.options.cacheTtlMs > 0) {
          this.knownUntil.set(collectionId, this.now() + this.options.cacheTtlMs);
        }
        return exists;
      })
      .finally(() => {
        this.inFlight.delete(collectionId);
      });

    this.inFlight.set(collectionId, lookup);
    return lookup;
  }
}

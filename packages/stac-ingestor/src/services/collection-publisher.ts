/**
 * Collection Publisher
 *
 * Registers STAC collections in the catalog so items can reference them.
 * Collection documents are validated before they reach the store.
 */

import { CollectionInUseError, CollectionValidationError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import { issueToReason } from '../validators/spec-validator.js';
import { StacCollectionSchema, type StacCollection } from '../validators/stac-schema.js';

const log = createLogger({ module: 'collection-publisher' });

export interface CollectionSummary {
  readonly id: string;
  readonly title?: string;
  readonly itemCount: number;
  /** ISO 8601 */
  readonly updatedAt: string;
}

/**
 * Collection management surface of a catalog store
 */
export interface CollectionRegistry {
  upsertCollection(collection: StacCollection): Promise<'created' | 'updated'>;
  /** Removes the collection and, through the store's cascade, its items */
  deleteCollection(collectionId: string): Promise<boolean>;
  countItems(collectionId: string): Promise<number>;
  listCollections(): Promise<CollectionSummary[]>;
}

export interface PublishResult {
  readonly collectionId: string;
  readonly action: 'created' | 'updated';
}

export interface DeleteCollectionOptions {
  /** Delete even when items still belong to the collection */
  readonly force?: boolean;
}

export class CollectionPublisher {
  /**
   * @param onChange - Called with the collection id after every publish or
   *   delete (e.g. to invalidate an existence cache)
   */
  constructor(
    private readonly registry: CollectionRegistry,
    private readonly onChange?: (collectionId: string) => void
  ) {}

  /**
   * Parse a collection document without touching the store
   *
   * @throws {CollectionValidationError} When the document is not a valid STAC collection
   */
  parse(document: unknown): StacCollection {
    const result = StacCollectionSchema.safeParse(document);
    if (!result.success) {
      throw new CollectionValidationError(
        result.error.errors.map((issue) => issueToReason(issue).message)
      );
    }
    return result.data;
  }

  /**
   * Validate and upsert a collection
   *
   * @throws {CollectionValidationError} When the document is not a valid STAC collection
   */
  async publish(document: unknown): Promise<PublishResult> {
    const collection = this.parse(document);
    const action = await this.registry.upsertCollection(collection);

    log.info('Collection published', { collectionId: collection.id, action });
    this.onChange?.(collection.id);

    return { collectionId: collection.id, action };
  }

  /**
   * Delete a collection
   *
   * @returns false when no such collection exists
   * @throws {CollectionInUseError} When items still reference it and force is not set
   */
  async delete(collectionId: string, options: DeleteCollectionOptions = {}): Promise<boolean> {
    const itemCount = await this.registry.countItems(collectionId);
    if (itemCount > 0 && !options.force) {
      throw new CollectionInUseError(collectionId, itemCount);
    }

    const deleted = await this.registry.deleteCollection(collectionId);
    if (deleted) {
      log.info('Collection deleted', { collectionId, itemsRemoved: itemCount });
      this.onChange?.(collectionId);
    }
    return deleted;
  }

  async list(): Promise<CollectionSummary[]> {
    return this.registry.listCollections();
  }
}

/**
 * Record Validation Pipeline
 *
 * ORDER:
 * 1. SpecValidator (synchronous, no I/O). On failure the I/O checks are
 *    skipped entirely so malformed records never cost probe traffic.
 * 2. CollectionExistenceChecker and AssetAccessibilityChecker, concurrently.
 *
 * Reasons merge as spec, then collection, then asset.
 */

import { isNonEmpty } from '../core/reasons.js';
import type { StacItem, ValidationReason, ValidationVerdict } from '../core/types.js';
import type { AssetAccessibilityChecker } from './asset-checker.js';
import type { CollectionExistenceChecker } from './collection-checker.js';
import type { SpecValidator } from './spec-validator.js';

export class RecordValidationPipeline {
  constructor(
    private readonly specValidator: SpecValidator,
    private readonly collectionChecker: Pick<CollectionExistenceChecker, 'checkCollection'>,
    private readonly assetChecker: Pick<AssetAccessibilityChecker, 'checkAssets'>
  ) {}

  /**
   * Run every check for one payload
   *
   * @throws When the collection lookup itself fails (store read error)
   */
  async process(payload: unknown): Promise<ValidationVerdict> {
    const spec = this.specValidator.validate(payload);
    if (isNonEmpty(spec.reasons)) {
      return { status: 'invalid', reasons: spec.reasons };
    }
    if (!spec.item) {
      return {
        status: 'invalid',
        reasons: [
          { category: 'spec_violation', code: 'invalid_value', message: 'Record could not be parsed' },
        ],
      };
    }

    return this.processItem(spec.item);
  }

  private async processItem(item: StacItem): Promise<ValidationVerdict> {
    const [collection, assets] = await Promise.all([
      this.collectionChecker.checkCollection(item),
      this.assetChecker.checkAssets(item),
    ]);

    const reasons: ValidationReason[] = [...collection.reasons, ...assets.reasons];
    if (isNonEmpty(reasons)) {
      return { status: 'invalid', reasons };
    }

    return { status: 'valid', item };
  }
}

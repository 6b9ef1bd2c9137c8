/**
 * Asset Accessibility Checker
 *
 * Probes every asset of an item concurrently, each under its own timeout.
 * One unreachable asset never aborts its siblings; the checker waits for all
 * probes and reports each failure as a separate reason, in the item's asset
 * key order regardless of which probe finished first.
 */

import type {
  AssetProbe,
  AssetReference,
  PartialVerdict,
  ProbeResult,
  StacItem,
  ValidationReason,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'asset-checker' });

export interface AssetCheckerOptions {
  /** Per-asset probe timeout in milliseconds */
  readonly probeTimeoutMs: number;
}

/**
 * Flatten an item's asset mapping into references, preserving key order
 */
export function assetReferences(item: StacItem): AssetReference[] {
  return Object.entries(item.assets).map(([key, asset]) => ({
    key,
    href: asset.href,
    roles: asset.roles ?? [],
  }));
}

export class AssetAccessibilityChecker {
  constructor(
    private readonly probe: AssetProbe,
    private readonly options: AssetCheckerOptions
  ) {}

  async checkAssets(item: StacItem): Promise<PartialVerdict> {
    const references = assetReferences(item);
    const results = await Promise.all(references.map((ref) => this.probeWithTimeout(ref)));

    const reasons: ValidationReason[] = [];
    results.forEach((result, index) => {
      const reason = toReason(references[index], result);
      if (reason) {
        reasons.push(reason);
      }
    });

    if (reasons.length > 0) {
      log.debug('Asset check failed', {
        itemId: item.id,
        failed: reasons.length,
        total: references.length,
      });
    }

    return { check: 'assets', reasons };
  }

  /**
   * Run one probe, converting a timeout or a thrown error into a result
   */
  private probeWithTimeout(ref: AssetReference): Promise<ProbeResult> {
    const { probeTimeoutMs } = this.options;
    const controller = new AbortController();

    return new Promise<ProbeResult>((resolve) => {
      const timer = setTimeout(() => {
        controller.abort();
        resolve({ status: 'timed_out' });
      }, probeTimeoutMs);

      Promise.resolve()
        .then(() => this.probe.probe(ref.href, { timeoutMs: probeTimeoutMs, signal: controller.signal }))
        .then(
          (result) => {
            clearTimeout(timer);
            resolve(result);
          },
          (error: unknown) => {
            clearTimeout(timer);
            resolve({
              status: 'unreachable',
              detail: error instanceof Error ? error.message : String(error),
            });
          }
        );
    });
  }
}

function toReason(ref: AssetReference, result: ProbeResult): ValidationReason | null {
  const base = { category: 'asset_unreachable', assetKey: ref.key, href: ref.href } as const;

  switch (result.status) {
    case 'reachable':
      return null;
    case 'unreachable':
      return {
        ...base,
        code: 'unreachable',
        message: `Asset '${ref.key}' is unreachable: ${result.detail}`,
      };
    case 'access_denied':
      return {
        ...base,
        code: 'access_denied',
        message: `Access to asset '${ref.key}' was denied: ${result.detail}`,
      };
    case 'timed_out':
      return {
        ...base,
        code: 'timed_out',
        message: `Probe for asset '${ref.key}' timed out`,
      };
  }
}

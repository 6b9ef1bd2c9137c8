/**
 * STAC Ingestor Core Types
 *
 * Records, verdicts, batches and outcomes shared by the validation pipeline,
 * the batch accumulator, the catalog writer and the coordinator.
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import type { BBox, Geometry } from 'geojson';

// ============================================================================
// STAC Item
// ============================================================================

/**
 * A link within a STAC item or collection
 */
export interface StacLink {
  readonly href: string;
  readonly rel: string;
  readonly type?: string;
  readonly title?: string;
}

/**
 * An asset within a STAC item
 */
export interface StacAsset {
  readonly href: string;
  readonly title?: string;
  readonly description?: string;
  readonly type?: string;
  readonly roles?: readonly string[];
}

/**
 * A STAC item that passed spec validation
 *
 * `collection` is required here even though STAC makes it optional:
 * every ingested record must declare its parent collection.
 */
export interface StacItem {
  readonly type: 'Feature';
  readonly stac_version: string;
  readonly stac_extensions?: readonly string[];
  readonly id: string;
  readonly collection: string;
  readonly geometry: Geometry | null;
  readonly bbox?: BBox;
  readonly properties: Readonly<Record<string, unknown>>;
  readonly links: readonly StacLink[];
  readonly assets: Readonly<Record<string, StacAsset>>;
}

/**
 * Asset reference flattened out of an item's `assets` mapping
 */
export interface AssetReference {
  readonly key: string;
  readonly href: string;
  readonly roles: readonly string[];
}

/**
 * Untrusted submission: caller-assigned id plus the raw item payload
 */
export interface CatalogRecord {
  readonly submissionId: string;
  readonly payload: unknown;
}

// ============================================================================
// Reasons & Verdicts
// ============================================================================

/**
 * Error taxonomy
 *
 * - spec_violation: field, type or geometry errors (submitter fixes the record)
 * - asset_unreachable: asset missing, denied or slow (fix location or retry later)
 * - collection_missing: parent collection not registered (create it first)
 * - store_rejected: record-level store refusal, e.g. duplicate id
 * - store_unavailable: transient system-level failure
 * - cancelled: an operator cancelled the submission before it was batched
 */
export type ReasonCategory =
  | 'spec_violation'
  | 'asset_unreachable'
  | 'collection_missing'
  | 'store_rejected'
  | 'store_unavailable'
  | 'cancelled';

/**
 * One structured failure entry
 */
export interface ValidationReason {
  readonly category: ReasonCategory;
  /** Machine-readable code within the category (e.g. 'required', 'timed_out') */
  readonly code: string;
  readonly message: string;
  /** Dotted field path for spec violations */
  readonly path?: string;
  readonly assetKey?: string;
  readonly href?: string;
  readonly collectionId?: string;
}

/**
 * Reason list that is guaranteed to carry at least one entry
 */
export type NonEmptyReasons = readonly [ValidationReason, ...ValidationReason[]];

/**
 * Checker that produced a partial verdict
 */
export type CheckName = 'spec' | 'collection' | 'assets';

/**
 * Result of a single checker (empty reasons = passed)
 */
export interface PartialVerdict {
  readonly check: CheckName;
  readonly reasons: readonly ValidationReason[];
}

/**
 * Spec check result; carries the typed item when the payload passed
 */
export interface SpecVerdict extends PartialVerdict {
  readonly check: 'spec';
  readonly item: StacItem | null;
}

export type ValidationVerdict =
  | { readonly status: 'valid'; readonly item: StacItem }
  | { readonly status: 'invalid'; readonly reasons: NonEmptyReasons };

// ============================================================================
// Batches & Outcomes
// ============================================================================

/**
 * A validated record waiting for commit
 */
export interface BatchEntry {
  readonly submissionId: string;
  readonly item: StacItem;
}

export type SealTrigger = 'size' | 'timeout' | 'manual';

/**
 * Sealed batch. Frozen once sealed.
 */
export interface Batch {
  readonly id: string;
  /** Epoch ms when the first record was added */
  readonly createdAt: number;
  readonly sealedAt: number;
  readonly trigger: SealTrigger;
  readonly entries: readonly BatchEntry[];
}

export type CommitOutcome =
  | {
      readonly status: 'committed';
      readonly submissionId: string;
      readonly itemId: string;
    }
  | {
      readonly status: 'rejected';
      readonly submissionId: string;
      readonly itemId?: string;
      readonly reasons: NonEmptyReasons;
    }
  | {
      readonly status: 'deferred';
      readonly submissionId: string;
      readonly itemId?: string;
      readonly reasons: NonEmptyReasons;
    };

export type CommitStatus = CommitOutcome['status'];

/**
 * Per-submission lifecycle state
 */
export type SubmissionState =
  | 'received'
  | 'validating'
  | 'accumulating'
  | 'batched'
  | 'committing'
  | 'committed'
  | 'rejected'
  | 'deferred'
  | 'cancelled';

// ============================================================================
// External Interfaces
// ============================================================================

/**
 * Per-record result of a store bulk write
 */
export type StoreWriteResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly code: string; readonly message: string };

/**
 * Catalog store surface consumed by the pipeline
 *
 * Implementations throw StoreUnavailableError for transient failures.
 */
export interface CatalogStore {
  collectionExists(collectionId: string): Promise<boolean>;
  bulkWrite(items: readonly StacItem[]): Promise<readonly StoreWriteResult[]>;
}

export type ProbeResult =
  | { readonly status: 'reachable' }
  | { readonly status: 'unreachable'; readonly detail: string }
  | { readonly status: 'access_denied'; readonly detail: string }
  | { readonly status: 'timed_out' };

export interface ProbeOptions {
  readonly timeoutMs: number;
  readonly signal: AbortSignal;
}

/**
 * Lightweight existence check against an asset's storage location
 */
export interface AssetProbe {
  probe(href: string, options: ProbeOptions): Promise<ProbeResult>;
}

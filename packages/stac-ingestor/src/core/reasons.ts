/**
 * Reason and outcome constructors
 */

import type {
  CommitOutcome,
  NonEmptyReasons,
  ValidationReason,
} from './types.js';

export function isNonEmpty(
  reasons: readonly ValidationReason[]
): reasons is NonEmptyReasons {
  return reasons.length > 0;
}

/**
 * Narrow a reason list, substituting a fallback when it came back empty
 */
export function ensureReasons(
  reasons: readonly ValidationReason[],
  fallback: ValidationReason
): NonEmptyReasons {
  return isNonEmpty(reasons) ? reasons : [fallback];
}

export function committed(submissionId: string, itemId: string): CommitOutcome {
  return { status: 'committed', submissionId, itemId };
}

export function rejected(
  submissionId: string,
  reasons: NonEmptyReasons,
  itemId?: string
): CommitOutcome {
  return itemId === undefined
    ? { status: 'rejected', submissionId, reasons }
    : { status: 'rejected', submissionId, itemId, reasons };
}

export function deferred(
  submissionId: string,
  reasons: NonEmptyReasons,
  itemId?: string
): CommitOutcome {
  return itemId === undefined
    ? { status: 'deferred', submissionId, reasons }
    : { status: 'deferred', submissionId, itemId, reasons };
}

export function storeUnavailableReason(code: string, message: string): ValidationReason {
  return { category: 'store_unavailable', code, message };
}

export function cancelledReason(submissionId: string): ValidationReason {
  return {
    category: 'cancelled',
    code: 'operator_cancelled',
    message: `Submission ${submissionId} was cancelled before it was batched`,
  };
}

/**
 * One-line rendering for logs and CLI output
 */
export function formatReason(reason: ValidationReason): string {
  const location = reason.path ?? reason.assetKey ?? reason.collectionId;
  return location
    ? `[${reason.category}/${reason.code}] ${location}: ${reason.message}`
    : `[${reason.category}/${reason.code}] ${reason.message}`;
}

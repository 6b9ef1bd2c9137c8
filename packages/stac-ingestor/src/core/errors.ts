/**
 * STAC Ingestor Error Types
 *
 * Exceptions raised across component seams. Record-level problems are not
 * exceptions: they travel as ValidationReason entries inside verdicts and
 * outcomes. These classes cover store failures, lifecycle misuse and bad
 * configuration.
 */

import type { SubmissionState } from './types.js';

/**
 * Transient catalog store failure (unavailable, throttled, locked)
 *
 * RECOVERY:
 * - CatalogWriter retries the whole batch with exponential backoff
 * - After exhaustion every record is deferred and the batch dead-lettered
 */
export class StoreUnavailableError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'StoreUnavailableError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StoreUnavailableError);
    }
  }
}

/**
 * Store answered a bulk write with a result count that does not match the batch
 */
export class StoreProtocolError extends Error {
  constructor(
    public readonly expected: number,
    public readonly received: number
  ) {
    super(`Store returned ${received} write results for a batch of ${expected}`);
    this.name = 'StoreProtocolError';
  }
}

/**
 * Submission arrived after the coordinator was closed
 */
export class CoordinatorClosedError extends Error {
  constructor() {
    super('Ingestion coordinator is closed');
    this.name = 'CoordinatorClosedError';
  }
}

/**
 * Submission id is already in flight (validating, accumulating or committing)
 */
export class DuplicateSubmissionError extends Error {
  constructor(public readonly submissionId: string) {
    super(`Submission ${submissionId} is already in flight`);
    this.name = 'DuplicateSubmissionError';
  }
}

/**
 * Lifecycle operation not allowed from the submission's current state
 */
export class IngestionStateError extends Error {
  constructor(
    public readonly submissionId: string,
    public readonly state: SubmissionState,
    operation: string
  ) {
    super(`Cannot ${operation} submission ${submissionId} in state '${state}'`);
    this.name = 'IngestionStateError';
  }
}

/**
 * Configuration failed validation
 */
export class ConfigValidationError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * STAC collection document failed validation
 */
export class CollectionValidationError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid collection: ${issues.join('; ')}`);
    this.name = 'CollectionValidationError';
  }
}

/**
 * Collection still has items and deletion was not forced
 */
export class CollectionInUseError extends Error {
  constructor(
    public readonly collectionId: string,
    public readonly itemCount: number
  ) {
    super(`Collection ${collectionId} still has ${itemCount} items`);
    this.name = 'CollectionInUseError';
  }
}

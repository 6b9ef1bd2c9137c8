/**
 * Ingestion Status Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { IngestionStateError } from '../../../core/errors.js';
import type { ValidationReason } from '../../../core/types.js';
import { IngestionStatusStore } from '../../../persistence/ingestion-status-store.js';

const T0 = 1_700_000_000_000;

describe('IngestionStatusStore', () => {
  let store: IngestionStatusStore;

  beforeEach(() => {
    store = new IngestionStatusStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  describe('record', () => {
    it('should keep the creation time and move the update time', () => {
      store.record({ submissionId: 's1', state: 'received', at: T0 });
      store.record({ submissionId: 's1', state: 'validating', at: T0 + 1_000 });

      expect(store.get('s1')).toEqual({
        submissionId: 's1',
        state: 'validating',
        itemId: undefined,
        collectionId: undefined,
        batchId: undefined,
        reasons: [],
        createdAt: '2023-11-14T22:13:20.000Z',
        updatedAt: '2023-11-14T22:13:21.000Z',
      });
    });

    it('should keep identifiers learned by earlier transitions', () => {
      store.record({ submissionId: 's1', state: 'accumulating', at: T0, itemId: 'scene-1', collectionId: 'c1' });
      store.record({ submissionId: 's1', state: 'batched', at: T0, batchId: 'batch_1' });

      expect(store.get('s1')).toMatchObject({ itemId: 'scene-1', collectionId: 'c1', batchId: 'batch_1' });
    });

    it('should store the reasons of a terminal state', () => {
      const reasons: ValidationReason[] = [
        { category: 'asset_unreachable', code: 'timed_out', assetKey: 'visual', message: 'timed out' },
      ];
      store.record({ submissionId: 's1', state: 'rejected', at: T0, reasons });

      expect(store.get('s1')?.reasons).toEqual(reasons);
    });

    it('should return null for an unknown submission', () => {
      expect(store.get('nope')).toBeNull();
    });
  });

  describe('list', () => {
    beforeEach(() => {
      for (const n of [1, 2, 3, 4, 5]) {
        store.record({ submissionId: `s${n}`, state: n === 3 ? 'rejected' : 'committed', at: T0 });
      }
    });

    it('should page with a cursor', () => {
      const first = store.list({ limit: 2 });
      expect(first.records.map((r) => r.submissionId)).toEqual(['s1', 's2']);
      expect(first.nextCursor).toBe('s2');

      const second = store.list({ limit: 2, cursor: first.nextCursor });
      expect(second.records.map((r) => r.submissionId)).toEqual(['s3', 's4']);
      expect(second.nextCursor).toBe('s4');

      const last = store.list({ limit: 2, cursor: second.nextCursor });
      expect(last.records.map((r) => r.submissionId)).toEqual(['s5']);
      expect(last.nextCursor).toBeUndefined();
    });

    it('should filter by state', () => {
      expect(store.list({ status: 'rejected' }).records.map((r) => r.submissionId)).toEqual(['s3']);
    });

    it('should count by state', () => {
      expect(store.countByState()).toEqual({ committed: 4, rejected: 1 });
    });
  });

  describe('cancel', () => {
    it('should cancel a submission that has not been validated', () => {
      store.record({ submissionId: 's1', state: 'received', at: T0 });

      expect(store.cancel('s1')?.state).toBe('cancelled');
    });

    it('should ignore transitions after cancellation', () => {
      store.record({ submissionId: 's1', state: 'validating', at: T0 });
      store.cancel('s1');

      store.record({ submissionId: 's1', state: 'accumulating', at: T0 + 1 });

      expect(store.get('s1')?.state).toBe('cancelled');
    });

    it('should refuse to cancel a settled submission', () => {
      store.record({ submissionId: 's1', state: 'committed', at: T0 });

      expect(() => store.cancel('s1')).toThrow(IngestionStateError);
      expect(() => store.cancel('s1')).toThrow("Cannot cancel submission s1 in state 'committed'");
      expect(store.get('s1')?.state).toBe('committed');
    });

    it('should return null for an unknown submission', () => {
      expect(store.cancel('nope')).toBeNull();
    });

    it('should report cancellation to the coordinator', () => {
      store.record({ submissionId: 's1', state: 'validating', at: T0 });
      store.record({ submissionId: 's2', state: 'validating', at: T0 });
      store.cancel('s1');

      expect(store.isCancelled('s1')).toBe(true);
      expect(store.isCancelled('s2')).toBe(false);
      expect(store.isCancelled('nope')).toBe(false);
    });

    it('should store the reason of a cancelled outcome', () => {
      store.record({ submissionId: 's1', state: 'validating', at: T0 });
      store.cancel('s1');
      const reason: ValidationReason = {
        category: 'cancelled',
        code: 'operator_cancelled',
        message: 'Submission s1 was cancelled before it was batched',
      };

      store.record({ submissionId: 's1', state: 'cancelled', at: T0 + 1, reasons: [reason] });

      expect(store.get('s1')).toMatchObject({ state: 'cancelled', reasons: [reason] });
    });
  });

  describe('update', () => {
    it('should attach and clear an operator note', () => {
      store.record({ submissionId: 's1', state: 'deferred', at: T0 });

      expect(store.update('s1', { note: 'store back online; replay queued' })).toMatchObject({
        state: 'deferred',
        note: 'store back online; replay queued',
      });
      expect(store.update('s1', { note: null })?.note).toBeUndefined();
    });

    it('should keep the note through later transitions', () => {
      store.record({ submissionId: 's1', state: 'validating', at: T0 });
      store.update('s1', { note: 'priority' });

      store.record({ submissionId: 's1', state: 'accumulating', at: T0 + 1 });

      expect(store.get('s1')?.note).toBe('priority');
    });

    it('should return null for an unknown submission', () => {
      expect(store.update('nope', { note: 'x' })).toBeNull();
    });
  });

  describe('id reuse', () => {
    it('should restart a settled submission on a fresh received transition', () => {
      store.record({ submissionId: 's1', state: 'validating', at: T0 });
      store.cancel('s1');
      store.update('s1', { note: 'cancelled by operator' });

      store.record({ submissionId: 's1', state: 'received', at: T0 + 5_000 });
      store.record({ submissionId: 's1', state: 'validating', at: T0 + 6_000 });

      expect(store.get('s1')).toMatchObject({
        state: 'validating',
        reasons: [],
        createdAt: '2023-11-14T22:13:25.000Z',
      });
      expect(store.get('s1')?.note).toBeUndefined();
    });
  });
});

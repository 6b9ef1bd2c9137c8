/**
 * Schemas for JSON columns read back from the state database
 */

import { z } from 'zod';
import type { NonEmptyReasons, SubmissionState, ValidationReason } from '../core/types.js';

export const ReasonSchema = z.object({
  category: z.enum([
    'spec_violation',
    'asset_unreachable',
    'collection_missing',
    'store_rejected',
    'store_unavailable',
    'cancelled',
  ]),
  code: z.string(),
  message: z.string(),
  path: z.string().optional(),
  assetKey: z.string().optional(),
  href: z.string().optional(),
  collectionId: z.string().optional(),
});

export const NonEmptyReasonsSchema = z.tuple([ReasonSchema]).rest(ReasonSchema);

export const SubmissionStateSchema = z.enum([
  'received',
  'validating',
  'accumulating',
  'batched',
  'committing',
  'committed',
  'rejected',
  'deferred',
  'cancelled',
]) satisfies z.ZodType<SubmissionState>;

export function parseReasons(json: string): readonly ValidationReason[] {
  return z.array(ReasonSchema).parse(JSON.parse(json));
}

export function parseNonEmptyReasons(json: string): NonEmptyReasons {
  return NonEmptyReasonsSchema.parse(JSON.parse(json));
}

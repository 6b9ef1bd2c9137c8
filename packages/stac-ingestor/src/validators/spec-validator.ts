/**
 * Spec Validator
 *
 * Checks a raw payload against the STAC item specification: required fields,
 * declared property types, geometry well-formedness and cross-field rules.
 *
 * Pure and synchronous. Fails closed, and every violation is reported in one
 * pass so submitters see all spec errors at once.
 */

import type { z } from 'zod';
import type { SpecVerdict, StacItem, ValidationReason } from '../core/types.js';
import { isRecord } from './geometry.js';
import { StacItemSchema } from './stac-schema.js';

/**
 * Convert a zod issue into a structured spec reason
 */
export function issueToReason(issue: z.ZodIssue): ValidationReason {
  const path = issue.path.length > 0 ? issue.path.join('.') : undefined;

  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return {
      category: 'spec_violation',
      code: 'required',
      message: `${path ?? 'value'} is required`,
      ...(path !== undefined && { path }),
    };
  }

  let code: string = issue.code;
  if (issue.code === 'custom') {
    const custom: unknown = issue.params?.code;
    code = typeof custom === 'string' ? custom : 'invalid_value';
  }

  return {
    category: 'spec_violation',
    code,
    message: path !== undefined ? `${path}: ${issue.message}` : issue.message,
    ...(path !== undefined && { path }),
  };
}

function specReason(path: string, code: string, message: string): ValidationReason {
  return { category: 'spec_violation', code, path, message };
}

/**
 * Rules spanning several fields, evaluated on the raw payload so they still
 * report when unrelated fields failed
 */
function checkCrossFieldRules(payload: Record<string, unknown>): ValidationReason[] {
  const reasons: ValidationReason[] = [];

  const geometry = payload.geometry;
  if (geometry !== undefined && geometry !== null && payload.bbox === undefined) {
    reasons.push(specReason('bbox', 'required', 'bbox is required when geometry is not null'));
  }

  const properties = payload.properties;
  if (!isRecord(properties)) {
    return reasons;
  }

  const { datetime, start_datetime: start, end_datetime: end } = properties;

  if (datetime === undefined && start === undefined && end === undefined) {
    reasons.push(
      specReason(
        'properties.datetime',
        'required',
        'properties.datetime is required (or null with start_datetime and end_datetime)'
      )
    );
  } else if (datetime === null || datetime === undefined) {
    if (start === undefined) {
      reasons.push(
        specReason(
          'properties.start_datetime',
          'required',
          'properties.start_datetime is required when datetime is null'
        )
      );
    }
    if (end === undefined) {
      reasons.push(
        specReason(
          'properties.end_datetime',
          'required',
          'properties.end_datetime is required when datetime is null'
        )
      );
    }
  }

  if (typeof start === 'string' && typeof end === 'string') {
    const startMs = Date.parse(start);
    const endMs = Date.parse(end);
    if (!Number.isNaN(startMs) && !Number.isNaN(endMs) && startMs > endMs) {
      reasons.push(
        specReason(
          'properties.end_datetime',
          'invalid_range',
          `properties.end_datetime (${end}) is before start_datetime (${start})`
        )
      );
    }
  }

  return reasons;
}

export class SpecValidator {
  /**
   * Validate a raw item payload
   *
   * @returns Partial verdict; `item` is set only when no reason was found
   */
  validate(payload: unknown): SpecVerdict {
    if (!isRecord(payload)) {
      return {
        check: 'spec',
        item: null,
        reasons: [
          {
            category: 'spec_violation',
            code: 'invalid_type',
            message: 'Record payload must be a JSON object',
          },
        ],
      };
    }

    const parsed = StacItemSchema.safeParse(payload);
    const reasons: ValidationReason[] = parsed.success
      ? []
      : parsed.error.issues.map(issueToReason);

    reasons.push(...checkCrossFieldRules(payload));

    if (!parsed.success || reasons.length > 0) {
      return { check: 'spec', item: null, reasons };
    }

    const item: StacItem = parsed.data;
    return { check: 'spec', item, reasons: [] };
  }
}

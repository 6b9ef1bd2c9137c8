/**
 * STAC Item & Collection Schemas
 *
 * Zod schemas for STAC 1.0 core documents. Field-level rules live here;
 * cross-field rules (datetime ranges, bbox-with-geometry) live in SpecValidator
 * because object-level refinements do not run once a field has failed.
 *
 * TYPE SAFETY: Nuclear-level strictness. All external inputs validated against schemas.
 */

import { z } from 'zod';
import type { BBox, Geometry } from 'geojson';
import { parseGeometry } from './geometry.js';

// ============================================================================
// Primitives
// ============================================================================

const SEMVER = /^\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?$/;

export const Rfc3339Schema = z
  .string()
  .datetime({ offset: true, message: 'must be an RFC 3339 timestamp' });

export const StacIdSchema = z
  .string()
  .min(1, 'must not be empty')
  .regex(/^[^\s/]+$/, 'must not contain whitespace or "/"');

const StacVersionSchema = z.string().regex(SEMVER, 'must be a semantic version (e.g. 1.0.0)');

/**
 * [west, south, east, north] or [west, south, bottom, east, north, top]
 *
 * West may exceed east for boxes crossing the antimeridian.
 */
export const BBoxSchema = z
  .array(z.number().finite())
  .transform((values, ctx): BBox => {
    if (values.length === 4) {
      const [west, south, east, north] = values;
      if (south > north) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `south (${south}) must not exceed north (${north})`,
          params: { code: 'invalid_bbox' },
        });
        return z.NEVER;
      }
      return [west, south, east, north];
    }

    if (values.length === 6) {
      const [west, south, bottom, east, north, top] = values;
      if (south > north || bottom > top) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'south must not exceed north and bottom must not exceed top',
          params: { code: 'invalid_bbox' },
        });
        return z.NEVER;
      }
      return [west, south, bottom, east, north, top];
    }

    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `must contain 4 or 6 numbers (got ${values.length})`,
      params: { code: 'invalid_bbox' },
    });
    return z.NEVER;
  });

/**
 * GeoJSON geometry or null, checked by the geometry parser
 */
export const GeometrySchema = z.unknown().transform((value, ctx): Geometry | null => {
  const { geometry, issues } = parseGeometry(value);
  for (const issue of issues) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [...issue.path],
      message: issue.message,
      params: { code: issue.code },
    });
  }
  return issues.length > 0 ? z.NEVER : geometry;
});

export const LinkSchema = z
  .object({
    href: z.string().min(1, 'must not be empty'),
    rel: z.string().min(1, 'must not be empty'),
    type: z.string().optional(),
    title: z.string().optional(),
  })
  .passthrough();

export const AssetSchema = z
  .object({
    href: z.string().min(1, 'must not be empty'),
    title: z.string().optional(),
    description: z.string().optional(),
    type: z.string().optional(),
    roles: z.array(z.string()).optional(),
  })
  .passthrough();

// ============================================================================
// Item
// ============================================================================

/**
 * Declared types of common metadata properties
 *
 * Unknown properties pass through untouched.
 */
export const ItemPropertiesSchema = z
  .object({
    datetime: Rfc3339Schema.nullable().optional(),
    start_datetime: Rfc3339Schema.optional(),
    end_datetime: Rfc3339Schema.optional(),
    created: Rfc3339Schema.optional(),
    updated: Rfc3339Schema.optional(),
    title: z.string().optional(),
    description: z.string().optional(),
    license: z.string().optional(),
    platform: z.string().optional(),
    constellation: z.string().optional(),
    mission: z.string().optional(),
    instruments: z.array(z.string()).optional(),
    gsd: z.number().positive().optional(),
    'eo:cloud_cover': z.number().min(0).max(100).optional(),
  })
  .passthrough();

export const StacItemSchema = z
  .object({
    type: z.literal('Feature'),
    stac_version: StacVersionSchema,
    stac_extensions: z.array(z.string().url()).optional(),
    id: StacIdSchema,
    collection: z.string().min(1, 'must not be empty'),
    geometry: GeometrySchema,
    bbox: BBoxSchema.optional(),
    properties: ItemPropertiesSchema,
    links: z.array(LinkSchema),
    assets: z.record(z.string(), AssetSchema),
  })
  .passthrough();

// ============================================================================
// Collection
// ============================================================================

const ProviderSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    roles: z.array(z.string()).optional(),
    url: z.string().url().optional(),
  })
  .passthrough();

export const StacCollectionSchema = z
  .object({
    type: z.literal('Collection'),
    stac_version: StacVersionSchema,
    stac_extensions: z.array(z.string().url()).optional(),
    id: StacIdSchema,
    title: z.string().optional(),
    description: z.string().min(1, 'must not be empty'),
    keywords: z.array(z.string()).optional(),
    license: z.string().min(1, 'must not be empty'),
    providers: z.array(ProviderSchema).optional(),
    extent: z.object({
      spatial: z.object({ bbox: z.array(BBoxSchema).min(1) }),
      temporal: z.object({
        interval: z.array(z.tuple([Rfc3339Schema.nullable(), Rfc3339Schema.nullable()])).min(1),
      }),
    }),
    summaries: z.record(z.string(), z.unknown()).optional(),
    links: z.array(LinkSchema),
    assets: z.record(z.string(), AssetSchema).optional(),
  })
  .passthrough();

export type StacCollection = z.infer<typeof StacCollectionSchema>;

/**
 * GeoJSON geometry well-formedness
 *
 * Parses an untrusted value into a typed GeoJSON geometry, collecting every
 * structural problem instead of stopping at the first one.
 *
 * CHECKS:
 * - Known geometry type with a `coordinates` (or `geometries`) member
 * - Positions of 2-3 finite numbers, lon in [-180, 180], lat in [-90, 90]
 * - LineStrings of at least 2 positions
 * - Polygon rings of at least 4 positions, first == last
 * - No self-intersections (turf kinks) in structurally valid polygons
 */

import { kinks, polygon as turfPolygon } from '@turf/turf';
import type {
  Geometry,
  GeometryCollection,
  LineString,
  MultiLineString,
  MultiPoint,
  MultiPolygon,
  Point,
  Polygon,
  Position,
} from 'geojson';

export type GeometryIssueCode =
  | 'required'
  | 'invalid_geometry'
  | 'invalid_position'
  | 'out_of_range'
  | 'too_few_positions'
  | 'unclosed_ring'
  | 'self_intersection';

export interface GeometryIssue {
  /** Path segments relative to the geometry value */
  readonly path: readonly (string | number)[];
  readonly code: GeometryIssueCode;
  readonly message: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

type Path = readonly (string | number)[];

class GeometryParser {
  readonly issues: GeometryIssue[] = [];

  private report(path: Path, code: GeometryIssueCode, message: string): void {
    this.issues.push({ path, code, message });
  }

  parse(value: unknown, path: Path): Geometry | null {
    if (!isRecord(value)) {
      this.report(path, 'invalid_geometry', 'Geometry must be a GeoJSON geometry object or null');
      return null;
    }

    switch (value.type) {
      case 'Point':
        return this.point(value.coordinates, [...path, 'coordinates']);
      case 'MultiPoint':
        return this.multiPoint(value.coordinates, [...path, 'coordinates']);
      case 'LineString':
        return this.lineString(value.coordinates, [...path, 'coordinates']);
      case 'MultiLineString':
        return this.multiLineString(value.coordinates, [...path, 'coordinates']);
      case 'Polygon':
        return this.polygon(value.coordinates, [...path, 'coordinates']);
      case 'MultiPolygon':
        return this.multiPolygon(value.coordinates, [...path, 'coordinates']);
      case 'GeometryCollection':
        return this.collection(value.geometries, [...path, 'geometries']);
      default:
        this.report(
          [...path, 'type'],
          'invalid_geometry',
          `Unknown geometry type: ${typeof value.type === 'string' ? value.type : String(value.type)}`
        );
        return null;
    }
  }

  private position(value: unknown, path: Path): Position | null {
    if (
      !Array.isArray(value) ||
      value.length < 2 ||
      value.length > 3 ||
      !value.every((n): n is number => typeof n === 'number' && Number.isFinite(n))
    ) {
      this.report(path, 'invalid_position', 'Position must be an array of 2 or 3 finite numbers');
      return null;
    }

    const [lon, lat] = value;
    if (lon < -180 || lon > 180 || lat < -90 || lat > 90) {
      this.report(path, 'out_of_range', `Position [${lon}, ${lat}] is outside WGS84 bounds`);
      return null;
    }

    return [...value];
  }

  private positions(value: unknown, path: Path, min: number, label: string): Position[] | null {
    if (!Array.isArray(value)) {
      this.report(path, 'invalid_geometry', `${label} coordinates must be an array`);
      return null;
    }

    const parsed: Position[] = [];
    let valid = true;
    value.forEach((entry, index) => {
      const position = this.position(entry, [...path, index]);
      if (position) {
        parsed.push(position);
      } else {
        valid = false;
      }
    });

    if (value.length < min) {
      this.report(path, 'too_few_positions', `${label} needs at least ${min} positions (got ${value.length})`);
      return null;
    }

    return valid ? parsed : null;
  }

  private ring(value: unknown, path: Path): Position[] | null {
    const ring = this.positions(value, path, 4, 'Polygon ring');
    if (!ring) return null;

    const first = ring[0];
    const last = ring[ring.length - 1];
    if (first.length !== last.length || first.some((n, i) => n !== last[i])) {
      this.report(path, 'unclosed_ring', 'Polygon ring is not closed (first != last position)');
      return null;
    }

    return ring;
  }

  private rings(value: unknown, path: Path): Position[][] | null {
    if (!Array.isArray(value) || value.length === 0) {
      this.report(path, 'invalid_geometry', 'Polygon coordinates must be a non-empty array of rings');
      return null;
    }

    const rings: Position[][] = [];
    let valid = true;
    value.forEach((entry, index) => {
      const ring = this.ring(entry, [...path, index]);
      if (ring) {
        rings.push(ring);
      } else {
        valid = false;
      }
    });

    if (!valid) return null;

    this.checkSelfIntersection(rings, path);
    return rings;
  }

  private checkSelfIntersection(rings: Position[][], path: Path): void {
    try {
      const intersections = kinks(turfPolygon(rings));
      if (intersections.features.length > 0) {
        const [lon, lat] = intersections.features[0].geometry.coordinates;
        this.report(
          path,
          'self_intersection',
          `Polygon self-intersects at ${intersections.features.length} point(s), first near [${lon}, ${lat}]`
        );
      }
    } catch (error) {
      this.report(
        path,
        'invalid_geometry',
        `Failed to validate topology: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private point(value: unknown, path: Path): Point | null {
    const coordinates = this.position(value, path);
    return coordinates ? { type: 'Point', coordinates } : null;
  }

  private multiPoint(value: unknown, path: Path): MultiPoint | null {
    const coordinates = this.positions(value, path, 1, 'MultiPoint');
    return coordinates ? { type: 'MultiPoint', coordinates } : null;
  }

  private lineString(value: unknown, path: Path): LineString | null {
    const coordinates = this.positions(value, path, 2, 'LineString');
    return coordinates ? { type: 'LineString', coordinates } : null;
  }

  private multiLineString(value: unknown, path: Path): MultiLineString | null {
    const coordinates = this.each(value, path, 'MultiLineString', (entry, entryPath) =>
      this.positions(entry, entryPath, 2, 'LineString')
    );
    return coordinates ? { type: 'MultiLineString', coordinates } : null;
  }

  private polygon(value: unknown, path: Path): Polygon | null {
    const coordinates = this.rings(value, path);
    return coordinates ? { type: 'Polygon', coordinates } : null;
  }

  private multiPolygon(value: unknown, path: Path): MultiPolygon | null {
    const coordinates = this.each(value, path, 'MultiPolygon', (entry, entryPath) =>
      this.rings(entry, entryPath)
    );
    return coordinates ? { type: 'MultiPolygon', coordinates } : null;
  }

  private collection(value: unknown, path: Path): GeometryCollection | null {
    const geometries = this.each(value, path, 'GeometryCollection', (entry, entryPath) =>
      this.parse(entry, entryPath)
    );
    return geometries ? { type: 'GeometryCollection', geometries } : null;
  }

  private each<T>(
    value: unknown,
    path: Path,
    label: string,
    parseEntry: (entry: unknown, entryPath: Path) => T | null
  ): T[] | null {
    if (!Array.isArray(value) || value.length === 0) {
      this.report(path, 'invalid_geometry', `${label} members must be a non-empty array`);
      return null;
    }

    const parsed: T[] = [];
    let valid = true;
    value.forEach((entry, index) => {
      const result = parseEntry(entry, [...path, index]);
      if (result === null) {
        valid = false;
      } else {
        parsed.push(result);
      }
    });

    return valid ? parsed : null;
  }
}

/**
 * Parse a geometry member
 *
 * `null` is a valid STAC geometry (items without a footprint); `undefined`
 * means the member is missing.
 */
export function parseGeometry(value: unknown): {
  readonly geometry: Geometry | null;
  readonly issues: readonly GeometryIssue[];
} {
  if (value === undefined) {
    return {
      geometry: null,
      issues: [{ path: [], code: 'required', message: 'geometry is required (use null for no footprint)' }],
    };
  }

  if (value === null) {
    return { geometry: null, issues: [] };
  }

  const parser = new GeometryParser();
  const geometry = parser.parse(value, []);
  return { geometry: parser.issues.length === 0 ? geometry : null, issues: parser.issues };
}

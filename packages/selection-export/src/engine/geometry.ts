/**
 * Geometry helpers for the local dataset engine
 *
 * All geometry is WGS84 GeoJSON. Measurements are geodesic via turf.
 */

import * as turf from '@turf/turf';
import type {
  Feature,
  FeatureCollection,
  Geometry,
  LineString,
  MultiPolygon,
  Polygon,
  Position,
} from 'geojson';
import type { AreaUnit, LinearUnit } from '../core/types/engine.js';
import type { GeometryKind } from '../core/types/dataset.js';

const GEOMETRY_TYPES: ReadonlySet<string> = new Set([
  'Point',
  'MultiPoint',
  'LineString',
  'MultiLineString',
  'Polygon',
  'MultiPolygon',
  'GeometryCollection',
]);

/**
 * Structural check for values read back from storage
 */
export function isGeometry(value: unknown): value is Geometry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('type' in value) || typeof value.type !== 'string' || !GEOMETRY_TYPES.has(value.type)) {
    return false;
  }
  return value.type === 'GeometryCollection' ? 'geometries' in value : 'coordinates' in value;
}

export function isPolygonal(geometry: Geometry): geometry is Polygon | MultiPolygon {
  return geometry.type === 'Polygon' || geometry.type === 'MultiPolygon';
}

/**
 * Simplified geometry type
 */
export function geometryKindOf(geometry: Geometry): GeometryKind | null {
  switch (geometry.type) {
    case 'Point':
    case 'MultiPoint':
      return 'point';
    case 'LineString':
    case 'MultiLineString':
      return 'line';
    case 'Polygon':
    case 'MultiPolygon':
      return 'polygon';
    case 'GeometryCollection':
      return geometry.geometries.length > 0 ? geometryKindOf(geometry.geometries[0]) : null;
  }
}

const DIMENSION: Record<GeometryKind, number> = { point: 0, line: 1, polygon: 2 };

/** Lower-dimension kind of the two (the kind of their intersection) */
export function lowerKind(a: GeometryKind, b: GeometryKind): GeometryKind {
  return DIMENSION[a] <= DIMENSION[b] ? a : b;
}

// ============================================================================
// Measurement
// ============================================================================

const SQUARE_METRES_PER: Record<AreaUnit, number> = {
  m2: 1,
  ha: 10_000,
  km2: 1_000_000,
};

/**
 * Geodesic area in the requested unit
 */
export function areaOf(geometry: Geometry, unit: AreaUnit): number {
  return turf.area(geometry) / SQUARE_METRES_PER[unit];
}

export function toMetres(distance: number, unit: LinearUnit): number {
  return unit === 'km' ? distance * 1000 : distance;
}

/**
 * Ground distance in metres between two geometries; 0 when they intersect
 */
export function distanceBetween(a: Geometry, b: Geometry): number {
  if (turf.booleanIntersects(a, b)) return 0;

  let best = Number.POSITIVE_INFINITY;
  const measureFrom = (from: Geometry, to: Geometry): void => {
    const lines = linesOf(to);
    const targets = turf.coordAll(to);
    for (const vertex of turf.coordAll(from)) {
      if (lines.length > 0) {
        for (const line of lines) {
          best = Math.min(best, turf.pointToLineDistance(vertex, line, { units: 'meters' }));
        }
      } else {
        for (const target of targets) {
          best = Math.min(best, turf.distance(vertex, target, { units: 'meters' }));
        }
      }
    }
  };

  measureFrom(a, b);
  measureFrom(b, a);
  return best;
}

function linesOf(geometry: Geometry): Feature<LineString>[] {
  const rings: Position[][] = [];
  switch (geometry.type) {
    case 'LineString':
      rings.push(geometry.coordinates);
      break;
    case 'MultiLineString':
      rings.push(...geometry.coordinates);
      break;
    case 'Polygon':
      rings.push(...geometry.coordinates);
      break;
    case 'MultiPolygon':
      for (const polygon of geometry.coordinates) rings.push(...polygon);
      break;
    case 'GeometryCollection':
      return geometry.geometries.flatMap(linesOf);
    default:
      break;
  }
  return rings.filter((ring) => ring.length >= 2).map((ring) => turf.lineString(ring));
}

export function intersects(a: Geometry, b: Geometry): boolean {
  return turf.booleanIntersects(a, b);
}

// ============================================================================
// Overlay
// ============================================================================

type BufferResult = Feature<Polygon | MultiPolygon> | FeatureCollection<Polygon | MultiPolygon>;

/**
 * Round buffer of a geometry, distance in metres
 */
export function bufferGeometry(geometry: Geometry, metres: number): Polygon | MultiPolygon | null {
  const buffered: BufferResult | undefined = turf.buffer<Feature | FeatureCollection>(turf.feature(geometry), metres, { units: 'meters' });
  if (!buffered) return null;
  if (!('features' in buffered)) return buffered.geometry;

  const merged = unionAll(buffered.features.map((part: Feature<Polygon | MultiPolygon>) => part.geometry));
  return merged && isPolygonal(merged) ? merged : null;
}

/**
 * Union of all geometries. Polygons are merged; points and lines are
 * collected into their multi-part form.
 */
export function unionAll(geometries: readonly Geometry[]): Geometry | null {
  if (geometries.length === 0) return null;
  if (geometries.length === 1) return geometries[0];

  const polygons = geometries.filter(isPolygonal);
  if (polygons.length === geometries.length) {
    const merged = turf.union(turf.featureCollection(polygons.map((g) => turf.feature(g))));
    return merged ? merged.geometry : null;
  }

  const kinds = new Set(geometries.map(geometryKindOf));
  if (kinds.size === 1 && kinds.has('point')) {
    return { type: 'MultiPoint', coordinates: geometries.flatMap((g) => turf.coordAll(g)) };
  }
  if (kinds.size === 1 && kinds.has('line')) {
    return {
      type: 'MultiLineString',
      coordinates: geometries.flatMap((g) => linesOf(g).map((line) => line.geometry.coordinates)),
    };
  }
  return { type: 'GeometryCollection', geometries: [...geometries] };
}

/**
 * Part of `geometry` inside the polygonal `mask`, or null when nothing is.
 * Lines that touch the mask are kept whole.
 */
export function clipGeometry(geometry: Geometry, mask: Geometry): Geometry | null {
  if (!isPolygonal(mask)) {
    return turf.booleanIntersects(geometry, mask) ? geometry : null;
  }

  if (isPolygonal(geometry)) {
    const clipped = turf.intersect(
      turf.featureCollection([turf.feature(geometry), turf.feature(mask)])
    );
    return clipped ? clipped.geometry : null;
  }

  if (geometry.type === 'Point') {
    return turf.booleanPointInPolygon(geometry.coordinates, mask) ? geometry : null;
  }
  if (geometry.type === 'MultiPoint') {
    const inside = geometry.coordinates.filter((c) => turf.booleanPointInPolygon(c, mask));
    if (inside.length === 0) return null;
    return inside.length === 1
      ? { type: 'Point', coordinates: inside[0] }
      : { type: 'MultiPoint', coordinates: inside };
  }

  return turf.booleanIntersects(geometry, mask) ? geometry : null;
}

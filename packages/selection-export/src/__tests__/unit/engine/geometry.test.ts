/**
 * Tests for geodesic measurement
 */

import { describe, expect, it } from 'vitest';
import { createSquarePolygon } from '../../utils/index.js';
import {
  areaOf,
  bufferGeometry,
  clipGeometry,
  distanceBetween,
  intersects,
  toMetres,
} from '../../../engine/geometry.js';

describe('areaOf', () => {
  const square = createSquarePolygon(0, 0, 0.001);

  it('should measure a small square at the equator in square metres', () => {
    const m2 = areaOf(square, 'm2');

    // about 12,364 m² on turf's mean earth radius
    expect(m2).toBeGreaterThan(12_350);
    expect(m2).toBeLessThan(12_400);
  });

  it('should convert to hectares and square kilometres', () => {
    const m2 = areaOf(square, 'm2');

    expect(areaOf(square, 'ha')).toBeCloseTo(m2 / 10_000, 10);
    expect(areaOf(square, 'km2')).toBeCloseTo(m2 / 1_000_000, 12);
  });
});

describe('distanceBetween', () => {
  it('should be 0 for intersecting geometries', () => {
    expect(distanceBetween(createSquarePolygon(0, 0, 0.01), { type: 'Point', coordinates: [0.005, 0.005] })).toBe(0);
  });

  it('should measure between points in metres', () => {
    const metres = distanceBetween({ type: 'Point', coordinates: [0, 0] }, { type: 'Point', coordinates: [0, 0.001] });

    expect(metres).toBeGreaterThan(111);
    expect(metres).toBeLessThan(112);
  });

  it('should measure from a point to the nearest polygon edge', () => {
    const metres = distanceBetween({ type: 'Point', coordinates: [0, 0.002] }, createSquarePolygon(-0.001, 0, 0.001));

    expect(metres).toBeGreaterThan(111);
    expect(metres).toBeLessThan(112);
  });
});

describe('clipGeometry', () => {
  const mask = createSquarePolygon(0, 0, 0.01);

  it('should keep a line that touches the mask whole', () => {
    const line = { type: 'LineString' as const, coordinates: [[-0.01, 0.005], [0.005, 0.005]] };

    expect(clipGeometry(line, mask)).toEqual(line);
  });

  it('should drop a point outside the mask', () => {
    expect(clipGeometry({ type: 'Point', coordinates: [1, 1] }, mask)).toBeNull();
  });
});

describe('toMetres', () => {
  it('should convert kilometres', () => {
    expect(toMetres(1.5, 'km')).toBe(1500);
    expect(toMetres(250, 'm')).toBe(250);
  });
});

describe('bufferGeometry', () => {
  it('should return a polygon around a point covering about pi r squared', () => {
    const point = { type: 'Point' as const, coordinates: [0.01, 0.01] };
    const buffered = bufferGeometry(point, 100);

    expect(buffered?.type).toBe('Polygon');
    if (!buffered) return;
    expect(intersects(buffered, point)).toBe(true);
    expect(areaOf(buffered, 'm2')).toBeGreaterThan(30_000);
    expect(areaOf(buffered, 'm2')).toBeLessThan(32_000);
  });
});

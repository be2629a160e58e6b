import { describe, it, expect } from 'vitest';
import type { MultiPolygon, Polygon } from '../types/geo';
import {
  closeRing,
  geometryArea,
  geometryBounds,
  geometryCentroid,
  intersectionArea,
  rectToPolygon,
  toAreaGeometry,
} from './geometry';

const squareWithHole: Polygon = {
  type: 'Polygon',
  coordinates: [
    [[0, 0], [10, 0], [10, 10], [0, 10], [0, 0]],
    [[0, 0], [0, 2], [2, 2], [2, 0], [0, 0]],
  ],
};

describe('geometry helpers', () => {
  it('closes open rings and leaves closed ones alone', () => {
    expect(closeRing([[0, 0], [1, 0], [1, 1]])).toEqual([[0, 0], [1, 0], [1, 1], [0, 0]]);
    const closed = [[0, 0], [1, 0], [1, 1], [0, 0]];
    expect(closeRing(closed)).toBe(closed);
  });

  it('builds closed rectangles', () => {
    expect(rectToPolygon(1, 2, 3, 4).coordinates).toEqual([[[1, 2], [3, 2], [3, 4], [1, 4], [1, 2]]]);
  });

  it('subtracts holes from area and shifts the centroid away from them', () => {
    expect(geometryArea(squareWithHole)).toBe(96);
    const c = geometryCentroid(squareWithHole);
    expect(c.x).toBeCloseTo(496 / 96, 10);
    expect(c.y).toBeCloseTo(496 / 96, 10);
  });

  it('sums multipolygon parts', () => {
    const multi: MultiPolygon = {
      type: 'MultiPolygon',
      coordinates: [rectToPolygon(0, 0, 2, 2).coordinates, rectToPolygon(10, 10, 13, 13).coordinates],
    };
    expect(geometryArea(multi)).toBe(13);
    expect(geometryBounds(multi)).toEqual([0, 0, 13, 13]);
  });

  it('falls back to the vertex mean for zero-area rings', () => {
    const line: Polygon = { type: 'Polygon', coordinates: [[[0, 0], [4, 0], [2, 0], [0, 0]]] };
    expect(geometryArea(line)).toBe(0);
    expect(geometryCentroid(line)).toEqual({ x: 1.5, y: 0 });
  });

  it('measures intersections in plane units', () => {
    expect(intersectionArea(rectToPolygon(0, 0, 10, 10), rectToPolygon(5, 0, 15, 10))).toBeCloseTo(50, 6);
    expect(intersectionArea(rectToPolygon(0, 0, 10, 10), rectToPolygon(20, 20, 30, 30))).toBe(0);
  });
});

describe('toAreaGeometry', () => {
  it('accepts polygons and closes their rings', () => {
    const result = toAreaGeometry({ type: 'Polygon', coordinates: [[[0, 0], [4, 0], [4, 4]]] });
    expect(result).toEqual({
      ok: true,
      geometry: { type: 'Polygon', coordinates: [[[0, 0], [4, 0], [4, 4], [0, 0]]] },
    });
  });

  it('rejects missing, non-area and malformed geometries', () => {
    expect(toAreaGeometry(null)).toEqual({ ok: false, reason: 'missing geometry' });
    expect(toAreaGeometry({ type: 'Point', coordinates: [1, 2] })).toEqual({
      ok: false,
      reason: 'unsupported or malformed geometry (Point)',
    });
    expect(toAreaGeometry({ type: 'Polygon', coordinates: [[[0, 0], [1, 1]]] })).toEqual({
      ok: false,
      reason: 'unsupported or malformed geometry (Polygon)',
    });
  });
});

import * as turf from '@turf/turf';
import { z } from 'zod';
import type { AreaGeometry, BBox, LinearRing, Polygon, Position } from '../types/geo';

export const closeRing = (ring: LinearRing): LinearRing => {
  if (ring.length < 3) return ring;
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (first[0] !== last[0] || first[1] !== last[1]) return [...ring, first];
  return ring;
};

export const rectToPolygon = (xmin:number,ymin:number,xmax:number,ymax:number): Polygon => ({
  type: 'Polygon',
  coordinates: [
    closeRing([
      [xmin, ymin],[xmax, ymin],[xmax, ymax],[xmin, ymax]
    ])
  ]
});

// Shoelace; positive for counter-clockwise rings in a y-up frame
const signedArea = (ring: LinearRing): number => {
  let a = 0;
  for (let i = 0; i < ring.length - 1; i++) {
    const [x1,y1] = ring[i];
    const [x2,y2] = ring[i+1];
    a += (x1*y2 - x2*y1);
  }
  return a / 2;
};

export const area = (ring: LinearRing): number => Math.abs(signedArea(ring));

const polygonRings = (geometry: AreaGeometry): Position[][][] =>
  geometry.type === 'Polygon' ? [geometry.coordinates] : geometry.coordinates;

/** Planar area in squared coordinate units: outer rings minus holes. */
export function geometryArea(geometry: AreaGeometry): number {
  let total = 0;
  for (const rings of polygonRings(geometry)) {
    rings.forEach((ring, idx) => {
      const a = area(closeRing(ring));
      total += idx === 0 ? a : -a;
    });
  }
  return Math.max(0, total);
}

interface WeightedPoint { x: number; y: number; weight: number }

function ringCentroid(ring: LinearRing): WeightedPoint {
  const closed = closeRing(ring);
  const a = signedArea(closed);
  if (a === 0) return { x: 0, y: 0, weight: 0 };
  let cx = 0;
  let cy = 0;
  for (let i = 0; i < closed.length - 1; i++) {
    const [x1,y1] = closed[i];
    const [x2,y2] = closed[i+1];
    const cross = x1*y2 - x2*y1;
    cx += (x1 + x2) * cross;
    cy += (y1 + y2) * cross;
  }
  return { x: cx / (6 * a), y: cy / (6 * a), weight: Math.abs(a) };
}

/**
 * Area-weighted centroid (holes subtract their moment). Degenerate
 * geometries with no area fall back to the mean of their vertices.
 */
export function geometryCentroid(geometry: AreaGeometry): { x: number; y: number } {
  let sx = 0;
  let sy = 0;
  let sw = 0;
  for (const rings of polygonRings(geometry)) {
    rings.forEach((ring, idx) => {
      const c = ringCentroid(ring);
      const sign = idx === 0 ? 1 : -1;
      sx += sign * c.x * c.weight;
      sy += sign * c.y * c.weight;
      sw += sign * c.weight;
    });
  }
  if (sw > 0) return { x: sx / sw, y: sy / sw };

  const vertices = polygonRings(geometry).flat(2);
  if (vertices.length === 0) return { x: NaN, y: NaN };
  return {
    x: vertices.reduce((s, p) => s + p[0], 0) / vertices.length,
    y: vertices.reduce((s, p) => s + p[1], 0) / vertices.length,
  };
}

export function geometryBounds(geometry: AreaGeometry): BBox {
  const [xMin, yMin, xMax, yMax] = turf.bbox(geometry);
  return [xMin, yMin, xMax, yMax];
}

/**
 * Planar area of `a ∩ b`. Throws when the clipping library rejects the input
 * (self-intersections, rings that are too short); callers decide what a
 * failure means.
 */
export function intersectionArea(a: AreaGeometry, b: AreaGeometry): number {
  const intersection = turf.intersect(
    turf.featureCollection<AreaGeometry>([turf.feature(a), turf.feature(b)])
  );
  return intersection ? geometryArea(intersection.geometry) : 0;
}

// -------- Raw GeoJSON → geometry --------
const PositionSchema = z.tuple([z.number().finite(), z.number().finite()]).rest(z.number());
const RingSchema = z.array(PositionSchema).min(3);
const PolygonCoordsSchema = z.array(RingSchema).min(1);

const AreaGeometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: PolygonCoordsSchema }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(PolygonCoordsSchema).min(1) }),
]);

export type GeometryParseResult =
  | { ok: true; geometry: AreaGeometry }
  | { ok: false; reason: string };

/** Turns a raw GeoJSON geometry into a Polygon or MultiPolygon with closed rings. */
export function toAreaGeometry(raw: unknown): GeometryParseResult {
  if (raw === null || raw === undefined) return { ok: false, reason: 'missing geometry' };
  const parsed = AreaGeometrySchema.safeParse(raw);
  if (!parsed.success) {
    const type = typeof raw === 'object' && 'type' in raw ? String(raw.type) : typeof raw;
    return { ok: false, reason: `unsupported or malformed geometry (${type})` };
  }
  const g = parsed.data;
  const geometry: AreaGeometry = g.type === 'Polygon'
    ? { type: 'Polygon', coordinates: g.coordinates.map(closeRing) }
    : { type: 'MultiPolygon', coordinates: g.coordinates.map(rings => rings.map(closeRing)) };
  return { ok: true, geometry };
}

import type { MultiPolygon, Polygon, Position } from 'geojson';

export type { MultiPolygon, Polygon, Position };
export type LinearRing = Position[]; // closed (first==last)

// Annotations are kept only when they cover an area
export type AreaGeometry = Polygon | MultiPolygon;

export type BBox = [number, number, number, number]; // [x_min, y_min, x_max, y_max] in pixels

// QuPath exports are read as untrusted JSON; every field is narrowed by the parser
export interface RawFeature {
  type?: unknown;
  id?: unknown;
  geometry?: unknown;
  properties?: unknown;
}

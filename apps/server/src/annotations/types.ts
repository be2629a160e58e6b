import type { AreaGeometry } from '../types/geo';

export const UNKNOWN_CLASSIFICATION = 'Unknown';

export interface Annotation {
  readonly classification: string;
  readonly geometry_type: AreaGeometry['type'];
  readonly geometry: AreaGeometry;
  readonly x_min: number;
  readonly y_min: number;
  readonly x_max: number;
  readonly y_max: number;
  readonly centroid_x: number;
  readonly centroid_y: number;
  readonly area_um2: number; // pixel area × coordinate_scale²
  readonly properties: Readonly<Record<string, unknown>>; // keyed `property_<key>`
}

export interface GeoJsonValidation {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

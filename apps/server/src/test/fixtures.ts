import { geojsonToAnnotations } from '../annotations/parser';
import type { Annotation } from '../annotations/types';
import { BACKGROUND_LABEL, type Tile } from '../tiles/types';
import type { AreaGeometry } from '../types/geo';
import { rectToPolygon } from '../utils/geometry';

export const square = (xmin: number, ymin: number, xmax: number, ymax: number) =>
  rectToPolygon(xmin, ymin, xmax, ymax);

export function qupathFeature(geometry: AreaGeometry | null, classification: string, extra: Record<string, unknown> = {}) {
  return {
    type: 'Feature',
    id: `feature-${classification}`,
    geometry,
    properties: {
      objectType: 'annotation',
      classification: { name: classification, color: [255, 0, 0] },
      ...extra,
    },
  };
}

export function featureCollection(features: unknown[]) {
  return { type: 'FeatureCollection', features };
}

/** Annotations built through the parser, in the given order. */
export function annotate(...entries: Array<[string, AreaGeometry]>): Annotation[] {
  return geojsonToAnnotations(featureCollection(entries.map(([label, g]) => qupathFeature(g, label))));
}

export function makeTile(x: number, y: number, width = 10, height = 10, overrides: Partial<Tile> = {}): Tile {
  const tile_id = overrides.tile_id ?? `tile_${x}_${y}`;
  return {
    tile_id,
    tile_path: `tiles/${tile_id}.png`,
    x,
    y,
    width,
    height,
    tissue_ratio: 0.8,
    label: BACKGROUND_LABEL,
    label_confidence: 0,
    columns: { tile_id, x: String(x), y: String(y), width: String(width), height: String(height) },
    ...overrides,
  };
}

// Silent logger for injecting into registries under test
export function quietLogger() {
  return { debug: () => {}, info: () => {}, warn: () => {}, error: () => {} };
}

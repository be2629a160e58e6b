import { BACKGROUND_LABEL, type Tile } from '../tiles/types';
import type { Polygon } from '../types/geo';
import { errorMessage } from '../utils/errors';
import { geometryArea, intersectionArea, rectToPolygon } from '../utils/geometry';
import { createLogger } from '../utils/logger';
import type { Annotation } from './types';

const log = createLogger('MATCHER');

export const DEFAULT_OVERLAP_THRESHOLD = 0.5;

export interface TileMatch {
  label: string;
  overlap: number; // best overlap ratio in [0, 1]
  annotationIndex: number; // -1 when no annotation overlaps the tile
}

export interface LabelCount {
  label: string;
  count: number;
  percent: number;
}

type TileBox = Pick<Tile, 'x' | 'y' | 'width' | 'height'>;

const NO_MATCH: TileMatch = { label: BACKGROUND_LABEL, overlap: 0, annotationIndex: -1 };

// A failed intersection only disqualifies this pair, never the whole run
function overlapOrZero(tilePoly: Polygon, annotation: Annotation, idx: number): number {
  try {
    return intersectionArea(tilePoly, annotation.geometry);
  } catch (err) {
    log.debug(`Error calculating overlap with annotation ${idx}: ${errorMessage(err)}`);
    return 0;
  }
}

/**
 * Scans every annotation in order and keeps the one with the strictly
 * greatest overlap ratio, so on exact ties the earliest annotation wins.
 * Zero-area tiles never match.
 */
export function findBestMatch(tile: TileBox, annotations: readonly Annotation[]): TileMatch {
  const tilePoly = rectToPolygon(tile.x, tile.y, tile.x + tile.width, tile.y + tile.height);
  // Same shoelace as the clipped area, so a fully covered tile comes out at exactly 1
  const tileArea = geometryArea(tilePoly);
  if (!(tile.width > 0 && tile.height > 0 && tileArea > 0) || !Number.isFinite(tileArea)) {
    log.debug(`Tile at (${tile.x}, ${tile.y}) has no area (${tile.width}x${tile.height}); treating as background`);
    return NO_MATCH;
  }

  let best = NO_MATCH;

  annotations.forEach((annotation, idx) => {
    const overlapRatio = overlapOrZero(tilePoly, annotation, idx) / tileArea;
    if (!Number.isFinite(overlapRatio)) return;

    if (overlapRatio > best.overlap) {
      best = { label: annotation.classification, overlap: overlapRatio, annotationIndex: idx };
    }
  });

  return best;
}

/** Label counts, most frequent first; equal counts keep first-seen order. */
export function labelDistribution(tiles: readonly Pick<Tile, 'label'>[]): LabelCount[] {
  const counts = new Map<string, number>();
  for (const tile of tiles) counts.set(tile.label, (counts.get(tile.label) ?? 0) + 1);
  return [...counts]
    .sort((a, b) => b[1] - a[1])
    .map(([label, count]) => ({ label, count, percent: tiles.length ? (count / tiles.length) * 100 : 0 }));
}

/**
 * Assigns each tile the classification of its best-overlapping annotation
 * when that overlap reaches `overlapThreshold`, otherwise background.
 *
 * Every (tile, annotation) pair is intersected: O(tiles × annotations).
 * Returns new tile objects; the input is left untouched.
 */
export function mapAnnotationsToTiles(
  annotations: readonly Annotation[],
  tiles: readonly Tile[],
  overlapThreshold = DEFAULT_OVERLAP_THRESHOLD,
): Tile[] {
  log.info(`Mapping ${annotations.length} annotations to ${tiles.length} tiles`);

  const labeled = tiles.map((tile): Tile => {
    const match = findBestMatch(tile, annotations);
    const accepted = match.annotationIndex >= 0 && match.overlap >= overlapThreshold;
    return {
      ...tile,
      label: accepted ? match.label : BACKGROUND_LABEL,
      label_confidence: accepted ? match.overlap : 0,
    };
  });

  log.info('Tile label distribution:');
  for (const { label, count, percent } of labelDistribution(labeled)) {
    log.info(`  ${label}: ${count} (${percent.toFixed(1)}%)`);
  }

  return labeled;
}

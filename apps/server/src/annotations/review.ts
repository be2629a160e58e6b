import fs from 'node:fs';
import type { Tile } from '../tiles/types';
import { toCsv } from '../utils/csv';
import { createLogger } from '../utils/logger';
import { createSeededRandom, sampleIndices } from '../utils/random';

const log = createLogger('REVIEW');

export const DEFAULT_REVIEW_SAMPLE_SIZE = 100;
export const DEFAULT_REVIEW_SEED = 42;

export const REVIEW_COLUMNS = [
  'tile_id', 'tile_path', 'label', 'label_confidence', 'x', 'y', 'tissue_ratio',
] as const;

export type ReviewRow = Pick<Tile, (typeof REVIEW_COLUMNS)[number]>;

/**
 * Seeded sample of labeled tiles for manual QA, lowest confidence first.
 * Same tiles, size and seed always give the same rows.
 */
export function sampleForReview(
  tiles: readonly Tile[],
  sampleSize = DEFAULT_REVIEW_SAMPLE_SIZE,
  seed = DEFAULT_REVIEW_SEED,
): ReviewRow[] {
  const sample = tiles.length > sampleSize
    ? sampleIndices(tiles.length, sampleSize, createSeededRandom(seed)).map(i => tiles[i])
    : [...tiles];

  // Array.prototype.sort is stable, so equal confidences keep draw order
  return sample
    .sort((a, b) => a.label_confidence - b.label_confidence)
    .map(tile => ({
      tile_id: tile.tile_id,
      tile_path: tile.tile_path,
      label: tile.label,
      label_confidence: tile.label_confidence,
      x: tile.x,
      y: tile.y,
      tissue_ratio: tile.tissue_ratio,
    }));
}

export const reviewRowsToCsv = (rows: ReviewRow[]) => toCsv([...REVIEW_COLUMNS], rows);

export function exportTileLabelsForReview(
  tiles: readonly Tile[],
  outputPath: string,
  sampleSize = DEFAULT_REVIEW_SAMPLE_SIZE,
  seed = DEFAULT_REVIEW_SEED,
): ReviewRow[] {
  const rows = sampleForReview(tiles, sampleSize, seed);
  fs.writeFileSync(outputPath, reviewRowsToCsv(rows));
  log.info(`Exported ${rows.length} tiles for review to ${outputPath}`);
  return rows;
}

import fs from 'node:fs';
import { parseCsv, toCsv, type CsvCell } from '../utils/csv';
import { InputError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { BACKGROUND_LABEL, type Tile, type TileManifest } from './types';

const log = createLogger('MANIFEST');

export const REQUIRED_COLUMNS = ['x', 'y', 'width', 'height'] as const;
const LABEL_COLUMNS = ['label', 'label_confidence'];

function parseNumber(raw: string | undefined, column: string, rowNumber: number): number {
  const value = Number(raw);
  if (raw === undefined || raw.trim() === '' || !Number.isFinite(value)) {
    throw new InputError(`Row ${rowNumber}: column '${column}' is not a number (got '${raw ?? ''}')`);
  }
  return value;
}

function parseOptionalNumber(raw: string | undefined): number | null {
  if (raw === undefined || raw.trim() === '') return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

/** Parses tile manifest CSV text. Rows are numbered from 2 (the header is row 1). */
export function parseTileManifest(text: string): TileManifest {
  const { header, rows } = parseCsv(text);
  const missing = REQUIRED_COLUMNS.filter(c => !header.includes(c));
  if (missing.length > 0) {
    throw new InputError(`Tile manifest is missing required columns: ${missing.join(', ')}`);
  }

  const tiles = rows.map((row, idx): Tile => {
    const rowNumber = idx + 2;
    const confidence = parseOptionalNumber(row.label_confidence);
    return {
      tile_id: row.tile_id ?? '',
      tile_path: row.tile_path ?? '',
      x: parseNumber(row.x, 'x', rowNumber),
      y: parseNumber(row.y, 'y', rowNumber),
      width: parseNumber(row.width, 'width', rowNumber),
      height: parseNumber(row.height, 'height', rowNumber),
      tissue_ratio: parseOptionalNumber(row.tissue_ratio),
      label: row.label || BACKGROUND_LABEL,
      label_confidence: confidence ?? 0,
      columns: row,
    };
  });

  return { header, tiles };
}

export function loadTileManifest(manifestPath: string): TileManifest {
  const manifest = parseTileManifest(fs.readFileSync(manifestPath, 'utf8'));
  log.info(`Loaded ${manifest.tiles.length} tiles from manifest ${manifestPath}`);
  return manifest;
}

/** Input columns first, then `label` and `label_confidence` unless the input already had them. */
export function tileManifestToCsv(header: string[], tiles: Tile[]): string {
  const outputHeader = [...header, ...LABEL_COLUMNS.filter(c => !header.includes(c))];
  const rows = tiles.map(tile => {
    const row: Record<string, CsvCell> = { ...tile.columns };
    row.label = tile.label;
    row.label_confidence = tile.label_confidence;
    return row;
  });
  return toCsv(outputHeader, rows);
}

export function saveTileManifest(outputPath: string, header: string[], tiles: Tile[]): void {
  fs.writeFileSync(outputPath, tileManifestToCsv(header, tiles));
  log.info(`Saved ${tiles.length} labeled tiles to ${outputPath}`);
}

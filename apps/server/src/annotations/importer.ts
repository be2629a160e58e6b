import fs from 'node:fs';
import path from 'node:path';
import { globSync } from 'glob';
import { SpeciesRegistry, speciesRegistry } from '../species/registry';
import { loadTileManifest } from '../tiles/manifest';
import { BACKGROUND_LABEL, type Tile } from '../tiles/types';
import { createLogger } from '../utils/logger';
import { DEFAULT_OVERLAP_THRESHOLD, mapAnnotationsToTiles } from './matcher';
import { geojsonToAnnotations, loadGeoJson } from './parser';
import type { Annotation } from './types';

const log = createLogger('IMPORT');

export interface LabelOptions {
  species: string;
  coordinateScale?: number;
  overlapThreshold?: number;
  registry?: SpeciesRegistry;
}

export interface ImportOptions extends LabelOptions {
  geojsonPath: string;
  tilesManifestPath: string;
}

export interface LabelValidation {
  species: string | undefined; // canonical code, undefined when unknown
  validLabels: string[];
  invalidLabels: string[];
}

export interface ImportResult extends LabelValidation {
  annotations: Annotation[];
  tiles: Tile[];
  header: string[];
}

export interface SlidePair {
  slide: string;
  geojsonPath: string;
  tilesManifestPath: string;
}

// Accepts a code, a common or scientific name, or an alias
function resolveSpecies(species: string, registry: SpeciesRegistry): string | undefined {
  if (registry.has(species)) return species.trim().toLowerCase();
  const resolved = registry.resolve(species);
  if (resolved !== undefined) log.info(`Resolved species '${species}' to '${resolved}'`);
  return resolved;
}

/**
 * Checks produced labels against the species vocabulary plus background.
 * Offending labels are reported, never fatal.
 */
export function validateLabels(
  tiles: readonly Pick<Tile, 'label'>[],
  species: string,
  registry: SpeciesRegistry = speciesRegistry,
): LabelValidation {
  const code = resolveSpecies(species, registry);
  const info = code === undefined ? undefined : registry.lookup(code);
  if (code === undefined || !info) {
    log.warn(`Species '${species}' not found in registry; skipping label validation`);
    return { species: undefined, validLabels: [], invalidLabels: [] };
  }

  const validLabels = [...info.typical_follicle_types, BACKGROUND_LABEL];
  const valid = new Set(validLabels);
  const invalidLabels = [...new Set(tiles.map(t => t.label))].filter(label => !valid.has(label));

  if (invalidLabels.length > 0) {
    log.warn(`Found invalid labels for ${code}: ${invalidLabels.join(', ')}`);
    log.warn(`Valid labels: ${validLabels.join(', ')}`);
  }
  return { species: code, validLabels, invalidLabels };
}

/** In-memory import: parse, match, validate. */
export function labelTiles(
  collection: unknown,
  tiles: readonly Tile[],
  options: LabelOptions,
): Omit<ImportResult, 'header'> {
  const registry = options.registry ?? speciesRegistry;
  log.info(`Importing QuPath annotations for ${options.species}`);

  const annotations = geojsonToAnnotations(collection, options.coordinateScale ?? 1.0);
  const labeled = mapAnnotationsToTiles(
    annotations,
    tiles,
    options.overlapThreshold ?? DEFAULT_OVERLAP_THRESHOLD,
  );
  const validation = validateLabels(labeled, options.species, registry);
  return { annotations, tiles: labeled, ...validation };
}

export function importAnnotations(options: ImportOptions): ImportResult {
  const collection = loadGeoJson(options.geojsonPath);
  const manifest = loadTileManifest(options.tilesManifestPath);
  return { ...labelTiles(collection, manifest.tiles, options), header: manifest.header };
}

// -------- Batch --------
const ANNOTATION_SUFFIX = '_annotations.geojson';

/**
 * Pairs QuPath exports (`<slide>_annotations.geojson`) with tile manifests
 * (`<slide>.csv`). Slides without a manifest are logged and left out.
 */
export function findSlidePairs(annotationsDir: string, tilesDir: string): SlidePair[] {
  const files = globSync(`*${ANNOTATION_SUFFIX}`, { cwd: annotationsDir }).sort();
  const pairs: SlidePair[] = [];

  for (const file of files) {
    const slide = path.basename(file).slice(0, -ANNOTATION_SUFFIX.length);
    const tilesManifestPath = path.join(tilesDir, `${slide}.csv`);
    if (!fs.existsSync(tilesManifestPath)) {
      log.warn(`No tile manifest for slide ${slide} (expected ${tilesManifestPath})`);
      continue;
    }
    pairs.push({ slide, geojsonPath: path.join(annotationsDir, file), tilesManifestPath });
  }

  log.info(`Found ${pairs.length} slides with annotations and tile manifests`);
  return pairs;
}

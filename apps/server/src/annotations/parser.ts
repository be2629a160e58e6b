import fs from 'node:fs';
import type { RawFeature } from '../types/geo';
import { toCsv, type CsvCell } from '../utils/csv';
import { errorMessage, InputError } from '../utils/errors';
import { geometryArea, geometryBounds, geometryCentroid, toAreaGeometry } from '../utils/geometry';
import { createLogger } from '../utils/logger';
import { UNKNOWN_CLASSIFICATION, type Annotation, type GeoJsonValidation } from './types';

const log = createLogger('GEOJSON');

const RESERVED_PROPERTIES = new Set(['classification', 'objectType', 'name']);
const FEATURES_TO_CHECK = 5;

// -------- Classification --------
type RawClassification =
  | { kind: 'named'; name: string | undefined }
  | { kind: 'string'; value: string }
  | { kind: 'missing' };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function readClassification(value: unknown): RawClassification {
  if (isRecord(value)) {
    return { kind: 'named', name: typeof value.name === 'string' ? value.name : undefined };
  }
  if (typeof value === 'string') return { kind: 'string', value };
  return { kind: 'missing' };
}

/**
 * QuPath writes the class as `{ name, color }`, older exports as a bare
 * string; unclassified annotations may only carry their own `name`.
 */
export function parseClassification(properties: Record<string, unknown>): string {
  const classification = readClassification(properties.classification);
  switch (classification.kind) {
    case 'named':
      return classification.name ?? UNKNOWN_CLASSIFICATION;
    case 'string':
      return classification.value;
    case 'missing':
      if (properties.objectType === 'annotation') {
        return typeof properties.name === 'string' ? properties.name : UNKNOWN_CLASSIFICATION;
      }
      return UNKNOWN_CLASSIFICATION;
  }
}

// -------- Feature collection → annotations --------
function featuresOf(collection: unknown): RawFeature[] {
  if (!isRecord(collection) || !Array.isArray(collection.features)) return [];
  return collection.features.filter(isRecord);
}

function extraProperties(properties: Record<string, unknown>): Record<string, unknown> {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(properties)) {
    if (!RESERVED_PROPERTIES.has(key)) extra[`property_${key}`] = value;
  }
  return extra;
}

export function countBy<T>(items: T[], key: (item: T) => string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const k = key(item);
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  return new Map([...counts].sort((a, b) => b[1] - a[1]));
}

/**
 * One annotation per areal feature. Features without a usable Polygon or
 * MultiPolygon geometry are skipped with a warning; point and line
 * annotations cover no tile area and are not carried into the table.
 */
export function geojsonToAnnotations(collection: unknown, coordinateScale = 1.0): Annotation[] {
  const annotations: Annotation[] = [];

  featuresOf(collection).forEach((feature, idx) => {
    const properties = isRecord(feature.properties) ? feature.properties : {};
    const parsed = toAreaGeometry(feature.geometry);
    if (!parsed.ok) {
      log.warn(`Skipping feature ${idx}: ${parsed.reason}`);
      return;
    }

    const { geometry } = parsed;
    const [xMin, yMin, xMax, yMax] = geometryBounds(geometry);
    const centroid = geometryCentroid(geometry);

    annotations.push(Object.freeze({
      classification: parseClassification(properties),
      geometry_type: geometry.type,
      geometry,
      x_min: xMin,
      y_min: yMin,
      x_max: xMax,
      y_max: yMax,
      centroid_x: centroid.x,
      centroid_y: centroid.y,
      area_um2: geometryArea(geometry) * coordinateScale ** 2,
      properties: Object.freeze(extraProperties(properties)),
    }));
  });

  log.info(`Parsed ${annotations.length} annotations`);
  if (annotations.length > 0) {
    const counts = countBy(annotations, a => a.classification);
    log.info(`Classifications: ${JSON.stringify(Object.fromEntries(counts))}`);
  }
  return annotations;
}

// -------- Loading & validation --------
export function parseGeoJsonText(text: string, source = 'GeoJSON'): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new InputError(`${source} is not valid JSON: ${errorMessage(err)}`);
  }
}

export function loadGeoJson(geojsonPath: string): unknown {
  const data = parseGeoJsonText(fs.readFileSync(geojsonPath, 'utf8'), geojsonPath);
  log.info(`Loaded GeoJSON from ${geojsonPath}`);
  log.info(`Features: ${featuresOf(data).length}`);
  return data;
}

/** Structural checks on a QuPath export; only the first few features are inspected. */
export function validateFeatureCollection(data: unknown): GeoJsonValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isRecord(data) || !('type' in data)) {
    errors.push("Missing 'type' field");
  } else if (data.type !== 'FeatureCollection') {
    errors.push(`Expected FeatureCollection, got ${String(data.type)}`);
  } else if (!('features' in data)) {
    errors.push("Missing 'features' field");
  } else if (!Array.isArray(data.features)) {
    errors.push("'features' must be an array");
  } else {
    const features: unknown[] = data.features;
    for (const [i, feature] of features.slice(0, FEATURES_TO_CHECK).entries()) {
      if (!isRecord(feature) || !('geometry' in feature)) {
        errors.push(`Feature ${i} missing geometry`);
        break;
      }
      if (!('properties' in feature)) {
        warnings.push(`Feature ${i} missing properties`);
      }
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

export function reportValidation(result: GeoJsonValidation): void {
  result.warnings.forEach(w => log.warn(w));
  result.errors.forEach(e => log.error(e));
  if (result.valid) log.info('✓ GeoJSON validation passed');
}

export function validateGeoJson(geojsonPath: string): boolean {
  try {
    const result = validateFeatureCollection(loadGeoJson(geojsonPath));
    reportValidation(result);
    return result.valid;
  } catch (err) {
    log.error(`Validation failed: ${errorMessage(err)}`);
    return false;
  }
}

// -------- Annotation table export --------
const ANNOTATION_COLUMNS = [
  'classification', 'geometry_type', 'x_min', 'y_min', 'x_max', 'y_max',
  'centroid_x', 'centroid_y', 'area_um2',
];

const cell = (value: unknown): CsvCell => {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' ? value : String(value);
};

export function annotationsToCsv(annotations: Annotation[]): string {
  const propertyColumns: string[] = [];
  for (const annotation of annotations) {
    for (const key of Object.keys(annotation.properties)) {
      if (!propertyColumns.includes(key)) propertyColumns.push(key);
    }
  }
  const rows = annotations.map(a => {
    const row: Record<string, CsvCell> = {
      classification: a.classification,
      geometry_type: a.geometry_type,
      x_min: a.x_min,
      y_min: a.y_min,
      x_max: a.x_max,
      y_max: a.y_max,
      centroid_x: a.centroid_x,
      centroid_y: a.centroid_y,
      area_um2: a.area_um2,
    };
    for (const key of propertyColumns) row[key] = cell(a.properties[key]);
    return row;
  });
  return toCsv([...ANNOTATION_COLUMNS, ...propertyColumns], rows);
}

import { Router, type Request } from 'express';
import multer from 'multer';
import { labelTiles } from '../annotations/importer';
import { labelDistribution } from '../annotations/matcher';
import { parseGeoJsonText, validateFeatureCollection } from '../annotations/parser';
import { config } from '../config';
import { SpeciesRegistry, speciesRegistry } from '../species/registry';
import { parseTileManifest, tileManifestToCsv } from '../tiles/manifest';
import { InputError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { sendError } from './errors';

const log = createLogger('ANNOTATIONS');

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: config.uploadLimitBytes },
});

function uploadedText(req: Request, field: string): string {
  const files = req.files;
  const file = files && !Array.isArray(files) ? files[field]?.[0] : undefined;
  if (!file) throw new InputError(`Missing '${field}' file upload`);
  return file.buffer.toString('utf8');
}

function numberField(value: unknown, name: string, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) throw new InputError(`'${name}' must be a number`);
  return parsed;
}

// POST /api/annotations/validate
// Body: multipart/form-data with a `geojson` file
// POST /api/annotations/import
// Body: multipart/form-data with `geojson` and `tiles` files, fields
// species, coordinate_scale, overlap_threshold, format (json | csv)

export function createAnnotationsRouter(registry: SpeciesRegistry = speciesRegistry) {
  const annotations = Router();

  annotations.post('/annotations/validate', upload.fields([{ name: 'geojson', maxCount: 1 }]), (req, res) => {
    try {
      const data = parseGeoJsonText(uploadedText(req, 'geojson'));
      res.json(validateFeatureCollection(data));
    } catch (error) {
      sendError(res, log, error, 'Validation failed');
    }
  });

  annotations.post(
    '/annotations/import',
    upload.fields([{ name: 'geojson', maxCount: 1 }, { name: 'tiles', maxCount: 1 }]),
    (req, res) => {
      try {
        const body: Record<string, unknown> = req.body ?? {};
        const species = typeof body.species === 'string' ? body.species.trim() : '';
        if (!species) throw new InputError("Missing 'species' field");

        const collection = parseGeoJsonText(uploadedText(req, 'geojson'));
        const manifest = parseTileManifest(uploadedText(req, 'tiles'));
        const overlapThreshold = numberField(body.overlap_threshold, 'overlap_threshold', config.overlapThreshold);
        if (overlapThreshold < 0 || overlapThreshold > 1) {
          throw new InputError("'overlap_threshold' must be between 0 and 1");
        }

        log.info(`Import request: ${manifest.tiles.length} tiles, species ${species}`);
        const result = labelTiles(collection, manifest.tiles, {
          species,
          coordinateScale: numberField(body.coordinate_scale, 'coordinate_scale', config.coordinateScale),
          overlapThreshold,
          registry,
        });

        if (body.format === 'csv') {
          res.type('text/csv').send(tileManifestToCsv(manifest.header, result.tiles));
          return;
        }

        res.json({
          species: result.species ?? null,
          annotation_count: result.annotations.length,
          tile_count: result.tiles.length,
          distribution: labelDistribution(result.tiles),
          invalid_labels: result.invalidLabels,
          valid_labels: result.validLabels,
          tiles: result.tiles.map(({ columns: _columns, ...tile }) => tile),
        });
      } catch (error) {
        sendError(res, log, error, 'Import failed');
      }
    },
  );

  return annotations;
}

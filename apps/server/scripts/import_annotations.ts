/*
  Import QuPath annotations and label whole-slide image tiles for training

  Each tile receives the classification of the annotation that covers the
  largest share of it, when that share reaches --overlap-threshold.

  Usage:
    # One slide
    npm run import --workspace @follicle-tiles/server -- \
      --geojson data/annotations/slide01_annotations.geojson \
      --tiles data/tiles/slide01.csv \
      --species mouse \
      --out data/labeled/slide01.csv \
      --coordinate-scale 0.25 \
      --review-out data/review/slide01_review.csv

    # Every <slide>_annotations.geojson in a folder, paired with <slide>.csv
    npm run import --workspace @follicle-tiles/server -- \
      --geojson-dir data/annotations \
      --tiles-dir data/tiles \
      --out-dir data/labeled \
      --species "Naked Mole Rat"
*/

import fs from 'node:fs';
import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { annotationsToCsv } from '../src/annotations/parser.js';
import { findSlidePairs, importAnnotations, type ImportResult } from '../src/annotations/importer.js';
import { exportTileLabelsForReview } from '../src/annotations/review.js';
import { labelDistribution } from '../src/annotations/matcher.js';
import { config } from '../src/config.js';
import { registerCustomSpecies } from '../src/species/registry.js';
import { parseSpeciesInfo } from '../src/species/types.js';
import { saveTileManifest } from '../src/tiles/manifest.js';
import { errorMessage } from '../src/utils/errors.js';

// -------- CLI --------
const argv = yargs(hideBin(process.argv))
  .option('geojson', { type:'string', desc:'QuPath GeoJSON export for one slide' })
  .option('tiles', { type:'string', desc:'Tile manifest CSV for that slide (x, y, width, height, ...)' })
  .option('out', { type:'string', desc:'Output labeled manifest CSV' })
  .option('geojson-dir', { type:'string', desc:'Folder of <slide>_annotations.geojson files (batch mode)' })
  .option('tiles-dir', { type:'string', desc:'Folder of <slide>.csv tile manifests (batch mode)' })
  .option('out-dir', { type:'string', desc:'Output folder for labeled manifests (batch mode)' })
  .option('species', { type:'string', demandOption:true, desc:'Species code or name (mouse, rat, "Mus musculus", ...)' })
  .option('coordinate-scale', { type:'number', default: config.coordinateScale, desc:'Microns per pixel' })
  .option('overlap-threshold', { type:'number', default: config.overlapThreshold, desc:'Minimum overlap ratio (0-1) to assign a label' })
  .option('review-out', { type:'string', desc:'Write a review sample CSV (single slide) or folder (batch)' })
  .option('review-size', { type:'number', default: config.reviewSampleSize, desc:'Tiles per review sample' })
  .option('seed', { type:'number', default: config.reviewSeed, desc:'Seed for the review sample' })
  .option('annotations-out', { type:'string', desc:'Also write the parsed annotation table as CSV (single slide)' })
  .option('custom-species', { type:'string', desc:'JSON file with a species definition to register first' })
  .check(args => {
    const single = Boolean(args.geojson || args.tiles || args.out);
    const batch = Boolean(args['geojson-dir'] || args['tiles-dir'] || args['out-dir']);
    if (single === batch) throw new Error('Use either --geojson/--tiles/--out or --geojson-dir/--tiles-dir/--out-dir');
    if (single && !(args.geojson && args.tiles && args.out)) throw new Error('--geojson, --tiles and --out are all required');
    if (batch && !(args['geojson-dir'] && args['tiles-dir'] && args['out-dir'])) {
      throw new Error('--geojson-dir, --tiles-dir and --out-dir are all required');
    }
    const threshold = args['overlap-threshold'];
    if (threshold < 0 || threshold > 1) throw new Error('--overlap-threshold must be between 0 and 1');
    const reviewSize = args['review-size'];
    if (!Number.isInteger(reviewSize) || reviewSize < 1) throw new Error('--review-size must be a positive integer');
    return true;
  })
  .parseSync();

const OVERLAP_THRESHOLD = Number(argv['overlap-threshold']);
const COORDINATE_SCALE = Number(argv['coordinate-scale']);
const REVIEW_SIZE = Number(argv['review-size']);
const SEED = Number(argv.seed);

// -------- Functions --------
function registerFromFile(file: string) {
  const info = parseSpeciesInfo(JSON.parse(fs.readFileSync(path.resolve(file), 'utf8')));
  registerCustomSpecies(info.species_code, info);
}

function runSlide(geojsonPath: string, tilesManifestPath: string, outPath: string): ImportResult {
  const result = importAnnotations({
    geojsonPath,
    tilesManifestPath,
    species: argv.species,
    coordinateScale: COORDINATE_SCALE,
    overlapThreshold: OVERLAP_THRESHOLD,
  });
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  saveTileManifest(outPath, result.header, result.tiles);
  return result;
}

function printSummary(name: string, result: ImportResult) {
  const labeled = result.tiles.filter(t => t.label !== 'background').length;
  console.log(`\n${name}: ${result.annotations.length} annotations, ${labeled}/${result.tiles.length} tiles labeled`);
  for (const { label, count, percent } of labelDistribution(result.tiles)) {
    console.log(`  ${label.padEnd(24)} ${String(count).padStart(6)} (${percent.toFixed(1)}%)`);
  }
  if (result.invalidLabels.length > 0) {
    console.log(`  ⚠ labels outside the ${result.species} vocabulary: ${result.invalidLabels.join(', ')}`);
  }
}

// -------- Main --------
try {
  if (argv['custom-species']) registerFromFile(argv['custom-species']);

  if (argv.geojson && argv.tiles && argv.out) {
    const outPath = path.resolve(argv.out);
    const result = runSlide(path.resolve(argv.geojson), path.resolve(argv.tiles), outPath);
    printSummary(path.basename(argv.geojson), result);

    if (argv['annotations-out']) {
      fs.writeFileSync(path.resolve(argv['annotations-out']), annotationsToCsv(result.annotations));
    }
    if (argv['review-out']) {
      exportTileLabelsForReview(result.tiles, path.resolve(argv['review-out']), REVIEW_SIZE, SEED);
    }
    console.log(`\n✅ Labeled manifest written to ${outPath}`);
  } else if (argv['geojson-dir'] && argv['tiles-dir'] && argv['out-dir']) {
    const outDir = path.resolve(argv['out-dir']);
    const pairs = findSlidePairs(path.resolve(argv['geojson-dir']), path.resolve(argv['tiles-dir']));
    if (pairs.length === 0) {
      console.error('No slides with both annotations and a tile manifest were found');
      process.exit(1);
    }

    let totalTiles = 0;
    for (const pair of pairs) {
      const result = runSlide(pair.geojsonPath, pair.tilesManifestPath, path.join(outDir, `${pair.slide}.csv`));
      printSummary(pair.slide, result);
      totalTiles += result.tiles.length;

      if (argv['review-out']) {
        const reviewDir = path.resolve(argv['review-out']);
        fs.mkdirSync(reviewDir, { recursive: true });
        exportTileLabelsForReview(result.tiles, path.join(reviewDir, `${pair.slide}_review.csv`), REVIEW_SIZE, SEED);
      }
    }
    console.log(`\n✅ Labeled ${totalTiles} tiles across ${pairs.length} slides → ${outDir}`);
  }
} catch (err) {
  console.error('Error:', errorMessage(err));
  process.exit(1);
}

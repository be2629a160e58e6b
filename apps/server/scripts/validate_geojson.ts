/*
  Validate QuPath GeoJSON exports before importing them

  Usage:
    npm run validate --workspace @follicle-tiles/server -- data/annotations/*.geojson
*/

import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { validateGeoJson } from '../src/annotations/parser.js';

const argv = yargs(hideBin(process.argv))
  .usage('$0 <files..>')
  .demandCommand(1, 'Pass at least one GeoJSON file')
  .parseSync();

const files = argv._.map(String);
let failed = 0;

for (const file of files) {
  console.log(`\nChecking ${file}`);
  if (!validateGeoJson(path.resolve(file))) failed++;
}

console.log(`\n${files.length - failed}/${files.length} files passed validation`);
if (failed > 0) process.exit(1);

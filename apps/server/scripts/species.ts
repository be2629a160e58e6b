/*
  Query the species registry

  Usage:
    npm run species --workspace @follicle-tiles/server -- list
    npm run species --workspace @follicle-tiles/server -- info rat
    npm run species --workspace @follicle-tiles/server -- labelmap nmr
    npm run species --workspace @follicle-tiles/server -- compare mouse rat hamster
    npm run species --workspace @follicle-tiles/server -- resolve "Cavia porcellus"
*/

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import {
  compareSpecies,
  getRecommendedTileSize,
  getSpeciesInfo,
  getSpeciesLabelmap,
  listSpecies,
  resolveSpeciesCode,
  validateSpecies,
} from '../src/species/registry.js';

const print = (value: unknown) => console.log(JSON.stringify(value, null, 2));

function requireSpecies(code: string) {
  if (!validateSpecies(code)) {
    console.error(`Unknown species: ${code}`);
    console.error(`Available species: ${listSpecies().join(', ')}`);
    process.exit(1);
  }
}

yargs(hideBin(process.argv))
  .command('list', 'List supported species codes', () => {}, () => {
    for (const code of listSpecies()) {
      const info = getSpeciesInfo(code);
      console.log(`  ${code.padEnd(12)} - ${info?.scientific_name ?? ''} (${info?.common_name ?? ''})`);
    }
  })
  .command('info <code>', 'Show species parameters', y => y.positional('code', { type:'string', demandOption:true }), args => {
    requireSpecies(args.code);
    print(getSpeciesInfo(args.code));
    console.log(`Recommended tile size: ${getRecommendedTileSize(args.code)}px`);
  })
  .command('labelmap <code>', 'Show class index → label mapping', y => y.positional('code', { type:'string', demandOption:true }), args => {
    requireSpecies(args.code);
    print(getSpeciesLabelmap(args.code));
  })
  .command('compare <codes..>', 'Compare species side by side', y => y.positional('codes', { type:'string', array:true, demandOption:true }), args => {
    print(compareSpecies(args.codes));
  })
  .command('resolve <name>', 'Resolve a common/scientific name to a species code', y => y.positional('name', { type:'string', demandOption:true }), args => {
    const code = resolveSpeciesCode(args.name);
    if (code === undefined) {
      console.error(`Could not resolve '${args.name}'`);
      process.exit(1);
    }
    console.log(code);
  })
  .demandCommand(1)
  .strict()
  .parseSync();

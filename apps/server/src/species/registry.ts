import { createLogger, type Logger } from '../utils/logger';
import { BUILTIN_ALIASES, BUILTIN_SPECIES } from './defaults';
import type { Labelmap, SpeciesComparison, SpeciesInfo } from './types';

export const DEFAULT_TILE_SIZE = 256;

const normalizeCode = (code: string) => code.trim().toLowerCase();
export const normalizeSpeciesName = (name: string) =>
  name.trim().toLowerCase().replace(/[\s-]+/g, '_');

/**
 * Species lookup table with name resolution.
 *
 * Entries are read-mostly: `register` mutates the table in place with no
 * locking, so callers sharing one registry across workers must serialize
 * registrations themselves.
 */
export class SpeciesRegistry {
  private readonly entries = new Map<string, SpeciesInfo>();
  private readonly aliases: Map<string, string>;
  private readonly log: Logger;

  constructor(
    species: Iterable<SpeciesInfo> = [],
    aliases: Readonly<Record<string, string>> = {},
    log: Logger = createLogger('SPECIES'),
  ) {
    this.log = log;
    for (const info of species) {
      this.entries.set(normalizeCode(info.species_code), info);
    }
    this.aliases = new Map(Object.entries(aliases).map(([alias, code]) => [normalizeSpeciesName(alias), code]));
  }

  lookup(code: string): SpeciesInfo | undefined {
    const info = this.entries.get(normalizeCode(code));
    if (!info) {
      this.log.warn(`Species '${code}' not found in registry`);
      this.log.info(`Available species: ${this.list().join(', ')}`);
    }
    return info;
  }

  list(): string[] {
    return [...this.entries.keys()];
  }

  has(code: string): boolean {
    return this.entries.has(normalizeCode(code));
  }

  follicleTypes(code: string): string[] {
    const info = this.lookup(code);
    return info ? [...info.typical_follicle_types] : [];
  }

  recommendedTileSize(code: string): number {
    return this.lookup(code)?.recommended_tile_size ?? DEFAULT_TILE_SIZE;
  }

  // Index 0 is background; the rest follow the stored follicle-type order
  labelmap(code: string): Labelmap {
    const info = this.lookup(code);
    if (!info) return {};

    const labelmap: Labelmap = { 0: 'background' };
    info.typical_follicle_types.forEach((type, idx) => {
      labelmap[idx + 1] = type;
    });
    return labelmap;
  }

  compare(codes: string[]): SpeciesComparison {
    const comparison: SpeciesComparison = { species: [], follicle_types: [], ovary_size: [], tile_size: [] };
    for (const code of codes) {
      const info = this.lookup(code);
      if (!info) continue;
      comparison.species.push(info.common_name);
      comparison.follicle_types.push(info.typical_follicle_types.length);
      comparison.ovary_size.push(info.ovary_size_mm);
      comparison.tile_size.push(info.recommended_tile_size);
    }
    return comparison;
  }

  register(code: string, info: SpeciesInfo): void {
    const key = normalizeCode(code);
    if (this.entries.has(key)) {
      this.log.warn(`Overwriting existing species: ${key}`);
    }
    this.entries.set(key, info);
    this.log.info(`Registered custom species: ${key}`);
  }

  resolve(name: string): string | undefined {
    const normalized = normalizeSpeciesName(name);

    if (this.entries.has(normalized)) return normalized;

    const alias = this.aliases.get(normalized);
    if (alias !== undefined) return alias;

    for (const [code, info] of this.entries) {
      if (normalizeSpeciesName(info.scientific_name) === normalized) return code;
      if (normalizeSpeciesName(info.common_name) === normalized) return code;
    }
    return undefined;
  }
}

export const createDefaultRegistry = (log?: Logger) => new SpeciesRegistry(BUILTIN_SPECIES, BUILTIN_ALIASES, log);

// Process-wide registry used by the HTTP API and scripts
export const speciesRegistry = createDefaultRegistry();

export const getSpeciesInfo = (code: string) => speciesRegistry.lookup(code);
export const listSpecies = () => speciesRegistry.list();
export const validateSpecies = (code: string) => speciesRegistry.has(code);
export const getFollicleTypes = (code: string) => speciesRegistry.follicleTypes(code);
export const getRecommendedTileSize = (code: string) => speciesRegistry.recommendedTileSize(code);
export const getSpeciesLabelmap = (code: string) => speciesRegistry.labelmap(code);
export const compareSpecies = (codes: string[]) => speciesRegistry.compare(codes);
export const registerCustomSpecies = (code: string, info: SpeciesInfo) => speciesRegistry.register(code, info);
export const resolveSpeciesCode = (name: string) => speciesRegistry.resolve(name);

import { z } from 'zod';
import { InputError } from '../utils/errors';

export type SizeRange = readonly [number, number];
export type StainNormalization = 'standardize' | 'reinhard' | 'macenko';

export interface SpeciesInfo {
  // Identifiers
  readonly common_name: string;
  readonly scientific_name: string;
  readonly species_code: string; // short code used in filenames ('mouse', 'rat', 'nmr')
  readonly mother_id: string; // MOTHER database identifier

  // Morphology
  readonly typical_follicle_types: readonly string[];
  readonly follicle_size_ranges: Readonly<Record<string, SizeRange>>; // µm
  readonly ovary_size_mm: SizeRange;

  // Analysis parameters
  readonly recommended_tile_size: number;
  readonly recommended_magnification: string;
  readonly stain_normalization: StainNormalization;

  // Dataset info
  readonly available_samples: number;
  readonly age_groups: readonly string[];

  readonly notes: string;
}

export type Labelmap = Record<number, string>;

export interface SpeciesComparison {
  species: string[];
  follicle_types: number[];
  ovary_size: SizeRange[];
  tile_size: number[];
}

const RangeSchema = z.tuple([z.number().nonnegative(), z.number().nonnegative()]);

export const SpeciesInfoSchema = z.object({
  common_name: z.string().min(1),
  scientific_name: z.string().min(1),
  species_code: z.string().min(1),
  mother_id: z.string().default(''),
  typical_follicle_types: z.array(z.string().min(1)),
  follicle_size_ranges: z.record(RangeSchema).default({}),
  ovary_size_mm: RangeSchema,
  recommended_tile_size: z.number().int().positive().default(256),
  recommended_magnification: z.string().default('20x'),
  stain_normalization: z.enum(['standardize', 'reinhard', 'macenko']).default('standardize'),
  available_samples: z.number().int().nonnegative().default(0),
  age_groups: z.array(z.string()).default([]),
  notes: z.string().default(''),
});

/** Builds a SpeciesInfo from untrusted JSON, filling the optional analysis defaults. */
export function parseSpeciesInfo(raw: unknown): SpeciesInfo {
  const parsed = SpeciesInfoSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new InputError('Invalid species definition', issues);
  }
  return parsed.data;
}

import type { SpeciesInfo } from './types';

export const BUILTIN_SPECIES: readonly SpeciesInfo[] = [
  {
    common_name: 'Mouse',
    scientific_name: 'Mus musculus',
    species_code: 'mouse',
    mother_id: 'M-musculus',
    typical_follicle_types: ['primordial', 'primary', 'secondary', 'antral'],
    follicle_size_ranges: {
      primordial: [15, 25],
      primary: [25, 40],
      secondary: [40, 150],
      antral: [150, 400],
    },
    ovary_size_mm: [2, 4],
    recommended_tile_size: 256,
    recommended_magnification: '20x',
    stain_normalization: 'standardize',
    available_samples: 0,
    age_groups: ['juvenile', 'young_adult', 'adult', 'aged'],
    notes: 'Most common laboratory model. Extensive literature available.',
  },
  {
    common_name: 'Rat',
    scientific_name: 'Rattus norvegicus',
    species_code: 'rat',
    mother_id: 'R-norvegicus',
    typical_follicle_types: ['primordial', 'primary', 'secondary', 'antral', 'preovulatory'],
    follicle_size_ranges: {
      primordial: [20, 30],
      primary: [30, 50],
      secondary: [50, 200],
      antral: [200, 600],
      preovulatory: [600, 1000],
    },
    ovary_size_mm: [4, 7],
    recommended_tile_size: 512,
    recommended_magnification: '10x',
    stain_normalization: 'standardize',
    available_samples: 0,
    age_groups: ['juvenile', 'young_adult', 'adult', 'aged'],
    notes: 'Larger follicles than mouse. May need larger tiles.',
  },
  {
    common_name: 'Naked Mole Rat',
    scientific_name: 'Heterocephalus glaber',
    species_code: 'nmr',
    mother_id: 'H-glaber',
    typical_follicle_types: [
      'primordial', 'transitional_primordial', 'primary',
      'transitional_primary', 'secondary', 'multilayer',
    ],
    follicle_size_ranges: {
      primordial: [15, 25],
      transitional_primordial: [20, 30],
      primary: [25, 40],
      transitional_primary: [35, 50],
      secondary: [45, 80],
      multilayer: [80, 150],
    },
    ovary_size_mm: [1, 3],
    recommended_tile_size: 256,
    recommended_magnification: '20x',
    stain_normalization: 'standardize',
    available_samples: 0,
    age_groups: ['juvenile', 'adult'],
    notes: 'Unique reproductive biology. Limited antral development.',
  },
  {
    common_name: 'Guinea Pig',
    scientific_name: 'Cavia porcellus',
    species_code: 'guinea_pig',
    mother_id: 'C-porcellus',
    typical_follicle_types: ['primordial', 'primary', 'secondary', 'antral'],
    follicle_size_ranges: {
      primordial: [20, 35],
      primary: [35, 60],
      secondary: [60, 250],
      antral: [250, 800],
    },
    ovary_size_mm: [5, 10],
    recommended_tile_size: 512,
    recommended_magnification: '10x',
    stain_normalization: 'standardize',
    available_samples: 0,
    age_groups: ['juvenile', 'adult'],
    notes: 'Large ovaries with prominent antral follicles.',
  },
  {
    common_name: 'Syrian Hamster',
    scientific_name: 'Mesocricetus auratus',
    species_code: 'hamster',
    mother_id: 'M-auratus',
    typical_follicle_types: ['primordial', 'primary', 'secondary', 'antral'],
    follicle_size_ranges: {
      primordial: [15, 25],
      primary: [25, 45],
      secondary: [45, 180],
      antral: [180, 500],
    },
    ovary_size_mm: [3, 5],
    recommended_tile_size: 256,
    recommended_magnification: '20x',
    stain_normalization: 'standardize',
    available_samples: 0,
    age_groups: ['juvenile', 'adult'],
    notes: 'Regular estrous cycles. Good model for reproductive studies.',
  },
];

// Alternative spellings, already normalized (lower case, '_' separators)
export const BUILTIN_ALIASES: Readonly<Record<string, string>> = {
  mus_musculus: 'mouse',
  m_musculus: 'mouse',
  rattus_norvegicus: 'rat',
  r_norvegicus: 'rat',
  heterocephalus_glaber: 'nmr',
  h_glaber: 'nmr',
  naked_mole_rat: 'nmr',
  cavia_porcellus: 'guinea_pig',
  c_porcellus: 'guinea_pig',
  mesocricetus_auratus: 'hamster',
  m_auratus: 'hamster',
  syrian_hamster: 'hamster',
};

import type { SpeciesInfo } from '../types/analysis.js';

/**
 * Species the inference backends have models for. Uploads for anything else
 * are refused before an artifact is created.
 */
export const SUPPORTED_SPECIES: SpeciesInfo[] = [
  {
    id: 'canis_lupus',
    common_name: 'Gray wolf',
    default_tags: ['mating_call', 'territorial'],
  },
  {
    id: 'panthera_leo',
    common_name: 'Lion',
    default_tags: ['territorial'],
  },
  {
    id: 'delphinus_delphis',
    common_name: 'Common dolphin',
    default_tags: ['contact_call'],
  },
  {
    id: 'gorilla_gorilla',
    common_name: 'Western gorilla',
    default_tags: ['aggression'],
  },
  {
    id: 'elephas_maximus',
    common_name: 'Asian elephant',
    default_tags: ['contact_call', 'rumble'],
  },
  {
    id: 'corvus_brachyrhynchos',
    common_name: 'American crow',
    default_tags: ['alarm_call'],
  },
];

const SPECIES_LOOKUP = new Map(SUPPORTED_SPECIES.map((species) => [species.id, species]));

export function getSpecies(id: string): SpeciesInfo | null {
  return SPECIES_LOOKUP.get(id) || null;
}

export function isSupportedSpecies(id: string): boolean {
  return SPECIES_LOOKUP.has(id);
}

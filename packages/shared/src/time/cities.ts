import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { cityFileSchema, describeIssues } from '../schemas';
import type { City } from '../types';

export const DEFAULT_CITIES_FILE = fileURLToPath(new URL('../../data/cities.json', import.meta.url));

export function parseCities(raw: unknown, source = 'cities'): readonly City[] {
  const result = cityFileSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid city directory in ${source}: ${describeIssues(result.error)}`);
  }
  return Object.freeze(result.data);
}

export function loadCities(file: string = DEFAULT_CITIES_FILE): readonly City[] {
  return parseCities(JSON.parse(readFileSync(file, 'utf8')), file);
}

/**
 * Find a city by name (case-insensitive) or by its 1-based position in `cities`
 */
export function findCity(input: string, cities: readonly City[]): City | undefined {
  const wanted = input.trim();
  if (/^\d+$/.test(wanted)) {
    return cities[Number(wanted) - 1];
  }
  return cities.find((city) => city.name.toLowerCase() === wanted.toLowerCase());
}

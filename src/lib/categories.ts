import type { AqiCategory, CategoryCountTable, CategoryResult, Dataset, Observation } from '../types';
import { CATEGORY_NAMES } from '../types';
import { InvalidCategoryError } from './errors';

/** CPCB AQI bands, ordered from best to worst. */
export const AQI_CATEGORIES: readonly AqiCategory[] = [
  { name: 'GOOD', lowerBound: 0, upperBound: 50, color: '#10b981' },
  { name: 'SATISFACTORY', lowerBound: 51, upperBound: 100, color: '#84cc16' },
  { name: 'MODERATE', lowerBound: 101, upperBound: 200, color: '#eab308' },
  { name: 'POOR', lowerBound: 201, upperBound: 300, color: '#f97316' },
  { name: 'VERY POOR', lowerBound: 301, upperBound: 400, color: '#ef4444' },
  { name: 'SEVERE', lowerBound: 401, upperBound: null, color: '#9333ea' },
];

/**
 * Look up a band by name (case-insensitive, surrounding whitespace ignored).
 * Throws {@link InvalidCategoryError} for anything outside the enumeration.
 */
export function findCategory(name: string): AqiCategory {
  const wanted = name.trim().toUpperCase();
  const category = AQI_CATEGORIES.find(c => c.name === wanted);
  if (!category) throw new InvalidCategoryError(name, CATEGORY_NAMES);
  return category;
}

/**
 * The band an AQI value falls in, or null for absent and negative values.
 *
 * A value belongs to the first band whose upper bound it does not exceed, so
 * fractional readings between two integer bands (e.g. 50.5) go to the higher
 * band and the six bands cover `[0, ∞)` without gaps.
 */
export function categoryFor(aqi: number | null): AqiCategory | null {
  if (aqi === null || Number.isNaN(aqi) || aqi < 0) return null;
  for (const category of AQI_CATEGORIES) {
    if (category.upperBound === null || aqi <= category.upperBound) return category;
  }
  return null;
}

export function isInCategory(aqi: number | null, category: AqiCategory): boolean {
  return categoryFor(aqi)?.name === category.name;
}

/** Count observations per (location, year) over every location and year of the dataset. */
export function countByLocationAndYear(dataset: Dataset, matches: Observation[]): CategoryCountTable {
  const years: number[] = [];
  for (let year = dataset.years.start; year <= dataset.years.end; year++) years.push(year);

  const rows = dataset.locations.map(location => ({ location, counts: years.map(() => 0) }));
  const rowIndex = new Map(dataset.locations.map((location, i) => [location, i]));

  for (const obs of matches) {
    const row = rowIndex.get(obs.location);
    const col = obs.year - dataset.years.start;
    if (row === undefined || col < 0 || col >= years.length) continue;
    rows[row].counts[col] += 1;
  }

  return { locations: [...dataset.locations], years, rows };
}

/**
 * Filter the canonical dataset to one AQI band.
 * The listing keeps canonical (date-ascending) order; an empty listing is valid.
 */
export function classifyByCategory(dataset: Dataset, name: string): CategoryResult {
  const category = findCategory(name);
  const observations = dataset.observations.filter(obs => isInCategory(obs.aqi, category));
  return { category, observations, counts: countByLocationAndYear(dataset, observations) };
}

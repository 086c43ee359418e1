import { describe, expect, it } from 'vitest';
import type { Dataset, Observation } from '../types';
import { CATEGORY_NAMES } from '../types';
import { AQI_CATEGORIES, categoryFor, classifyByCategory, findCategory, isInCategory } from './categories';
import { InvalidCategoryError } from './errors';

function obs(location: string, month: string, year: number, aqi: number | null, date: string): Observation {
  return { location, month, year, aqi, date };
}

const dataset: Dataset = {
  years: { start: 2016, end: 2017 },
  locations: ['A', 'B'],
  observations: [
    obs('A', 'Jan', 2016, 40, '2016-01-01'),
    obs('B', 'Jan', 2016, null, '2016-01-01'),
    obs('A', 'Feb', 2016, 120, '2016-02-01'),
    obs('B', 'Feb', 2016, 45, '2016-02-01'),
    obs('A', 'Jan', 2017, 30, '2017-01-01'),
    obs('B', 'Jan', 2017, 450, '2017-01-01'),
  ],
};

describe('findCategory', () => {
  it('returns the band with its inclusive bounds', () => {
    expect(findCategory('MODERATE')).toMatchObject({ name: 'MODERATE', lowerBound: 101, upperBound: 200 });
    expect(findCategory('SEVERE').upperBound).toBeNull();
  });

  it('ignores case and surrounding whitespace', () => {
    expect(findCategory(' very poor ').name).toBe('VERY POOR');
  });

  it('rejects names outside the enumeration and lists the valid ones', () => {
    expect(() => findCategory('EXCELLENT')).toThrow(InvalidCategoryError);
    try {
      findCategory('EXCELLENT');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidCategoryError);
      if (err instanceof InvalidCategoryError) {
        expect(err.category).toBe('EXCELLENT');
        expect(err.validCategories).toEqual(CATEGORY_NAMES);
        expect(err.message).toBe(
          'Unknown AQI category "EXCELLENT". Valid categories: GOOD, SATISFACTORY, MODERATE, POOR, VERY POOR, SEVERE',
        );
      }
    }
  });
});

describe('categoryFor', () => {
  it.each([
    [0, 'GOOD'],
    [50, 'GOOD'],
    [50.5, 'SATISFACTORY'],
    [51, 'SATISFACTORY'],
    [100, 'SATISFACTORY'],
    [101, 'MODERATE'],
    [200, 'MODERATE'],
    [201, 'POOR'],
    [300, 'POOR'],
    [301, 'VERY POOR'],
    [400, 'VERY POOR'],
    [401, 'SEVERE'],
    [5000, 'SEVERE'],
  ])('places %d in %s', (aqi, name) => {
    expect(categoryFor(aqi)?.name).toBe(name);
  });

  it('places absent and negative values in no band', () => {
    expect(categoryFor(null)).toBeNull();
    expect(categoryFor(-1)).toBeNull();
  });

  it('puts every non-negative value in exactly one band', () => {
    for (let aqi = 0; aqi <= 1000; aqi += 0.5) {
      const matches = AQI_CATEGORIES.filter(c => isInCategory(aqi, c));
      expect(matches).toHaveLength(1);
    }
  });

  it('agrees with the inclusive bounds for integer readings', () => {
    for (let aqi = 0; aqi <= 600; aqi++) {
      const band = categoryFor(aqi);
      expect(band).not.toBeNull();
      if (band) {
        expect(aqi).toBeGreaterThanOrEqual(band.lowerBound);
        if (band.upperBound !== null) expect(aqi).toBeLessThanOrEqual(band.upperBound);
      }
    }
  });
});

describe('classifyByCategory', () => {
  it('keeps canonical order in the listing', () => {
    const result = classifyByCategory(dataset, 'GOOD');
    expect(result.category.name).toBe('GOOD');
    expect(result.observations).toEqual([
      obs('A', 'Jan', 2016, 40, '2016-01-01'),
      obs('B', 'Feb', 2016, 45, '2016-02-01'),
      obs('A', 'Jan', 2017, 30, '2017-01-01'),
    ]);
  });

  it('counts per location and year, zero-filling pairs with no match', () => {
    const { counts } = classifyByCategory(dataset, 'GOOD');
    expect(counts.locations).toEqual(['A', 'B']);
    expect(counts.years).toEqual([2016, 2017]);
    expect(counts.rows).toEqual([
      { location: 'A', counts: [1, 1] },
      { location: 'B', counts: [1, 0] },
    ]);

    const severe = classifyByCategory(dataset, 'SEVERE');
    expect(severe.counts.rows).toEqual([
      { location: 'A', counts: [0, 0] },
      { location: 'B', counts: [0, 1] },
    ]);
  });

  it('count totals match the listing for every band', () => {
    for (const name of CATEGORY_NAMES) {
      const result = classifyByCategory(dataset, name);
      const total = result.counts.rows.reduce((sum, row) => sum + row.counts.reduce((a, b) => a + b, 0), 0);
      expect(total).toBe(result.observations.length);
    }
  });

  it('returns an empty listing and all-zero counts when nothing matches', () => {
    const result = classifyByCategory(dataset, 'VERY POOR');
    expect(result.observations).toEqual([]);
    expect(result.counts.rows.every(row => row.counts.every(c => c === 0))).toBe(true);
  });

  it('excludes absent readings from every band', () => {
    const classified = CATEGORY_NAMES.flatMap(name => classifyByCategory(dataset, name).observations);
    expect(classified).toHaveLength(5);
    expect(classified.some(o => o.aqi === null)).toBe(false);
  });

  it('throws InvalidCategoryError for an unknown band', () => {
    expect(() => classifyByCategory(dataset, 'HAZARDOUS')).toThrow(InvalidCategoryError);
  });
});

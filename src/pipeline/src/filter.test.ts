import { describe, it, expect } from 'vitest';
import { FilterCriteria } from '@review-lens/shared';
import { filterOptions, filterReviews, parseFilterCriteria } from './filter.js';
import { InvalidCriteriaError } from './errors.js';
import { buildTable } from './__tests__/helpers.js';

const table = buildTable([
  { app_name: 'Maps', app_category: 'Navigation', rating: '4.3', review_date: '2024-01-01' },
  { app_name: 'Maps', app_category: 'Navigation', rating: '4.4', review_date: '2024-06-30' },
  { app_name: 'Chess', app_category: 'Games', rating: '4.5', review_date: 'unknown' },
  { app_name: 'Chess', app_category: 'Games', rating: '5', review_date: '2024-07-01' },
  { app_name: 'Radio', app_category: 'Music', rating: '2', review_date: '2023-12-31' },
]);

describe('filterReviews', () => {
  it('should return every row when nothing is constrained', () => {
    expect(filterReviews(table, {})).toEqual(table);
    expect(filterReviews(table, { appName: 'All', category: 'All' })).toEqual(table);
  });

  it('should match app and category exactly', () => {
    expect(filterReviews(table, { appName: 'Maps' }).map((review) => review.rating)).toEqual([4.3, 4.4]);
    expect(filterReviews(table, { category: 'Games' }).map((review) => review.appName)).toEqual(['Chess', 'Chess']);
    expect(filterReviews(table, { appName: 'maps' })).toEqual([]);
  });

  it('should include both rating bounds', () => {
    const view = filterReviews(table, { ratingRange: [4.4, 5.0] });

    expect(view.map((review) => review.rating)).toEqual([4.4, 4.5, 5]);
    expect(view.map((review) => review.ratingCategory)).toEqual(['Good', 'Excellent', 'Excellent']);
  });

  it('should include both date bounds and drop unknown dates', () => {
    const view = filterReviews(table, { dateRange: ['2024-01-01', '2024-07-01'] });

    expect(view.map((review) => review.rating)).toEqual([4.3, 4.4, 5]);
  });

  it('should keep unknown dates when no date range is set', () => {
    expect(filterReviews(table, { category: 'Games' })).toHaveLength(2);
  });

  it('should AND constraints so chained filters give the same view', () => {
    const appOnly: FilterCriteria = { appName: 'Chess' };
    const ratingOnly: FilterCriteria = { ratingRange: [4.8, 5] };

    const combined = filterReviews(table, { ...appOnly, ...ratingOnly });
    const chained = filterReviews(filterReviews(table, appOnly), ratingOnly);

    expect(combined).toEqual(chained);
    expect(combined.map((review) => review.rating)).toEqual([5]);
  });

  it('should return an empty view when nothing matches', () => {
    const view = filterReviews(table, { category: 'Music', ratingRange: [3, 5] });

    expect(view).toEqual([]);
    expect(Object.isFrozen(view)).toBe(true);
  });

  it('should not alter the base table', () => {
    filterReviews(table, { appName: 'Maps' });

    expect(table).toHaveLength(5);
    expect(Object.isFrozen(table)).toBe(true);
  });
});

describe('parseFilterCriteria', () => {
  it('should accept well-formed criteria', () => {
    const criteria = { appName: 'Maps', ratingRange: [1, 5], dateRange: ['2024-01-01', '2024-12-31'] };

    expect(parseFilterCriteria(criteria)).toEqual(criteria);
  });

  it('should reject reversed rating ranges', () => {
    expect(() => parseFilterCriteria({ ratingRange: [5, 1] })).toThrow(InvalidCriteriaError);
  });

  it('should reject dates that do not exist', () => {
    try {
      parseFilterCriteria({ dateRange: ['2024-02-30', '2024-03-01'] });
      expect.unreachable('parseFilterCriteria should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidCriteriaError);
      if (error instanceof InvalidCriteriaError) {
        expect(error.issues).toEqual(['dateRange: 2024-02-30 is not a calendar date']);
      }
    }
  });

  it('should reject unknown keys', () => {
    expect(() => parseFilterCriteria({ language: 'en' })).toThrow(InvalidCriteriaError);
  });
});

describe('filterOptions', () => {
  it('should list sorted choices with All first and the known date span', () => {
    expect(filterOptions(table)).toEqual({
      apps: ['All', 'Chess', 'Maps', 'Radio'],
      categories: ['All', 'Games', 'Music', 'Navigation'],
      ratingBounds: [1, 5],
      ratingStep: 0.1,
      dateBounds: ['2023-12-31', '2024-07-01'],
    });
  });

  it('should omit date bounds when no date is known', () => {
    const undated = buildTable([{ review_date: '' }]);

    expect(filterOptions(undated).dateBounds).toBeUndefined();
  });
});

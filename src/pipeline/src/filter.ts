import {
  ALL_OPTION,
  EnrichedReview,
  FilterCriteria,
  FilterCriteriaSchema,
  RATING_MAX,
  RATING_MIN,
  ReviewTable,
  ReviewView,
  parseIsoDate,
} from '@review-lens/shared';
import { InvalidCriteriaError } from './errors.js';

export type ReviewPredicate = (review: EnrichedReview) => boolean;

export interface FilterOptions {
  apps: readonly string[];
  categories: readonly string[];
  ratingBounds: readonly [number, number];
  ratingStep: number;
  /** Earliest and latest known review dates, if any row has one */
  dateBounds?: readonly [string, string];
}

function isConstrained(value: string | undefined): value is string {
  return value !== undefined && value !== ALL_OPTION;
}

/**
 * Turn criteria into the list of predicates that restrict a view.
 * Absent and "All" constraints contribute nothing.
 */
export function buildPredicates(criteria: FilterCriteria): ReviewPredicate[] {
  const predicates: ReviewPredicate[] = [];
  const { appName, category, ratingRange, dateRange } = criteria;

  if (isConstrained(appName)) {
    predicates.push((review) => review.appName === appName);
  }

  if (isConstrained(category)) {
    predicates.push((review) => review.appCategory === category);
  }

  if (ratingRange) {
    const [lo, hi] = ratingRange;
    predicates.push((review) => review.rating >= lo && review.rating <= hi);
  }

  if (dateRange) {
    const [start, end] = dateRange;
    // Rows with an unknown date never fall inside a date window
    predicates.push((review) =>
      review.reviewDate.kind === 'date'
      && review.reviewDate.iso >= start
      && review.reviewDate.iso <= end
    );
  }

  return predicates;
}

/**
 * Apply criteria to a table. Returns a new frozen view, possibly empty.
 */
export function filterReviews(table: ReviewTable | ReviewView, criteria: FilterCriteria): ReviewView {
  const predicates = buildPredicates(criteria);
  return Object.freeze(table.filter((review) => predicates.every((predicate) => predicate(review))));
}

/**
 * Validate criteria from an untrusted caller
 */
export function parseFilterCriteria(input: unknown): FilterCriteria {
  const result = FilterCriteriaSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidCriteriaError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }

  const { dateRange } = result.data;
  if (dateRange) {
    const invalid = dateRange.filter((value) => parseIsoDate(value) === undefined);
    if (invalid.length > 0) {
      throw new InvalidCriteriaError(invalid.map((value) => `dateRange: ${value} is not a calendar date`));
    }
  }

  return result.data;
}

function distinctSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Values the presentation layer offers as filter controls
 */
export function filterOptions(table: ReviewTable): FilterOptions {
  let minDate: string | undefined;
  let maxDate: string | undefined;

  for (const review of table) {
    if (review.reviewDate.kind !== 'date') {
      continue;
    }
    const iso = review.reviewDate.iso;
    if (minDate === undefined || iso < minDate) minDate = iso;
    if (maxDate === undefined || iso > maxDate) maxDate = iso;
  }

  return {
    apps: [ALL_OPTION, ...distinctSorted(table.map((review) => review.appName))],
    categories: [ALL_OPTION, ...distinctSorted(table.map((review) => review.appCategory))],
    ratingBounds: [RATING_MIN, RATING_MAX],
    ratingStep: 0.1,
    ...(minDate !== undefined && maxDate !== undefined ? { dateBounds: [minDate, maxDate] as const } : {}),
  };
}

import {
  AGE_GROUPS,
  AgeGroup,
  RATING_CATEGORIES,
  RATING_MAX,
  RATING_MIN,
  RatingCategory,
  ReviewView,
} from '@review-lens/shared';
import { mean, quantile } from './stats.js';

/**
 * Result of an aggregate that may have no meaningful value for a view
 */
export type Aggregate<T> =
  | { applicable: true; value: T }
  | { applicable: false; reason: string };

export interface CategoryCount {
  category: RatingCategory;
  count: number;
}

export interface AppCount {
  appName: string;
  count: number;
}

export interface GroupMean<K extends string = string> {
  key: K;
  meanRating: number;
  count: number;
}

export interface CategoryRating {
  category: string;
  meanRating: number;
}

export interface HistogramBin {
  /** Inclusive lower edge */
  from: number;
  /** Exclusive upper edge, inclusive for the last bin */
  to: number;
  count: number;
}

export interface RatingSpread {
  category: string;
  count: number;
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
}

export const DEFAULT_TOP_APPS = 10;
export const DEFAULT_HISTOGRAM_BINS = 20;

const EMPTY_VIEW = 'no reviews match the current filters';

function notApplicable<T>(reason: string): Aggregate<T> {
  return { applicable: false, reason };
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function groupRatings<K extends string>(
  view: ReviewView,
  keyOf: (review: ReviewView[number]) => K | null
): Map<K, number[]> {
  const groups = new Map<K, number[]>();
  for (const review of view) {
    const key = keyOf(review);
    if (key === null) {
      continue;
    }
    const ratings = groups.get(key);
    if (ratings) {
      ratings.push(review.rating);
    } else {
      groups.set(key, [review.rating]);
    }
  }
  return groups;
}

function groupMeans<K extends string>(groups: Map<K, number[]>): GroupMean<K>[] {
  const means: GroupMean<K>[] = [];
  for (const [key, ratings] of groups) {
    const value = mean(ratings);
    if (value !== undefined) {
      means.push({ key, meanRating: value, count: ratings.length });
    }
  }
  return means;
}

export function reviewCount(view: ReviewView): number {
  return view.length;
}

export function meanRating(view: ReviewView): Aggregate<number> {
  const value = mean(view.map((review) => review.rating));
  return value === undefined ? notApplicable(EMPTY_VIEW) : { applicable: true, value };
}

export function distinctAppCount(view: ReviewView): number {
  return new Set(view.map((review) => review.appName)).size;
}

export function distinctLanguageCount(view: ReviewView): number {
  return new Set(view.map((review) => review.reviewLanguage)).size;
}

/**
 * Reviews per rating category in label order, zero-filled
 */
export function ratingCategoryDistribution(view: ReviewView): CategoryCount[] {
  const counts = new Map<RatingCategory, number>();
  for (const review of view) {
    if (review.ratingCategory !== null) {
      counts.set(review.ratingCategory, (counts.get(review.ratingCategory) ?? 0) + 1);
    }
  }
  return RATING_CATEGORIES.map((category) => ({ category, count: counts.get(category) ?? 0 }));
}

/**
 * Most reviewed apps, by descending count then app name
 */
export function topApps(view: ReviewView, limit: number = DEFAULT_TOP_APPS): AppCount[] {
  const counts = new Map<string, number>();
  for (const review of view) {
    counts.set(review.appName, (counts.get(review.appName) ?? 0) + 1);
  }

  return [...counts]
    .map(([appName, count]) => ({ appName, count }))
    .sort((a, b) => b.count - a.count || compareText(a.appName, b.appName))
    .slice(0, Math.max(0, limit));
}

export function meanRatingByCategory(view: ReviewView): GroupMean[] {
  return groupMeans(groupRatings(view, (review) => review.appCategory))
    .sort((a, b) => compareText(a.key, b.key));
}

/**
 * Mean rating per age group, lowest first. Rows without an age bucket are skipped.
 */
export function meanRatingByAgeGroup(view: ReviewView): GroupMean<AgeGroup>[] {
  return groupMeans(groupRatings(view, (review) => review.ageGroup))
    .sort((a, b) => a.meanRating - b.meanRating || AGE_GROUPS.indexOf(a.key) - AGE_GROUPS.indexOf(b.key));
}

function extremeCategory(view: ReviewView, direction: 1 | -1): Aggregate<CategoryRating> {
  const means = meanRatingByCategory(view);
  const [first] = means;
  if (first === undefined) {
    return notApplicable(EMPTY_VIEW);
  }
  if (means.every((group) => group.meanRating === first.meanRating)) {
    return notApplicable('categories do not differ in mean rating');
  }

  // `means` is sorted by name, so the first strict improvement wins ties
  let best = first;
  for (const group of means) {
    if ((group.meanRating - best.meanRating) * direction > 0) {
      best = group;
    }
  }

  return { applicable: true, value: { category: best.key, meanRating: best.meanRating } };
}

export function bestCategory(view: ReviewView): Aggregate<CategoryRating> {
  return extremeCategory(view, 1);
}

export function worstCategory(view: ReviewView): Aggregate<CategoryRating> {
  return extremeCategory(view, -1);
}

/**
 * Equal-width rating histogram over the full rating scale
 */
export function ratingHistogram(view: ReviewView, bins: number = DEFAULT_HISTOGRAM_BINS): HistogramBin[] {
  const binCount = Math.max(1, Math.floor(bins));
  const span = RATING_MAX - RATING_MIN;
  const counts = new Array<number>(binCount).fill(0);

  for (const review of view) {
    if (review.rating < RATING_MIN || review.rating > RATING_MAX) {
      continue;
    }
    // Small epsilon keeps values sitting on an edge in the upper bin
    const position = ((review.rating - RATING_MIN) * binCount) / span;
    const index = Math.min(binCount - 1, Math.floor(position + 1e-9));
    counts[index] = (counts[index] ?? 0) + 1;
  }

  return counts.map((count, i) => ({
    from: RATING_MIN + (span * i) / binCount,
    to: RATING_MIN + (span * (i + 1)) / binCount,
    count,
  }));
}

/**
 * Five-number rating summary per app category, for box plots
 */
export function ratingSpreadByCategory(view: ReviewView): RatingSpread[] {
  const spreads: RatingSpread[] = [];

  for (const [category, ratings] of groupRatings(view, (review) => review.appCategory)) {
    const min = quantile(ratings, 0);
    const q1 = quantile(ratings, 0.25);
    const med = quantile(ratings, 0.5);
    const q3 = quantile(ratings, 0.75);
    const max = quantile(ratings, 1);
    if (min === undefined || q1 === undefined || med === undefined || q3 === undefined || max === undefined) {
      continue;
    }
    spreads.push({ category, count: ratings.length, min, q1, median: med, q3, max });
  }

  return spreads.sort((a, b) => compareText(a.category, b.category));
}

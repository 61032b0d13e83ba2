import {
  AGE_GROUPS,
  AgeGroup,
  EnrichedReview,
  RATING_CATEGORIES,
  RatingCategory,
  Review,
  ReviewTable,
} from '@review-lens/shared';

/**
 * Bucket edges: bin 0 is [edges[0], edges[1]], every later bin i is (edges[i], edges[i + 1]]
 */
export const RATING_EDGES = [Number.NEGATIVE_INFINITY, 1.9, 2.9, 3.9, 4.4, 5.0] as const;
export const AGE_EDGES = [0, 17, 24, 34, 49, 100] as const;

export function bucketize<L extends string>(
  value: number,
  edges: readonly number[],
  labels: readonly L[]
): L | null {
  if (Number.isNaN(value)) {
    return null;
  }

  for (let i = 0; i < labels.length; i++) {
    const lo = edges[i];
    const hi = edges[i + 1];
    const label = labels[i];
    if (lo === undefined || hi === undefined || label === undefined) {
      break;
    }
    const aboveLow = i === 0 ? value >= lo : value > lo;
    if (aboveLow && value <= hi) {
      return label;
    }
  }

  return null;
}

export function ratingCategoryOf(rating: number): RatingCategory | null {
  return bucketize(rating, RATING_EDGES, RATING_CATEGORIES);
}

export function ageGroupOf(age: number): AgeGroup | null {
  return bucketize(age, AGE_EDGES, AGE_GROUPS);
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}

export function enrichReview(review: Review): EnrichedReview {
  const date = review.reviewDate;

  return Object.freeze({
    ...review,
    // Code points, so an emoji counts once
    reviewLength: Array.from(review.reviewText).length,
    reviewWordCount: countWords(review.reviewText),
    reviewYear: date.kind === 'date' ? date.year : undefined,
    reviewMonth: date.kind === 'date' ? date.month : undefined,
    ratingCategory: ratingCategoryOf(review.rating),
    ageGroup: ageGroupOf(review.userAge),
  });
}

/**
 * Derive text, time and bucket columns. Pure and deterministic.
 */
export function enrich(reviews: readonly Review[]): ReviewTable {
  return Object.freeze(reviews.map(enrichReview));
}

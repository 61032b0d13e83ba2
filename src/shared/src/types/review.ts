import { z } from 'zod';

/**
 * Columns a review dataset must carry, as they appear in the CSV header
 */
export const REVIEW_COLUMNS = [
  'app_name',
  'app_category',
  'review_text',
  'rating',
  'user_age',
  'user_country',
  'user_gender',
  'app_version',
  'num_helpful_votes',
  'review_date',
  'review_language',
] as const;

export type ReviewColumn = typeof REVIEW_COLUMNS[number];

export type RawCell = string | number | boolean | null | undefined;
export type RawRow = Readonly<Record<string, RawCell>>;

export interface RawTable {
  readonly columns: readonly string[];
  readonly rows: readonly RawRow[];
}

export interface CalendarDate {
  readonly kind: 'date';
  readonly year: number;
  readonly month: number;
  readonly day: number;
  /** `YYYY-MM-DD`, sortable as a plain string */
  readonly iso: string;
}

export interface UnknownDate {
  readonly kind: 'unknown';
}

export type ReviewDate = CalendarDate | UnknownDate;

export const UNKNOWN_DATE: UnknownDate = Object.freeze({ kind: 'unknown' });

/** Placeholder for categorical values missing from the source */
export const UNKNOWN_VALUE = 'Unknown';

export interface Review {
  readonly appName: string;
  readonly appCategory: string;
  readonly reviewText: string;
  readonly rating: number;
  readonly userAge: number;
  readonly userCountry: string;
  readonly userGender: string;
  readonly appVersion: string;
  readonly helpfulVotes: number;
  readonly reviewDate: ReviewDate;
  readonly reviewLanguage: string;
}

export const RATING_CATEGORIES = ['Very Poor', 'Poor', 'Average', 'Good', 'Excellent'] as const;
export type RatingCategory = typeof RATING_CATEGORIES[number];

export const AGE_GROUPS = ['Teen', 'Young Adult', 'Adult', 'Middle Age', 'Senior'] as const;
export type AgeGroup = typeof AGE_GROUPS[number];

export interface EnrichedReview extends Review {
  readonly reviewLength: number;
  readonly reviewWordCount: number;
  readonly reviewYear: number | undefined;
  readonly reviewMonth: number | undefined;
  /** `null` when the rating falls outside every bucket */
  readonly ratingCategory: RatingCategory | null;
  readonly ageGroup: AgeGroup | null;
}

export type ReviewTable = readonly EnrichedReview[];

/** Read-only subset of the enriched table */
export type ReviewView = readonly EnrichedReview[];

/** Selector value meaning "no constraint" */
export const ALL_OPTION = 'All';

export const RATING_MIN = 1.0;
export const RATING_MAX = 5.0;

const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Dates must be formatted as YYYY-MM-DD');

export const FilterCriteriaSchema = z.object({
  appName: z.string().min(1).optional(),
  category: z.string().min(1).optional(),
  ratingRange: z.tuple([z.number(), z.number()])
    .refine(([lo, hi]) => lo <= hi, 'Rating range lower bound must not exceed upper bound')
    .optional(),
  dateRange: z.tuple([isoDateSchema, isoDateSchema])
    .refine(([start, end]) => start <= end, 'Date range start must not be after its end')
    .optional(),
}).strict();

export type FilterCriteria = z.infer<typeof FilterCriteriaSchema>;

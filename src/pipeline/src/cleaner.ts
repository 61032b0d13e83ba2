import {
  RawCell,
  RawRow,
  RawTable,
  Review,
  REVIEW_COLUMNS,
  RATING_MIN,
  RATING_MAX,
  UNKNOWN_VALUE,
  parseReviewDate,
} from '@review-lens/shared';
import { StructuralError } from './errors.js';
import { median } from './stats.js';

// Tokens CSV exports commonly use for "no value"
const NA_TOKENS = new Set(['NA', 'N/A', 'n/a', 'NaN', 'nan', '-NaN', 'null', 'NULL', 'None', '#N/A', '<NA>']);
const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

// Used only when a column has no valid value at all
const FALLBACK_RATING = 3;
const FALLBACK_AGE = 0;

export interface CleaningStats {
  rowsIn: number;
  rowsDropped: number;
  rowsOut: number;
  /** Values replaced by a fill value, per review field */
  filled: {
    rating: number;
    userAge: number;
    helpfulVotes: number;
    userCountry: number;
    userGender: number;
    appVersion: number;
    appName: number;
    appCategory: number;
    reviewLanguage: number;
  };
  unknownDates: number;
  ratingFill: number;
  ageFill: number;
}

export interface CleanResult {
  reviews: readonly Review[];
  stats: CleaningStats;
}

export function isMissing(cell: RawCell): boolean {
  if (cell === null || cell === undefined) {
    return true;
  }
  if (typeof cell === 'number') {
    return !Number.isFinite(cell);
  }
  if (typeof cell === 'string') {
    const trimmed = cell.trim();
    return trimmed === '' || NA_TOKENS.has(trimmed);
  }
  return false;
}

/**
 * Coerce a cell to a finite number, or undefined when it is not numeric
 */
export function toNumber(cell: RawCell): number | undefined {
  if (isMissing(cell)) {
    return undefined;
  }
  if (typeof cell === 'number') {
    return cell;
  }
  if (typeof cell === 'string') {
    const trimmed = cell.trim();
    if (!NUMERIC.test(trimmed)) {
      return undefined;
    }
    const value = Number(trimmed);
    return Number.isFinite(value) ? value : undefined;
  }
  return undefined;
}

function toText(cell: RawCell): string | undefined {
  if (isMissing(cell)) {
    return undefined;
  }
  return String(cell);
}

function toRating(cell: RawCell): number | undefined {
  const value = toNumber(cell);
  return value !== undefined && value >= RATING_MIN && value <= RATING_MAX ? value : undefined;
}

function toAge(cell: RawCell): number | undefined {
  const value = toNumber(cell);
  return value !== undefined && value >= 0 ? value : undefined;
}

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined;
}

export function stripVersionPrefix(version: string): string {
  return version.replace(/^v+/, '');
}

/**
 * Clean a raw review table and report what was repaired along the way.
 * Rows without review text are dropped before any median is taken.
 */
export function cleanWithStats(raw: RawTable): CleanResult {
  const missingColumns = REVIEW_COLUMNS.filter((column) => !raw.columns.includes(column));
  if (missingColumns.length > 0) {
    throw new StructuralError(missingColumns);
  }

  const rows: RawRow[] = raw.rows.filter((row) => toText(row.review_text) !== undefined);

  const ratings = rows.map((row) => toRating(row.rating));
  const ages = rows.map((row) => toAge(row.user_age));
  const ratingFill = median(ratings.filter(isDefined)) ?? FALLBACK_RATING;
  const ageFill = median(ages.filter(isDefined)) ?? FALLBACK_AGE;

  const stats: CleaningStats = {
    rowsIn: raw.rows.length,
    rowsDropped: raw.rows.length - rows.length,
    rowsOut: rows.length,
    filled: {
      rating: 0,
      userAge: 0,
      helpfulVotes: 0,
      userCountry: 0,
      userGender: 0,
      appVersion: 0,
      appName: 0,
      appCategory: 0,
      reviewLanguage: 0,
    },
    unknownDates: 0,
    ratingFill,
    ageFill,
  };

  const categorical = (cell: RawCell, field: keyof CleaningStats['filled']): string => {
    const text = toText(cell);
    if (text === undefined) {
      stats.filled[field] += 1;
      return UNKNOWN_VALUE;
    }
    return text;
  };

  const reviews = rows.map((row, index): Review => {
    const rating = ratings[index];
    const age = ages[index];
    const votes = toNumber(row.num_helpful_votes);
    const reviewDate = parseReviewDate(row.review_date);

    if (rating === undefined) stats.filled.rating += 1;
    if (age === undefined) stats.filled.userAge += 1;
    if (votes === undefined || votes < 0) stats.filled.helpfulVotes += 1;
    if (reviewDate.kind === 'unknown') stats.unknownDates += 1;

    const versionText = toText(row.app_version);
    const appVersion = versionText === undefined ? '' : stripVersionPrefix(versionText);
    if (!appVersion) stats.filled.appVersion += 1;

    return Object.freeze({
      appName: categorical(row.app_name, 'appName'),
      appCategory: categorical(row.app_category, 'appCategory'),
      reviewText: toText(row.review_text) ?? '',
      rating: rating ?? ratingFill,
      userAge: Math.trunc(age ?? ageFill),
      userCountry: categorical(row.user_country, 'userCountry'),
      userGender: categorical(row.user_gender, 'userGender'),
      appVersion: appVersion || UNKNOWN_VALUE,
      helpfulVotes: votes !== undefined && votes >= 0 ? Math.trunc(votes) : 0,
      reviewDate,
      reviewLanguage: categorical(row.review_language, 'reviewLanguage'),
    });
  });

  return { reviews: Object.freeze(reviews), stats };
}

/**
 * Normalize types and fill missing values. Never mutates `raw`.
 */
export function clean(raw: RawTable): readonly Review[] {
  return cleanWithStats(raw).reviews;
}

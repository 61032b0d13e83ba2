import { CalendarDate, RawCell, ReviewDate, UNKNOWN_DATE } from '../types/review.js';

// Optional time part and offset are accepted and ignored
const TIME_SUFFIX = '(?:[T ]\\d{1,2}:\\d{2}(?::\\d{2}(?:\\.\\d+)?)?(?:Z|[+-]\\d{2}:?\\d{2})?)?';
const YEAR_FIRST = new RegExp(`^(\\d{4})[-/](\\d{1,2})[-/](\\d{1,2})${TIME_SUFFIX}$`);
const MONTH_FIRST = new RegExp(`^(\\d{1,2})/(\\d{1,2})/(\\d{4})${TIME_SUFFIX}$`);

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Build a calendar date, or return undefined when the parts do not name a real day
 */
export function makeCalendarDate(year: number, month: number, day: number): CalendarDate | undefined {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return undefined;
  }
  if (year < 1 || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return undefined;
  }

  const iso = [
    String(year).padStart(4, '0'),
    String(month).padStart(2, '0'),
    String(day).padStart(2, '0'),
  ].join('-');

  return Object.freeze({ kind: 'date', year, month, day, iso });
}

/**
 * Parse a strict `YYYY-MM-DD` string
 */
export function parseIsoDate(value: string): CalendarDate | undefined {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    return undefined;
  }
  return makeCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

/**
 * Parse a review date cell. Anything that is not a recognisable calendar day
 * becomes the unknown-date marker.
 */
export function parseReviewDate(cell: RawCell): ReviewDate {
  if (typeof cell !== 'string') {
    return UNKNOWN_DATE;
  }

  const text = cell.trim();
  let parsed: CalendarDate | undefined;

  const yearFirst = YEAR_FIRST.exec(text);
  if (yearFirst) {
    parsed = makeCalendarDate(Number(yearFirst[1]), Number(yearFirst[2]), Number(yearFirst[3]));
  } else {
    const monthFirst = MONTH_FIRST.exec(text);
    if (monthFirst) {
      parsed = makeCalendarDate(Number(monthFirst[3]), Number(monthFirst[1]), Number(monthFirst[2]));
    }
  }

  return parsed ?? UNKNOWN_DATE;
}

export function isKnownDate(date: ReviewDate): date is CalendarDate {
  return date.kind === 'date';
}

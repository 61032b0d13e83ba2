import { RawCell, RawTable, ReviewColumn, ReviewTable, REVIEW_COLUMNS } from '@review-lens/shared';
import { clean } from '../cleaner.js';
import { enrich } from '../enricher.js';

export type RawReviewRow = Partial<Record<ReviewColumn, RawCell>>;

export const baseRow: Record<ReviewColumn, RawCell> = {
  app_name: 'Notes',
  app_category: 'Productivity',
  review_text: 'Works well',
  rating: '4',
  user_age: '30',
  user_country: 'Canada',
  user_gender: 'Female',
  app_version: '1.0',
  num_helpful_votes: '2',
  review_date: '2024-02-10',
  review_language: 'en',
};

export function rawTable(rows: RawReviewRow[]): RawTable {
  return {
    columns: [...REVIEW_COLUMNS],
    rows: rows.map((row) => ({ ...baseRow, ...row })),
  };
}

export function buildTable(rows: RawReviewRow[]): ReviewTable {
  return enrich(clean(rawTable(rows)));
}

import { FilterCriteria, createLogger } from '@review-lens/shared';
import { QueryResult, ReviewDashboard } from './dashboard.js';
import { InvalidCriteriaError, describeError } from './errors.js';
import { parseFilterCriteria } from './filter.js';
import { summarizeReport } from './report.js';
import { DatasetSource } from './source.js';

const logger = createLogger('ReviewLensMain');

export interface CliSettings {
  DATASET_CACHE_TTL_MS: number;
  TOP_APPS_LIMIT: number;
  REVIEW_FILTER?: string;
}

/**
 * Parse and validate the JSON criteria from REVIEW_FILTER. Unset means no filter.
 */
export function readCriteria(raw: string | undefined): FilterCriteria {
  if (!raw) {
    return {};
  }

  let criteria: unknown;
  try {
    criteria = JSON.parse(raw);
  } catch (error) {
    throw new InvalidCriteriaError([`REVIEW_FILTER is not valid JSON: ${describeError(error)}`]);
  }
  return parseFilterCriteria(criteria);
}

/**
 * Load the dataset once, apply the configured filter and print the report.
 * Criteria are checked before the dataset is fetched.
 */
export async function runCli(
  settings: CliSettings,
  source: DatasetSource,
  write: (line: string) => void = console.log
): Promise<QueryResult> {
  const criteria = readCriteria(settings.REVIEW_FILTER);

  const dashboard = new ReviewDashboard(source, {
    ttlMs: settings.DATASET_CACHE_TTL_MS,
    topAppsLimit: settings.TOP_APPS_LIMIT,
  });

  const options = await dashboard.filterOptions();
  logger.info('Dataset ready', {
    apps: options.apps.length - 1,
    categories: options.categories.length - 1,
    dateBounds: options.dateBounds,
  });

  const result = await dashboard.query(criteria);
  if (result.report.status === 'ok') {
    logger.info(`Showing ${result.view.length.toLocaleString('en-US')} reviews based on the filters`);
  }

  for (const line of summarizeReport(result.report)) {
    write(line);
  }

  return result;
}

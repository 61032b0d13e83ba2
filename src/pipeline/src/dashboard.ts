import {
  CorrelationManager,
  FilterCriteria,
  ReviewTable,
  ReviewView,
  StructuredLogger,
  createLogger,
} from '@review-lens/shared';
import { CacheInfo, Clock, TableCache } from './cache.js';
import { cleanWithStats } from './cleaner.js';
import { enrich } from './enricher.js';
import { describeError } from './errors.js';
import { FilterOptions, filterOptions, filterReviews, parseFilterCriteria } from './filter.js';
import { DashboardReport, buildReport } from './report.js';
import { DatasetSource } from './source.js';

export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;

export interface ReviewDashboardOptions {
  ttlMs?: number;
  clock?: Clock;
  topAppsLimit?: number;
  histogramBins?: number;
}

export interface QueryResult {
  criteria: FilterCriteria;
  view: ReviewView;
  report: DashboardReport;
}

/**
 * Owns the cached review table and answers filter/report requests against it.
 * Presentation pulls from here; nothing in the pipeline calls back into the UI.
 */
export class ReviewDashboard {
  private readonly cache: TableCache<ReviewTable>;
  private readonly logger: StructuredLogger;
  private inFlight: Promise<ReviewTable> | undefined;

  constructor(
    private readonly source: DatasetSource,
    private readonly options: ReviewDashboardOptions = {}
  ) {
    this.cache = new TableCache<ReviewTable>(options.ttlMs ?? DEFAULT_CACHE_TTL_MS, options.clock);
    this.logger = createLogger('ReviewDashboard');
  }

  /**
   * The enriched base table, rebuilt from the source when the cache is stale
   */
  async getTable(): Promise<ReviewTable> {
    const entry = this.cache.peek();
    if (entry && !this.cache.isStale()) {
      return entry.value;
    }
    return this.refresh();
  }

  /**
   * Rerun the whole pipeline. Concurrent callers share one rebuild.
   */
  refresh(): Promise<ReviewTable> {
    if (!this.inFlight) {
      this.inFlight = this.cache
        .rebuild(() => this.buildTable())
        .finally(() => {
          this.inFlight = undefined;
        });
    }
    return this.inFlight;
  }

  async filterOptions(): Promise<FilterOptions> {
    return filterOptions(await this.getTable());
  }

  /**
   * Filter the base table and build the report for the resulting view
   */
  async query(criteria: unknown = {}): Promise<QueryResult> {
    let parsed: FilterCriteria;
    try {
      parsed = parseFilterCriteria(criteria);
    } catch (error) {
      this.logger.warn('Rejected filter criteria', { error: describeError(error) });
      throw error;
    }
    const table = await this.getTable();
    const view = filterReviews(table, parsed);

    if (view.length === 0) {
      this.logger.info('No reviews match the selected filters', { criteria: parsed });
    } else {
      this.logger.debug(`Filtered ${view.length}/${table.length} reviews`, { criteria: parsed });
    }

    const report = buildReport(view, {
      criteria: parsed,
      topAppsLimit: this.options.topAppsLimit,
      histogramBins: this.options.histogramBins,
    });

    return { criteria: parsed, view, report };
  }

  cacheInfo(): CacheInfo {
    return this.cache.info();
  }

  private buildTable(): Promise<ReviewTable> {
    const source = this.source.describe();

    return CorrelationManager.run({ operation: 'dataset.load', metadata: { source } }, () =>
      this.logger.time('dataset.load', async () => {
        const raw = await this.source.fetch();
        const { reviews, stats } = cleanWithStats(raw);
        this.logger.debug('Cleaned dataset', { stats });

        const table = enrich(reviews);
        this.logger.info(`Loaded ${table.length} reviews`, {
          rowsIn: stats.rowsIn,
          rowsDropped: stats.rowsDropped,
          unknownDates: stats.unknownDates,
        });
        return table;
      }, 'info')
    );
  }
}

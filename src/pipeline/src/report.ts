import { ALL_OPTION, AgeGroup, FilterCriteria, ReviewView } from '@review-lens/shared';
import {
  Aggregate,
  AppCount,
  CategoryCount,
  CategoryRating,
  DEFAULT_HISTOGRAM_BINS,
  DEFAULT_TOP_APPS,
  GroupMean,
  HistogramBin,
  RatingSpread,
  bestCategory,
  distinctAppCount,
  distinctLanguageCount,
  meanRating,
  meanRatingByAgeGroup,
  meanRatingByCategory,
  ratingCategoryDistribution,
  ratingHistogram,
  ratingSpreadByCategory,
  reviewCount,
  topApps,
  worstCategory,
} from './aggregator.js';

export interface KeyMetrics {
  totalReviews: number;
  averageRating: Aggregate<number>;
  uniqueApps: number;
  languages: number;
}

export interface DashboardCharts {
  ratingHistogram: HistogramBin[];
  ratingCategories: CategoryCount[];
  /** Omitted when the view is already restricted to one app */
  topApps?: AppCount[];
  ratingSpreadByCategory: RatingSpread[];
  meanRatingByCategory: GroupMean[];
  meanRatingByAgeGroup: GroupMean<AgeGroup>[];
}

export interface DashboardInsights {
  averageRating: Aggregate<number>;
  bestCategory: Aggregate<CategoryRating>;
  worstCategory: Aggregate<CategoryRating>;
}

export type DashboardReport =
  | { status: 'empty' }
  | {
      status: 'ok';
      metrics: KeyMetrics;
      charts: DashboardCharts;
      insights: DashboardInsights;
    };

export interface ReportOptions {
  criteria?: FilterCriteria;
  topAppsLimit?: number;
  histogramBins?: number;
}

/**
 * Everything the dashboard renders for one view
 */
export function buildReport(view: ReviewView, options: ReportOptions = {}): DashboardReport {
  if (view.length === 0) {
    return { status: 'empty' };
  }

  const appName = options.criteria?.appName;
  const singleApp = appName !== undefined && appName !== ALL_OPTION;
  const averageRating = meanRating(view);

  return {
    status: 'ok',
    metrics: {
      totalReviews: reviewCount(view),
      averageRating,
      uniqueApps: distinctAppCount(view),
      languages: distinctLanguageCount(view),
    },
    charts: {
      ratingHistogram: ratingHistogram(view, options.histogramBins ?? DEFAULT_HISTOGRAM_BINS),
      ratingCategories: ratingCategoryDistribution(view),
      ...(singleApp ? {} : { topApps: topApps(view, options.topAppsLimit ?? DEFAULT_TOP_APPS) }),
      ratingSpreadByCategory: ratingSpreadByCategory(view),
      meanRatingByCategory: meanRatingByCategory(view),
      meanRatingByAgeGroup: meanRatingByAgeGroup(view),
    },
    insights: {
      averageRating,
      bestCategory: bestCategory(view),
      worstCategory: worstCategory(view),
    },
  };
}

function formatAggregate<T>(aggregate: Aggregate<T>, format: (value: T) => string): string {
  return aggregate.applicable ? format(aggregate.value) : 'n/a';
}

/**
 * One-line-per-fact text rendering, used by the command-line entry point
 */
export function summarizeReport(report: DashboardReport): string[] {
  if (report.status === 'empty') {
    return ['No data matches the selected filters.'];
  }

  const { metrics, charts, insights } = report;
  const lines = [
    `Total reviews: ${metrics.totalReviews.toLocaleString('en-US')}`,
    `Average rating: ${formatAggregate(metrics.averageRating, (value) => value.toFixed(2))}`,
    `Unique apps: ${metrics.uniqueApps.toLocaleString('en-US')}`,
    `Languages: ${metrics.languages.toLocaleString('en-US')}`,
    `Best category: ${formatAggregate(insights.bestCategory, (value) => `${value.category} (${value.meanRating.toFixed(2)})`)}`,
    `Worst category: ${formatAggregate(insights.worstCategory, (value) => `${value.category} (${value.meanRating.toFixed(2)})`)}`,
    `Sentiment: ${charts.ratingCategories.map(({ category, count }) => `${category} ${count}`).join(', ')}`,
  ];

  if (charts.topApps) {
    lines.push(`Top apps: ${charts.topApps.map(({ appName, count }) => `${appName} (${count})`).join(', ')}`);
  }

  return lines;
}

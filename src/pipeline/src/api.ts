export * from './errors.js';
export * from './stats.js';
export * from './source.js';
export * from './cleaner.js';
export * from './enricher.js';
export * from './filter.js';
export * from './aggregator.js';
export * from './report.js';
export * from './cache.js';
export * from './dashboard.js';
export * from './cli.js';

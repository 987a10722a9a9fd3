/**
 * Main entry point for the article stats tracker
 * Export all public APIs here
 */

export * from './types';
export * from './config';
export * from './utils/dates';
export * from './data/csv';
export * from './data/datesCache';
export * from './data/historyWriter';
export * from './ingestion/client/noteApiClient';
export * from './ingestion/parsers/detailParser';
export * from './ingestion/parsers/statsParser';
export * from './ingestion/articleCollector';
export * from './ingestion/dateEnricher';
export * from './ingestion/jobs/fetchArticleStatsJob';

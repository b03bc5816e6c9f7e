export * from "./lib/contracts";
export * from "./lib/errors";
export { DEFAULT_ALIAS_TABLE, DEFAULT_CONFIG, configFromEnv, resolveConfig } from "./lib/config";
export type { AnalyzerConfig, AnalyzerConfigOverrides } from "./lib/config";
export { resolveSchema } from "./lib/schema";
export type { SchemaResolution } from "./lib/schema";
export { normalizeRows, parseCalendarDate, parseRating } from "./lib/normalize";
export type { NormalizeResult } from "./lib/normalize";
export { extractHotspots, isNegativeFeedback, tokenize } from "./lib/keywords";
export { ALL_RECORDS, createFilter, matchesFilter } from "./lib/filters";
export type { FilterInput } from "./lib/filters";
export { closeFeedbackTable, loadFeedbackTable } from "./lib/dataset";
export type { FeedbackTable } from "./lib/dataset";
export {
  buildKpiQuery,
  buildNegativeQuery,
  buildSegmentQuery,
  buildTrendQuery,
  buildWhere,
  getDatasetProfile,
  getKpis,
  getNegativeInsights,
  getSegments,
  getTrend,
  runAllQueries,
} from "./lib/analytics";
export type { InsightReport } from "./lib/analytics";
export { listSampleDatasets, readCsvDataset, sampleDatasetPath } from "./lib/ingest";

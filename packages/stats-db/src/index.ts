export * from "./types";
export * from "./topology";
export * from "./errors";
export { createDb, migrate, type DbConnection } from "./db";
export { consolidatePoint, dedupeSeries, mergeSeries } from "./rollup/consolidate";
export { reconstructParentSeries } from "./rollup/aggregate";
export {
  currentBreakdown,
  recentBreakdown,
  watermarkEvents,
  type ChildSeries,
} from "./rollup/breakdown";
export { valueAt, validateSeries } from "./rollup/series";
export { RollupEngine } from "./rollup/engine";
export type { TimeSeriesStore } from "./store/types";
export { SqliteTimeSeriesStore } from "./store/sqlite";
export { JsonFileTimeSeriesStore } from "./store/json-file";
export { toPersistedRecord, fromPersistedRecord } from "./store/record";
export { escapePathSegment, unescapePathSegment } from "./store/escape";
export { AnacondaApiClient } from "./conda-client";
export {
  AnacondaCountSource,
  packageDownloadCounts,
} from "./tasks/conda/fetch-downloads";
export { retrievePackageNames } from "./tasks/conda/fetch-package-names";

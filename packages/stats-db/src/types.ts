import type { LevelName } from "./topology";

/** Calendar date, "YYYY-MM-DD". */
export type DateString = string;

/**
 * Identifiers from the channel down, one per topology level. A key of length
 * n addresses a node at depth n; its parent drops the last identifier.
 */
export type HierarchicalKey = readonly string[];

export interface TimeSeriesPoint {
  date: DateString;
  total: number;
}

/** Strictly increasing dates, flat interior points removed. */
export type EntitySeries = readonly TimeSeriesPoint[];

export interface SnapshotEntry {
  key: HierarchicalKey;
  total: number;
}

/** Leaf totals as of one date, indexed by `keyPath(key)`. */
export type DownloadSnapshot = ReadonlyMap<string, SnapshotEntry>;

export interface BreakdownEntry {
  id: string;
  total: number;
}

export interface RecentBreakdownDay {
  date: DateString;
  entries: BreakdownEntry[];
}

export interface LevelRecord {
  key: HierarchicalKey;
  series: EntitySeries;
  /** Absent on leaf records. */
  childLevel?: LevelName;
  currentBreakdown?: BreakdownEntry[];
  recentBreakdown?: RecentBreakdownDay[];
}

export interface RollupConfig {
  /** K: width of the current and recent breakdowns. */
  breakdownLimit: number;
  /** Per-level override of K, keyed by the level owning the breakdown. */
  breakdownLimitByLevel?: Partial<Record<LevelName, number>>;
  /** W: length of the recent-activity window in days. */
  windowDays: number;
  /** Keys processed at once within one level. */
  concurrency: number;
}

export interface KeyFailure {
  key: HierarchicalKey;
  level: LevelName;
  error: string;
}

export interface LevelSummary {
  level: LevelName;
  updated: number;
  failed: number;
}

export interface RunSummary {
  asOfDate: DateString;
  /** Leaf level first, channel level last. */
  levels: LevelSummary[];
  failures: KeyFailure[];
  partial: boolean;
}

/**
 * Supplies the leaf snapshot of a run. Keys it could not retrieve are left
 * out rather than reported as zero.
 */
export interface CountSource {
  fetch(asOfDate: DateString): Promise<DownloadSnapshot>;
}

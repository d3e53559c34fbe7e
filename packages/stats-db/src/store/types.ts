import type { EntitySeries, HierarchicalKey, LevelRecord } from "../types";

/**
 * Where level records live between runs. A key's stored record is owned by
 * a single writer; the store does no locking.
 */
export interface TimeSeriesStore {
  /** Stored series of `key`, empty when the key has never been saved. */
  load(key: HierarchicalKey): Promise<EntitySeries>;
  loadRecord(key: HierarchicalKey): Promise<LevelRecord | null>;
  /** Atomically replaces the record of `key`. */
  save(key: HierarchicalKey, record: LevelRecord): Promise<void>;
  /** Keys of the stored children of `key`, sorted. */
  listChildren(key: HierarchicalKey): Promise<HierarchicalKey[]>;
}

import { z } from "zod";
import { DataIntegrityError } from "../errors";
import { validateSeries } from "../rollup/series";
import { TOPOLOGY, childLevelName, type LevelName } from "../topology";
import type {
  BreakdownEntry,
  HierarchicalKey,
  LevelRecord,
  RecentBreakdownDay,
} from "../types";

const pointSchema = z.object({
  date: z.string(),
  total: z.number(),
});

const breakdownEntrySchema = z
  .object({ total: z.number().int().nonnegative() })
  .catchall(z.union([z.string(), z.number()]));

const recordSchema = z
  .object({
    downloads_per_date: z.array(pointSchema),
    recent_downloads: z
      .array(z.object({ date: z.string() }).catchall(z.unknown()))
      .optional(),
  })
  .catchall(z.unknown());

export interface PersistedPoint {
  date: string;
  total: number;
}

/**
 * On-disk record: identifiers per level, `downloads_per_date`, and for
 * non-leaf keys `downloads_per_<child level>` plus `recent_downloads`.
 */
export type PersistedRecord = Record<string, unknown> & {
  downloads_per_date: PersistedPoint[];
};

export function breakdownField(childLevel: LevelName): string {
  return `downloads_per_${childLevel}`;
}

function persistEntries(
  childLevel: LevelName,
  entries: readonly BreakdownEntry[]
): Array<Record<string, string | number>> {
  return entries.map((entry) => ({
    [childLevel]: entry.id,
    total: entry.total,
  }));
}

export function toPersistedRecord(record: LevelRecord): PersistedRecord {
  const data: PersistedRecord = {
    downloads_per_date: record.series.map(({ date, total }) => ({
      date,
      total,
    })),
  };
  record.key.forEach((id, index) => {
    data[TOPOLOGY[index]] = id;
  });

  const childLevel = record.childLevel;
  if (childLevel) {
    const field = breakdownField(childLevel);
    data[field] = persistEntries(childLevel, record.currentBreakdown ?? []);
    data.recent_downloads = (record.recentBreakdown ?? []).map((day) => ({
      date: day.date,
      [field]: persistEntries(childLevel, day.entries),
    }));
  }
  return data;
}

function parseEntries(
  key: HierarchicalKey,
  childLevel: LevelName,
  value: unknown
): BreakdownEntry[] {
  const parsed = z.array(breakdownEntrySchema).safeParse(value ?? []);
  if (!parsed.success) {
    throw new DataIntegrityError(
      key,
      `malformed ${breakdownField(childLevel)}: ${parsed.error.message}`
    );
  }
  return parsed.data.map((entry) => {
    const id = entry[childLevel];
    if (typeof id !== "string") {
      throw new DataIntegrityError(
        key,
        `breakdown entry without a ${childLevel} identifier`
      );
    }
    return { id, total: entry.total };
  });
}

/**
 * Parses a stored record for `key`, checking its identifiers and the series
 * invariant.
 */
export function fromPersistedRecord(
  key: HierarchicalKey,
  raw: unknown
): LevelRecord {
  const parsed = recordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataIntegrityError(key, parsed.error.message);
  }
  const data = parsed.data;

  key.forEach((id, index) => {
    const stored = data[TOPOLOGY[index]];
    if (stored !== id) {
      throw new DataIntegrityError(
        key,
        `${TOPOLOGY[index]} is ${JSON.stringify(stored)}, expected "${id}"`
      );
    }
  });

  const series = validateSeries(key, data.downloads_per_date);
  const childLevel = childLevelName(key);
  if (!childLevel) {
    return { key, series };
  }

  const field = breakdownField(childLevel);
  const recentBreakdown: RecentBreakdownDay[] = (
    data.recent_downloads ?? []
  ).map((day) => ({
    date: day.date,
    entries: parseEntries(key, childLevel, day[field]),
  }));

  return {
    key,
    series,
    childLevel,
    currentBreakdown: parseEntries(key, childLevel, data[field]),
    recentBreakdown,
  };
}

import { asc, eq } from "drizzle-orm";
import { z } from "zod";
import type { DbConnection } from "../db";
import { DataIntegrityError, PersistenceError } from "../errors";
import { validateSeries } from "../rollup/series";
import { dailyTotal, entity } from "../schema";
import { childLevelName, keyPath, lastId, parentKey } from "../topology";
import type { EntitySeries, HierarchicalKey, LevelRecord } from "../types";
import { chunk } from "../utils";
import type { TimeSeriesStore } from "./types";

const INSERT_BATCH_SIZE = 500;

const keySchema = z.array(z.string()).min(1);

export class SqliteTimeSeriesStore implements TimeSeriesStore {
  constructor(private readonly db: DbConnection) {}

  async load(key: HierarchicalKey): Promise<EntitySeries> {
    const rows = await this.db
      .select({ date: dailyTotal.date, total: dailyTotal.total })
      .from(dailyTotal)
      .where(eq(dailyTotal.keyPath, keyPath(key)))
      .orderBy(asc(dailyTotal.date));

    return validateSeries(key, rows);
  }

  async loadRecord(key: HierarchicalKey): Promise<LevelRecord | null> {
    const row = await this.db.query.entity.findFirst({
      where: eq(entity.keyPath, keyPath(key)),
      with: {
        dailyTotals: {
          columns: { date: true, total: true },
          orderBy: [asc(dailyTotal.date)],
        },
      },
    });
    if (!row) {
      return null;
    }

    const series = validateSeries(key, row.dailyTotals);
    const childLevel = childLevelName(key);
    if (!childLevel) {
      return { key, series };
    }
    return {
      key,
      series,
      childLevel,
      currentBreakdown: row.currentBreakdown ?? [],
      recentBreakdown: row.recentBreakdown ?? [],
    };
  }

  async save(key: HierarchicalKey, record: LevelRecord): Promise<void> {
    const path = keyPath(key);
    const parent = parentKey(key);
    const values = {
      keyPath: path,
      parentPath: parent ? keyPath(parent) : null,
      depth: key.length,
      name: lastId(key),
      currentBreakdown: record.currentBreakdown ?? null,
      recentBreakdown: record.recentBreakdown ?? null,
      updatedAt: new Date(),
    };

    try {
      this.db.transaction((tx) => {
        tx.insert(entity)
          .values(values)
          .onConflictDoUpdate({
            target: entity.keyPath,
            set: {
              currentBreakdown: values.currentBreakdown,
              recentBreakdown: values.recentBreakdown,
              updatedAt: values.updatedAt,
            },
          })
          .run();

        tx.delete(dailyTotal).where(eq(dailyTotal.keyPath, path)).run();

        for (const batch of chunk(record.series, INSERT_BATCH_SIZE)) {
          tx.insert(dailyTotal)
            .values(
              batch.map((point) => ({
                keyPath: path,
                date: point.date,
                total: point.total,
              }))
            )
            .run();
        }
      });
    } catch (error) {
      throw new PersistenceError(key, error);
    }
  }

  async listChildren(key: HierarchicalKey): Promise<HierarchicalKey[]> {
    const rows = await this.db
      .select({ keyPath: entity.keyPath })
      .from(entity)
      .where(eq(entity.parentPath, keyPath(key)))
      .orderBy(asc(entity.keyPath));

    return rows.map((row) => {
      let raw: unknown;
      try {
        raw = JSON.parse(row.keyPath);
      } catch {
        throw new DataIntegrityError(key, `malformed child key ${row.keyPath}`);
      }
      const parsed = keySchema.safeParse(raw);
      if (!parsed.success) {
        throw new DataIntegrityError(key, `malformed child key ${row.keyPath}`);
      }
      return parsed.data;
    });
  }
}

import * as path from "path";
import { Database } from "@conda-count/db-client";
import { createDb } from "../../db";
import env, { channels } from "../../env";
import { JsonFileTimeSeriesStore } from "../../store/json-file";
import { SqliteTimeSeriesStore } from "../../store/sqlite";
import type { TimeSeriesStore } from "../../store/types";
import type { HierarchicalKey } from "../../types";

/**
 * Copies the records below each root from `source` to `target`, parents
 * before children. Returns the number of records copied.
 */
export async function exportRecords(
  source: TimeSeriesStore,
  target: TimeSeriesStore,
  roots: readonly HierarchicalKey[]
): Promise<number> {
  let exported = 0;
  const pending = [...roots];
  while (pending.length > 0) {
    const key = pending.pop();
    if (!key) {
      break;
    }
    const record = await source.loadRecord(key);
    if (record) {
      await target.save(key, record);
      exported++;
    }
    const children = await source.listChildren(key);
    pending.push(...children.reverse());
  }
  return exported;
}

export async function exportToJsonFiles(
  database: Database = Database.shared(),
  exportDir: string = env.EXPORT_DIR
): Promise<number> {
  const outputDir = path.join(exportDir, "anaconda.org");
  try {
    const source = new SqliteTimeSeriesStore(createDb(database));
    const target = new JsonFileTimeSeriesStore(outputDir);
    const roots = channels().map((channel) => [channel]);
    const exported = await exportRecords(source, target, roots);
    console.log(`Exported ${exported} records to: ${outputDir}`);
    return exported;
  } catch (error) {
    console.error("Failed to export records:", error);
    throw error;
  }
}

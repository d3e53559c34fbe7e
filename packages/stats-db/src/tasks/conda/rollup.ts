import { Database } from "@conda-count/db-client";
import { AnacondaApiClient } from "../../conda-client";
import { createDb } from "../../db";
import env, { channels } from "../../env";
import { RollupEngine } from "../../rollup/engine";
import { SqliteTimeSeriesStore } from "../../store/sqlite";
import { formatKey } from "../../topology";
import type {
  CountSource,
  DateString,
  RollupConfig,
  RunSummary,
} from "../../types";
import { getTodaysDate, isDateString } from "../../utils";
import { AnacondaCountSource } from "./fetch-downloads";

export function rollupConfigFromEnv(): RollupConfig {
  return {
    breakdownLimit: env.BREAKDOWN_LIMIT,
    breakdownLimitByLevel: { channel: env.CHANNEL_BREAKDOWN_LIMIT },
    windowDays: env.RECENT_WINDOW_DAYS,
    concurrency: env.CONCURRENT_TASKS,
  };
}

/** `AS_OF_DATE` when set, otherwise today's UTC date from the host clock. */
export function resolveAsOfDate(
  configured: string,
  today: DateString = getTodaysDate()
): DateString {
  const asOfDate = configured || today;
  if (!isDateString(asOfDate)) {
    throw new RangeError(`AS_OF_DATE must be YYYY-MM-DD, got "${asOfDate}"`);
  }
  return asOfDate;
}

function logSummary(summary: RunSummary): void {
  console.log(`\nRollup summary for ${summary.asOfDate}:`);
  console.log("----------------");
  for (const level of summary.levels) {
    console.log(
      `${level.level.padEnd(10)} updated: ${level.updated}, failed: ${level.failed}`
    );
  }
  if (summary.partial) {
    console.log(`\n${summary.failures.length} keys were not updated:`);
    for (const failure of summary.failures) {
      console.log(`  ${formatKey(failure.key)}: ${failure.error}`);
    }
  }
}

export interface RunRollupOptions {
  database?: Database;
  source?: CountSource;
  asOfDate?: string;
}

/**
 * Fetches today's counts for every configured channel and folds them into
 * the SQLite store.
 */
export async function runRollup(
  options: RunRollupOptions = {}
): Promise<RunSummary> {
  const asOfDate = options.asOfDate ?? resolveAsOfDate(env.AS_OF_DATE);
  const database = options.database ?? Database.shared();
  const store = new SqliteTimeSeriesStore(createDb(database));
  const source =
    options.source ??
    new AnacondaCountSource(
      new AnacondaApiClient({ maxRetries: env.MAX_RETRIES }),
      { channels: channels(), concurrency: env.CONCURRENT_TASKS }
    );

  const snapshot = await source.fetch(asOfDate);
  const engine = new RollupEngine(store, rollupConfigFromEnv());
  const summary = await engine.run(snapshot, asOfDate);
  logSummary(summary);
  return summary;
}

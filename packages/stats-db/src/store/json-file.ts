import { mkdir, readFile, readdir, rename, writeFile } from "fs/promises";
import * as path from "path";
import { DataIntegrityError, PersistenceError } from "../errors";
import type { EntitySeries, HierarchicalKey, LevelRecord } from "../types";
import { escapePathSegment, unescapePathSegment } from "./escape";
import { fromPersistedRecord, toPersistedRecord } from "./record";
import type { TimeSeriesStore } from "./types";

const RECORD_EXTENSION = ".json";

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([field, inner]) => [field, sortKeys(inner)])
    );
  }
  return value;
}

/**
 * One JSON file per key: `(channel, package)` lives at
 * `<baseDir>/<channel>/<package>.json` and its versions under
 * `<baseDir>/<channel>/<package>/`.
 */
export class JsonFileTimeSeriesStore implements TimeSeriesStore {
  constructor(readonly baseDir: string) {}

  recordPath(key: HierarchicalKey): string {
    const segments = key.map(escapePathSegment);
    const fileName = `${segments[segments.length - 1]}${RECORD_EXTENSION}`;
    return path.join(this.baseDir, ...segments.slice(0, -1), fileName);
  }

  private childrenDir(key: HierarchicalKey): string {
    return path.join(this.baseDir, ...key.map(escapePathSegment));
  }

  async loadRecord(key: HierarchicalKey): Promise<LevelRecord | null> {
    const file = this.recordPath(key);
    let text: string;
    try {
      text = await readFile(file, "utf8");
    } catch (error) {
      if (isNodeError(error) && error.code === "ENOENT") {
        return null;
      }
      console.warn(
        `Could not read ${file}, treating it as empty:`,
        error instanceof Error ? error.message : error
      );
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new DataIntegrityError(
        key,
        `${file} is not valid JSON: ${
          error instanceof Error ? error.message : error
        }`
      );
    }
    return fromPersistedRecord(key, raw);
  }

  async load(key: HierarchicalKey): Promise<EntitySeries> {
    const record = await this.loadRecord(key);
    return record?.series ?? [];
  }

  async save(key: HierarchicalKey, record: LevelRecord): Promise<void> {
    const file = this.recordPath(key);
    const temporary = `${file}.${process.pid}.tmp`;
    const json = JSON.stringify(sortKeys(toPersistedRecord(record)), null, 2);
    try {
      await mkdir(path.dirname(file), { recursive: true });
      await writeFile(temporary, `${json}\n`);
      await rename(temporary, file);
    } catch (error) {
      throw new PersistenceError(key, error);
    }
  }

  async listChildren(key: HierarchicalKey): Promise<HierarchicalKey[]> {
    let entries: string[];
    try {
      entries = await readdir(this.childrenDir(key));
    } catch (error) {
      if (isNodeError(error) && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }
    return entries
      .filter((entry) => entry.endsWith(RECORD_EXTENSION))
      .map((entry) =>
        unescapePathSegment(entry.slice(0, -RECORD_EXTENSION.length))
      )
      .sort()
      .map((id) => [...key, id]);
  }
}

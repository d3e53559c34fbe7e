import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Database } from "@conda-count/db-client";
import { createDb } from "../src/db";
import { DataIntegrityError, PersistenceError } from "../src/errors";
import { RollupEngine } from "../src/rollup/engine";
import { JsonFileTimeSeriesStore } from "../src/store/json-file";
import { SqliteTimeSeriesStore } from "../src/store/sqlite";
import type { TimeSeriesStore } from "../src/store/types";
import { keyPath } from "../src/topology";
import type {
  DownloadSnapshot,
  EntitySeries,
  HierarchicalKey,
  LevelRecord,
  RollupConfig,
} from "../src/types";

const CHANNEL = ["bioconda"];
const PACKAGE = [...CHANNEL, "samtools"];
const VERSION = [...PACKAGE, "1.9"];
const LINUX = [...VERSION, "linux-64"];
const OSX = [...VERSION, "osx-64"];
const LINUX_FILE = [...LINUX, "samtools-1.9-0.tar.bz2"];
const OSX_FILE = [...OSX, "samtools-1.9-0.tar.bz2"];
const LINUX_BUILD_1 = [...LINUX, "samtools-1.9-1.tar.bz2"];

const CONFIG: RollupConfig = {
  breakdownLimit: 50,
  windowDays: 62,
  concurrency: 4,
};

function snapshotOf(
  entries: Array<[HierarchicalKey, number]>
): DownloadSnapshot {
  return new Map(
    entries.map(([key, total]) => [keyPath(key), { key, total }])
  );
}

/** Delegates to a real store, failing chosen keys. */
class FaultyStore implements TimeSeriesStore {
  constructor(
    private readonly inner: TimeSeriesStore,
    private readonly faults: {
      save?: HierarchicalKey;
      load?: HierarchicalKey;
    }
  ) {}

  private matches(key: HierarchicalKey, target?: HierarchicalKey): boolean {
    return target !== undefined && keyPath(key) === keyPath(target);
  }

  async load(key: HierarchicalKey): Promise<EntitySeries> {
    if (this.matches(key, this.faults.load)) {
      throw new DataIntegrityError(key, "corrupt");
    }
    return this.inner.load(key);
  }

  loadRecord(key: HierarchicalKey): Promise<LevelRecord | null> {
    return this.inner.loadRecord(key);
  }

  async save(key: HierarchicalKey, record: LevelRecord): Promise<void> {
    if (this.matches(key, this.faults.save)) {
      throw new PersistenceError(key, new Error("disk full"));
    }
    return this.inner.save(key, record);
  }

  listChildren(key: HierarchicalKey): Promise<HierarchicalKey[]> {
    return this.inner.listChildren(key);
  }
}

describe("RollupEngine", () => {
  let database: Database;
  let store: SqliteTimeSeriesStore;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    database = new Database({ path: ":memory:" });
    store = new SqliteTimeSeriesStore(createDb(database));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await database.shutdown();
  });

  it("rolls a snapshot up to the channel", async () => {
    const summary = await new RollupEngine(store, CONFIG).run(
      snapshotOf([
        [LINUX_FILE, 10],
        [OSX_FILE, 5],
      ]),
      "2024-01-01"
    );

    expect(summary).toEqual({
      asOfDate: "2024-01-01",
      levels: [
        { level: "basename", updated: 2, failed: 0 },
        { level: "subdir", updated: 2, failed: 0 },
        { level: "version", updated: 1, failed: 0 },
        { level: "package", updated: 1, failed: 0 },
        { level: "channel", updated: 1, failed: 0 },
      ],
      failures: [],
      partial: false,
    });
    expect(await store.load(CHANNEL)).toEqual([
      { date: "2024-01-01", total: 15 },
    ]);
    expect(await store.loadRecord(VERSION)).toEqual({
      key: VERSION,
      series: [{ date: "2024-01-01", total: 15 }],
      childLevel: "subdir",
      currentBreakdown: [
        { id: "osx-64", total: 5 },
        { id: "linux-64", total: 10 },
      ],
      recentBreakdown: [
        {
          date: "2024-01-01",
          entries: [
            { id: "linux-64", total: 10 },
            { id: "osx-64", total: 5 },
          ],
        },
      ],
    });
  });

  it("carries files missing from a later snapshot forward", async () => {
    const engine = new RollupEngine(store, CONFIG);
    await engine.run(
      snapshotOf([
        [LINUX_FILE, 10],
        [OSX_FILE, 5],
      ]),
      "2024-01-01"
    );

    const summary = await engine.run(
      snapshotOf([[LINUX_FILE, 12]]),
      "2024-01-03"
    );

    expect(summary.levels.map((level) => level.updated)).toEqual([
      1, 1, 1, 1, 1,
    ]);
    expect(await store.load(OSX_FILE)).toEqual([
      { date: "2024-01-01", total: 5 },
    ]);
    expect(await store.load(OSX)).toEqual([{ date: "2024-01-01", total: 5 }]);
    expect(await store.load(PACKAGE)).toEqual([
      { date: "2024-01-01", total: 15 },
      { date: "2024-01-03", total: 17 },
    ]);
    expect(await store.loadRecord(VERSION)).toEqual({
      key: VERSION,
      series: [
        { date: "2024-01-01", total: 15 },
        { date: "2024-01-03", total: 17 },
      ],
      childLevel: "subdir",
      currentBreakdown: [
        { id: "osx-64", total: 5 },
        { id: "linux-64", total: 12 },
      ],
      recentBreakdown: [
        {
          date: "2024-01-01",
          entries: [
            { id: "linux-64", total: 10 },
            { id: "osx-64", total: 5 },
          ],
        },
        { date: "2024-01-03", entries: [{ id: "linux-64", total: 12 }] },
      ],
    });
  });

  it("leaves every record unchanged when a run is repeated", async () => {
    const engine = new RollupEngine(store, CONFIG);
    const snapshot = snapshotOf([
      [LINUX_FILE, 10],
      [OSX_FILE, 5],
    ]);
    await engine.run(snapshot, "2024-01-01");
    await engine.run(snapshotOf([[LINUX_FILE, 12]]), "2024-01-03");

    const before = await Promise.all(
      [CHANNEL, PACKAGE, VERSION, LINUX, LINUX_FILE].map((key) =>
        store.loadRecord(key)
      )
    );
    await engine.run(snapshotOf([[LINUX_FILE, 12]]), "2024-01-03");
    const after = await Promise.all(
      [CHANNEL, PACKAGE, VERSION, LINUX, LINUX_FILE].map((key) =>
        store.loadRecord(key)
      )
    );

    expect(after).toEqual(before);
  });

  it("stores negative counts as zero", async () => {
    await new RollupEngine(store, CONFIG).run(
      snapshotOf([[LINUX_FILE, -4]]),
      "2024-01-01"
    );

    expect(await store.load(LINUX_FILE)).toEqual([
      { date: "2024-01-01", total: 0 },
    ]);
  });

  it("limits breakdowns per level", async () => {
    const pysam = [...CHANNEL, "pysam", "0.22", "noarch", "pysam-0.22.tar.bz2"];
    await new RollupEngine(store, {
      ...CONFIG,
      breakdownLimitByLevel: { channel: 1 },
    }).run(
      snapshotOf([
        [LINUX_FILE, 10],
        [pysam, 30],
      ]),
      "2024-01-01"
    );

    const channel = await store.loadRecord(CHANNEL);
    expect(channel?.currentBreakdown).toEqual([{ id: "pysam", total: 30 }]);
    expect(channel?.series).toEqual([{ date: "2024-01-01", total: 40 }]);
  });

  it("reports a key that could not be saved and keeps its parents going", async () => {
    const engine = new RollupEngine(
      new FaultyStore(store, { save: OSX_FILE }),
      CONFIG
    );

    const summary = await engine.run(
      snapshotOf([
        [LINUX_FILE, 10],
        [OSX_FILE, 5],
      ]),
      "2024-01-01"
    );

    expect(summary.partial).toBe(true);
    expect(summary.failures).toEqual([
      {
        key: OSX_FILE,
        level: "basename",
        error:
          "Failed to persist bioconda::samtools::1.9::osx-64::samtools-1.9-0.tar.bz2: disk full",
      },
    ]);
    expect(summary.levels).toEqual([
      { level: "basename", updated: 1, failed: 1 },
      { level: "subdir", updated: 1, failed: 0 },
      { level: "version", updated: 1, failed: 0 },
      { level: "package", updated: 1, failed: 0 },
      { level: "channel", updated: 1, failed: 0 },
    ]);
    expect(await store.load(OSX)).toEqual([]);
    expect(await store.load(CHANNEL)).toEqual([
      { date: "2024-01-01", total: 10 },
    ]);
  });

  it("keeps a key with unreadable history out of its parents", async () => {
    const engine = new RollupEngine(
      new FaultyStore(store, { load: LINUX_FILE }),
      CONFIG
    );

    const summary = await engine.run(
      snapshotOf([
        [LINUX_FILE, 10],
        [OSX_FILE, 5],
      ]),
      "2024-01-01"
    );

    expect(summary.failures).toEqual([
      {
        key: LINUX_FILE,
        level: "basename",
        error:
          "Data integrity error for bioconda::samtools::1.9::linux-64::samtools-1.9-0.tar.bz2: corrupt",
      },
    ]);
    expect(await store.load(LINUX)).toEqual([]);
    expect(await store.load(VERSION)).toEqual([
      { date: "2024-01-01", total: 5 },
    ]);
  });

  it("leaves the whole branch above an unreadable file untouched", async () => {
    await new RollupEngine(store, CONFIG).run(
      snapshotOf([
        [LINUX_FILE, 10],
        [LINUX_BUILD_1, 5],
      ]),
      "2024-01-01"
    );

    const summary = await new RollupEngine(
      new FaultyStore(store, { load: LINUX_FILE }),
      CONFIG
    ).run(
      snapshotOf([
        [LINUX_FILE, 11],
        [LINUX_BUILD_1, 6],
      ]),
      "2024-01-02"
    );

    expect(summary.failures).toEqual([
      {
        key: LINUX_FILE,
        level: "basename",
        error:
          "Data integrity error for bioconda::samtools::1.9::linux-64::samtools-1.9-0.tar.bz2: corrupt",
      },
      {
        key: LINUX,
        level: "subdir",
        error:
          "bioconda::samtools::1.9::linux-64 was not rolled up: child samtools-1.9-0.tar.bz2 failed",
      },
    ]);
    expect(summary.levels.map((level) => level.updated)).toEqual([
      1, 0, 0, 0, 0,
    ]);
    expect(await store.load(LINUX_BUILD_1)).toEqual([
      { date: "2024-01-01", total: 5 },
      { date: "2024-01-02", total: 6 },
    ]);
    for (const key of [LINUX, VERSION, PACKAGE, CHANNEL]) {
      expect(await store.load(key)).toEqual([
        { date: "2024-01-01", total: 15 },
      ]);
    }
  });

  it("holds back every ancestor of a stored child that cannot be read", async () => {
    const nextVersionFile = [
      ...PACKAGE,
      "1.10",
      "linux-64",
      "samtools-1.10-0.tar.bz2",
    ];
    await new RollupEngine(store, CONFIG).run(
      snapshotOf([
        [LINUX_FILE, 10],
        [OSX_FILE, 5],
      ]),
      "2024-01-01"
    );

    const summary = await new RollupEngine(
      new FaultyStore(store, { load: OSX }),
      CONFIG
    ).run(
      snapshotOf([
        [LINUX_FILE, 12],
        [nextVersionFile, 4],
      ]),
      "2024-01-02"
    );

    expect(summary.failures.map((failure) => failure.error)).toEqual([
      "Data integrity error for bioconda::samtools::1.9::osx-64: corrupt",
      "bioconda::samtools::1.9 was not rolled up: child osx-64 failed",
      "bioconda::samtools was not rolled up: child 1.9 failed",
    ]);
    expect(summary.levels).toEqual([
      { level: "basename", updated: 2, failed: 0 },
      { level: "subdir", updated: 2, failed: 1 },
      { level: "version", updated: 1, failed: 1 },
      { level: "package", updated: 0, failed: 1 },
      { level: "channel", updated: 0, failed: 0 },
    ]);
    expect(await store.load(LINUX)).toEqual([
      { date: "2024-01-01", total: 10 },
      { date: "2024-01-02", total: 12 },
    ]);
    expect(await store.load(PACKAGE)).toEqual([
      { date: "2024-01-01", total: 15 },
    ]);
    expect(await store.load(CHANNEL)).toEqual([
      { date: "2024-01-01", total: 15 },
    ]);
  });

  it("recomputes later parent points when an earlier date is backfilled", async () => {
    const engine = new RollupEngine(store, CONFIG);
    await engine.run(
      snapshotOf([
        [LINUX_FILE, 10],
        [OSX_FILE, 5],
      ]),
      "2024-01-01"
    );
    await engine.run(snapshotOf([[OSX_FILE, 8]]), "2024-01-03");
    expect(await store.load(VERSION)).toEqual([
      { date: "2024-01-01", total: 15 },
      { date: "2024-01-03", total: 18 },
    ]);

    await engine.run(snapshotOf([[LINUX_FILE, 11]]), "2024-01-02");

    const expected = [
      { date: "2024-01-01", total: 15 },
      { date: "2024-01-02", total: 16 },
      { date: "2024-01-03", total: 19 },
    ];
    expect(await store.load(VERSION)).toEqual(expected);
    expect(await store.load(CHANNEL)).toEqual(expected);
  });

  it("reports snapshot keys that do not address a file", async () => {
    const summary = await new RollupEngine(store, CONFIG).run(
      snapshotOf([
        [LINUX, 3],
        [OSX_FILE, 5],
      ]),
      "2024-01-01"
    );

    expect(summary.failures).toEqual([
      {
        key: LINUX,
        level: "basename",
        error:
          "Snapshot key bioconda::samtools::1.9::linux-64 does not address a file",
      },
    ]);
    expect(await store.load(CHANNEL)).toEqual([
      { date: "2024-01-01", total: 5 },
    ]);
  });

  it("rejects a malformed as-of date", async () => {
    await expect(
      new RollupEngine(store, CONFIG).run(snapshotOf([]), "01/01/2024")
    ).rejects.toThrow('Invalid as-of date "01/01/2024"');
  });
});

describe("RollupEngine with the JSON-file store", () => {
  let baseDir: string;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    baseDir = fs.mkdtempSync(path.join(os.tmpdir(), "conda-rollup-"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(baseDir, { recursive: true, force: true });
  });

  it("does not rewrite the files of keys missing from a snapshot", async () => {
    const store = new JsonFileTimeSeriesStore(baseDir);
    const engine = new RollupEngine(store, CONFIG);
    await engine.run(
      snapshotOf([
        [LINUX_FILE, 10],
        [OSX_FILE, 5],
      ]),
      "2024-01-01"
    );
    const fileBefore = fs.readFileSync(store.recordPath(OSX_FILE));
    const subdirBefore = fs.readFileSync(store.recordPath(OSX));
    const modifiedBefore = fs.statSync(store.recordPath(OSX_FILE)).mtimeMs;

    await engine.run(snapshotOf([[LINUX_FILE, 12]]), "2024-01-03");

    expect(fs.readFileSync(store.recordPath(OSX_FILE))).toEqual(fileBefore);
    expect(fs.readFileSync(store.recordPath(OSX))).toEqual(subdirBefore);
    expect(fs.statSync(store.recordPath(OSX_FILE)).mtimeMs).toBe(
      modifiedBefore
    );
    expect(await store.load(VERSION)).toEqual([
      { date: "2024-01-01", total: 15 },
      { date: "2024-01-03", total: 17 },
    ]);
  });
});

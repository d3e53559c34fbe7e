import { IncompleteRollupError, errorMessage } from "../errors";
import type { TimeSeriesStore } from "../store/types";
import {
  LEAF_DEPTH,
  formatKey,
  keyPath,
  lastId,
  levelName,
  levelOf,
  parentKey,
  type LevelName,
} from "../topology";
import type {
  DateString,
  DownloadSnapshot,
  EntitySeries,
  HierarchicalKey,
  KeyFailure,
  LevelRecord,
  LevelSummary,
  RollupConfig,
  RunSummary,
  SnapshotEntry,
} from "../types";
import { chunk, isDateString } from "../utils";
import { reconstructParentSeries } from "./aggregate";
import {
  currentBreakdown,
  recentBreakdown,
  type ChildSeries,
} from "./breakdown";
import { consolidatePoint, mergeSeries } from "./consolidate";
import { RollupLevel, type ParentGroup, type RollupNode } from "./rollup-tree";

function latestDate(
  children: readonly ChildSeries[],
  asOfDate: DateString
): DateString {
  let latest = asOfDate;
  for (const { series } of children) {
    const last = series[series.length - 1];
    if (last && last.date > latest) {
      latest = last.date;
    }
  }
  return latest;
}

interface KeyOutcome {
  key: HierarchicalKey;
  /** Series to hand to the parent; absent when the key is left out. */
  node?: RollupNode;
  saved: boolean;
  error?: unknown;
}

/**
 * Bookkeeping of one run: failures per key, and the keys whose stored data
 * could not be read. An excluded key also holds back its parent, so no
 * ancestor is rebuilt from a partial set of children.
 */
class RunState {
  readonly failures: KeyFailure[] = [];
  private readonly excluded = new Set<string>();
  /** First excluded child, by parent key path. */
  private readonly excludedChildren = new Map<string, HierarchicalKey>();

  fail(
    key: HierarchicalKey,
    error: unknown,
    exclude: boolean,
    level: LevelName = levelOf(key)
  ): void {
    const failure = { key, level, error: errorMessage(error) };
    this.failures.push(failure);
    if (exclude) {
      this.excluded.add(keyPath(key));
      const parent = parentKey(key);
      if (parent && !this.excludedChildren.has(keyPath(parent))) {
        this.excludedChildren.set(keyPath(parent), key);
      }
    }
    console.error(`   ✗ ${formatKey(key)}: ${failure.error}`);
  }

  isExcluded(key: HierarchicalKey): boolean {
    return this.excluded.has(keyPath(key));
  }

  excludedChildOf(parent: HierarchicalKey): HierarchicalKey | undefined {
    return this.excludedChildren.get(keyPath(parent));
  }
}

/**
 * Folds one day's leaf snapshot into every level of the hierarchy, leaves
 * first. Keys of one level are independent and run in batches of
 * `config.concurrency`; a level starts once the level below has finished.
 */
export class RollupEngine {
  constructor(
    private readonly store: TimeSeriesStore,
    private readonly config: RollupConfig
  ) {}

  async run(
    snapshot: DownloadSnapshot,
    asOfDate: DateString
  ): Promise<RunSummary> {
    if (!isDateString(asOfDate)) {
      throw new RangeError(`Invalid as-of date "${asOfDate}"`);
    }
    const startTime = Date.now();
    const state = new RunState();
    const updated = new Map<LevelName, number>();

    console.log(
      `🚀 Rolling up ${snapshot.size} files as of ${asOfDate} (${this.config.concurrency} concurrent tasks)`
    );

    let outcomes = await this.settle(Array.from(snapshot.values()), (entry) =>
      this.consolidateLeaf(entry, asOfDate, state)
    );
    this.report(levelName(LEAF_DEPTH), outcomes, updated);

    for (let depth = LEAF_DEPTH - 1; depth >= 1; depth--) {
      const level = new RollupLevel(
        outcomes.flatMap((outcome) => (outcome.node ? [outcome.node] : []))
      );
      outcomes = await this.settle(level.parents(), (group) =>
        this.rollupParent(group, asOfDate, state)
      );
      this.report(levelName(depth), outcomes, updated);
    }

    const duration = ((Date.now() - startTime) / 1000).toFixed(2);
    console.log(
      `\nRollup completed in ${duration} seconds with ${state.failures.length} failed keys`
    );

    const levels: LevelSummary[] = [];
    for (let depth = LEAF_DEPTH; depth >= 1; depth--) {
      const level = levelName(depth);
      levels.push({
        level,
        updated: updated.get(level) ?? 0,
        failed: state.failures.filter((failure) => failure.level === level)
          .length,
      });
    }

    return {
      asOfDate,
      levels,
      failures: state.failures,
      partial: state.failures.length > 0,
    };
  }

  private breakdownLimit(level: LevelName): number {
    return this.config.breakdownLimitByLevel?.[level] ?? this.config.breakdownLimit;
  }

  private async settle<T>(
    items: readonly T[],
    task: (item: T) => Promise<KeyOutcome>
  ): Promise<KeyOutcome[]> {
    const outcomes: KeyOutcome[] = [];
    for (const batch of chunk(items, this.config.concurrency)) {
      const results = await Promise.allSettled(batch.map(task));
      results.forEach((result) => {
        if (result.status === "fulfilled") {
          outcomes.push(result.value);
        } else {
          // tasks report their own failures; a rejection here is a bug
          throw result.reason;
        }
      });
    }
    return outcomes;
  }

  private report(
    level: LevelName,
    outcomes: readonly KeyOutcome[],
    updated: Map<LevelName, number>
  ): void {
    const count = outcomes.filter((outcome) => outcome.saved).length;
    updated.set(level, count);
    console.log(`✓ ${level}: ${count}/${outcomes.length} keys updated`);
  }

  private async consolidateLeaf(
    entry: SnapshotEntry,
    asOfDate: DateString,
    state: RunState
  ): Promise<KeyOutcome> {
    const { key } = entry;
    if (key.length !== LEAF_DEPTH || key.some((id) => id.length === 0)) {
      const error = new RangeError(
        `Snapshot key ${formatKey(key)} does not address a file`
      );
      state.fail(key, error, false, levelName(LEAF_DEPTH));
      return { key, saved: false, error };
    }

    let stored: EntitySeries;
    try {
      stored = await this.store.load(key);
    } catch (error) {
      return this.failed(key, error, state);
    }

    const series = consolidatePoint(stored, {
      date: asOfDate,
      total: entry.total,
    });
    return this.persist({ key, series }, stored, state);
  }

  private async rollupParent(
    group: ParentGroup,
    asOfDate: DateString,
    state: RunState
  ): Promise<KeyOutcome> {
    const { parent } = group;

    let stored: EntitySeries;
    try {
      await this.addStoredChildren(group, state);
      const excludedChild = state.excludedChildOf(parent);
      if (excludedChild) {
        return this.failed(
          parent,
          new IncompleteRollupError(parent, excludedChild),
          state
        );
      }
      stored = await this.store.load(parent);
    } catch (error) {
      return this.failed(parent, error, state);
    }

    const children: ChildSeries[] = Array.from(group.children.values())
      .map((node) => ({ id: lastId(node.key), series: node.series }))
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

    // A backfill run still rebuilds the parent up to its children's latest
    // points, since a new earlier point changes what later dates carry.
    const reconstructed = reconstructParentSeries(
      children.map((child) => child.series),
      latestDate(children, asOfDate)
    );
    const level = levelOf(parent);
    const limit = this.breakdownLimit(level);
    const record: LevelRecord = {
      key: parent,
      series: mergeSeries(stored, reconstructed),
      childLevel: levelName(parent.length + 1),
      currentBreakdown: currentBreakdown(children, asOfDate, limit),
      recentBreakdown: recentBreakdown(children, asOfDate, {
        limit,
        windowDays: this.config.windowDays,
      }),
    };
    return this.persist(record, stored, state);
  }

  /**
   * Children missing from this run (absent from the snapshot) still count
   * towards their parent with their stored history.
   */
  private async addStoredChildren(
    group: ParentGroup,
    state: RunState
  ): Promise<void> {
    const storedChildren = await this.store.listChildren(group.parent);
    for (const childKey of storedChildren) {
      if (group.children.has(lastId(childKey)) || state.isExcluded(childKey)) {
        continue;
      }
      try {
        const series = await this.store.load(childKey);
        group.children.set(lastId(childKey), { key: childKey, series });
      } catch (error) {
        state.fail(childKey, error, true);
      }
    }
  }

  private async persist(
    record: LevelRecord,
    stored: EntitySeries,
    state: RunState
  ): Promise<KeyOutcome> {
    const { key } = record;
    try {
      await this.store.save(key, record);
      return { key, node: { key, series: record.series }, saved: true };
    } catch (error) {
      // The parent is rebuilt from what is durably stored.
      state.fail(key, error, false);
      const node = stored.length > 0 ? { key, series: stored } : undefined;
      return { key, node, saved: false, error };
    }
  }

  private failed(
    key: HierarchicalKey,
    error: unknown,
    state: RunState
  ): KeyOutcome {
    state.fail(key, error, true);
    return { key, saved: false, error };
  }
}

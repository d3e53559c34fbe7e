import type {
  BreakdownEntry,
  DateString,
  EntitySeries,
  RecentBreakdownDay,
} from "../types";
import { addDays } from "../utils";
import { indexAtOrBefore, valueAt } from "./series";

export interface ChildSeries {
  id: string;
  series: EntitySeries;
}

export interface RecentWindowOptions {
  limit: number;
  windowDays: number;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Children with the highest totals at the as-of date, ascending by
 * (total, id).
 */
export function currentBreakdown(
  children: readonly ChildSeries[],
  asOfDate: DateString,
  limit: number
): BreakdownEntry[] {
  const entries = children.map((child) => ({
    id: child.id,
    total: valueAt(child.series, asOfDate),
  }));
  entries.sort((a, b) => a.total - b.total || compareIds(a.id, b.id));
  return limit > 0 ? entries.slice(-limit) : [];
}

/**
 * Dates within the window on which the child's total rose above everything
 * it had reported earlier in the window. Re-reports and downward corrections
 * are not events.
 */
export function watermarkEvents(
  series: EntitySeries,
  windowStart: DateString,
  asOfDate: DateString
): Map<DateString, number> {
  const events = new Map<DateString, number>();
  let watermark = Number.NEGATIVE_INFINITY;
  for (
    let i = indexAtOrBefore(series, windowStart) + 1;
    i < series.length && series[i].date <= asOfDate;
    i++
  ) {
    const point = series[i];
    if (point.total > watermark) {
      events.set(point.date, point.total);
      watermark = point.total;
    }
  }
  return events;
}

/**
 * Per-date view of the children that grew most over the last `windowDays`
 * days. The window holds dates after `asOf - windowDays` up to the as-of
 * date; a child's growth is its as-of total minus its total at the window
 * start.
 */
export function recentBreakdown(
  children: readonly ChildSeries[],
  asOfDate: DateString,
  { limit, windowDays }: RecentWindowOptions
): RecentBreakdownDay[] {
  if (limit <= 0 || windowDays <= 0) {
    return [];
  }
  const windowStart = addDays(asOfDate, -windowDays);

  const ranked = children
    .map((child) => ({
      id: child.id,
      delta:
        valueAt(child.series, asOfDate) - valueAt(child.series, windowStart),
      events: watermarkEvents(child.series, windowStart, asOfDate),
    }))
    .sort((a, b) => b.delta - a.delta || compareIds(a.id, b.id))
    .slice(0, limit);

  const days = new Map<DateString, BreakdownEntry[]>();
  for (const child of ranked) {
    for (const [date, total] of child.events) {
      const entries = days.get(date) ?? [];
      entries.push({ id: child.id, total });
      days.set(date, entries);
    }
  }

  return Array.from(days, ([date, entries]) => ({ date, entries })).sort(
    (a, b) => compareIds(a.date, b.date)
  );
}

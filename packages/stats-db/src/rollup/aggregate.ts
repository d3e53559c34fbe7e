import type { DateString, EntitySeries, TimeSeriesPoint } from "../types";
import { dedupeSeries } from "./consolidate";
import { indexAtOrBefore } from "./series";

/**
 * Rebuilds a parent's per-date totals from its children's histories.
 *
 * Children report on their own, uncoordinated dates. A child's contribution
 * on any date is its latest total on or before that date (0 before its first
 * point), so the parent gets a point on every date any child reported,
 * without requiring every child to report on every date.
 *
 * The walk starts from the as-of anchor (the sum of every child's current
 * total) and moves backward through the union of child dates. Leaving date
 * `d'` for the next earlier date, each child with a point on `d'` drops back
 * to its previous point (or 0); all of those deltas are applied together so
 * each date yields exactly one parent point. Points after the as-of date are
 * ignored.
 */
export function reconstructParentSeries(
  children: Iterable<EntitySeries>,
  asOfDate: DateString
): TimeSeriesPoint[] {
  // date -> deltas to subtract when walking past that date
  const stepDown = new Map<DateString, number>();
  let running = 0;

  for (const series of children) {
    const last = indexAtOrBefore(series, asOfDate);
    if (last < 0) {
      continue;
    }
    running += series[last].total;
    for (let i = last; i >= 0; i--) {
      const previousTotal = i > 0 ? series[i - 1].total : 0;
      const date = series[i].date;
      stepDown.set(
        date,
        (stepDown.get(date) ?? 0) + series[i].total - previousTotal
      );
    }
  }

  const dates = Array.from(stepDown.keys()).sort((a, b) =>
    a < b ? 1 : a > b ? -1 : 0
  );
  if (dates.length === 0) {
    return [];
  }

  const reversed: TimeSeriesPoint[] = [];
  if (dates[0] !== asOfDate) {
    // No child reported on the as-of date: the carried-forward anchor still
    // holds there.
    reversed.push({ date: asOfDate, total: running });
  }
  for (const date of dates) {
    reversed.push({ date, total: running });
    running -= stepDown.get(date) ?? 0;
  }

  return dedupeSeries(reversed.reverse());
}

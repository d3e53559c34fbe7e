import type { EntitySeries, TimeSeriesPoint } from "../types";
import { clampTotal } from "./series";

const START_SENTINEL: TimeSeriesPoint = { date: "0000-01-01", total: -1 };
const END_SENTINEL: TimeSeriesPoint = {
  date: "9999-12-31",
  total: Number.POSITIVE_INFINITY,
};

/**
 * Drops every interior point whose total equals both neighbours' totals.
 * Neighbours are taken from the input, so a flat run keeps its first and
 * last point.
 */
export function dedupeSeries(series: EntitySeries): TimeSeriesPoint[] {
  const cleaned: TimeSeriesPoint[] = [];
  for (let i = 0; i < series.length; i++) {
    const prev = i > 0 ? series[i - 1] : START_SENTINEL;
    const curr = series[i];
    const next = i + 1 < series.length ? series[i + 1] : END_SENTINEL;
    if (
      prev.total === curr.total &&
      curr.total === next.total &&
      curr.date !== next.date
    ) {
      continue;
    }
    cleaned.push({ date: curr.date, total: curr.total });
  }
  return cleaned;
}

/**
 * Folds one observation into a series: replaces the point on the same date
 * or inserts it in date order, then dedupes.
 */
export function consolidatePoint(
  series: EntitySeries,
  point: TimeSeriesPoint
): TimeSeriesPoint[] {
  const observed: TimeSeriesPoint = {
    date: point.date,
    total: clampTotal(point.total),
  };
  const merged: TimeSeriesPoint[] = [];
  let placed = false;
  for (const existing of series) {
    if (!placed && existing.date >= observed.date) {
      merged.push(observed);
      placed = true;
      if (existing.date === observed.date) {
        continue;
      }
    }
    merged.push(existing);
  }
  if (!placed) {
    merged.push(observed);
  }
  return dedupeSeries(merged);
}

/**
 * Folds all of `incoming` into `series` at once: incoming totals win on
 * shared dates, and the union is deduped a single time so that folding the
 * same points again yields the same series.
 */
export function mergeSeries(
  series: EntitySeries,
  incoming: EntitySeries
): TimeSeriesPoint[] {
  const byDate = new Map<string, number>();
  for (const point of series) {
    byDate.set(point.date, point.total);
  }
  for (const point of incoming) {
    byDate.set(point.date, clampTotal(point.total));
  }
  const merged = Array.from(byDate, ([date, total]) => ({ date, total }));
  merged.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  return dedupeSeries(merged);
}

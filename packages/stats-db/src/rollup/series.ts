import { DataIntegrityError } from "../errors";
import type {
  DateString,
  EntitySeries,
  HierarchicalKey,
  TimeSeriesPoint,
} from "../types";
import { isDateString } from "../utils";

/**
 * Index of the latest point dated on or before `date`, or -1.
 */
export function indexAtOrBefore(series: EntitySeries, date: DateString): number {
  let low = 0;
  let high = series.length - 1;
  let found = -1;
  while (low <= high) {
    const mid = (low + high) >> 1;
    if (series[mid].date <= date) {
      found = mid;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }
  return found;
}

/** Carried-forward total at `date`; 0 before the first point. */
export function valueAt(series: EntitySeries, date: DateString): number {
  const index = indexAtOrBefore(series, date);
  return index < 0 ? 0 : series[index].total;
}

export function clampTotal(total: number): number {
  return Math.max(0, total);
}

/**
 * Checks a loaded series point by point. Dedup is not re-checked: an
 * undeduplicated series is still a valid input to consolidation.
 */
export function validateSeries(
  key: HierarchicalKey,
  points: readonly TimeSeriesPoint[]
): EntitySeries {
  let previous: TimeSeriesPoint | undefined;
  for (const point of points) {
    if (!isDateString(point.date)) {
      throw new DataIntegrityError(key, `invalid date "${point.date}"`);
    }
    if (!Number.isSafeInteger(point.total) || point.total < 0) {
      throw new DataIntegrityError(
        key,
        `invalid total ${point.total} on ${point.date}`
      );
    }
    if (previous && previous.date === point.date) {
      throw new DataIntegrityError(key, `duplicate date ${point.date}`);
    }
    if (previous && previous.date > point.date) {
      throw new DataIntegrityError(
        key,
        `date ${point.date} follows ${previous.date}`
      );
    }
    previous = point;
  }
  return points;
}

import type { DateString } from "./types";

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function formatDate(date: Date): DateString {
  return date.toISOString().split("T")[0]; // Converts the date to "YYYY-MM-DD" format
}

export function getTodaysDate(): DateString {
  return formatDate(new Date());
}

export function isDateString(value: string): boolean {
  if (!DATE_PATTERN.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && formatDate(parsed) === value;
}

export function addDays(date: DateString, days: number): DateString {
  const shifted = new Date(`${date}T00:00:00.000Z`);
  shifted.setUTCDate(shifted.getUTCDate() + days);
  return formatDate(shifted);
}

/** Splits `items` into consecutive batches of at most `size`. */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batchSize = Math.max(1, Math.floor(size));
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    batches.push(items.slice(i, i + batchSize));
  }
  return batches;
}

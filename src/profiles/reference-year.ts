import { DateTime } from 'luxon';

export const BUCKETS_PER_HOUR = 4;
export const BUCKETS_PER_DAY = 24 * BUCKETS_PER_HOUR;
export const DAYS_PER_REFERENCE_YEAR = 365;
export const BUCKETS_PER_YEAR = DAYS_PER_REFERENCE_YEAR * BUCKETS_PER_DAY;

/** Days before the first of each month in a 365-day year. */
const DAYS_BEFORE_MONTH = [0, 31, 59, 90, 120, 151, 181, 212, 243, 273, 304, 334];

/**
 * Zero-based day of a 365-day year. Feb 29 folds onto Feb 28.
 */
export function referenceDayOfYear(month: number, day: number): number {
  const foldedDay = month === 2 && day === 29 ? 28 : day;
  return DAYS_BEFORE_MONTH[month - 1] + foldedDay - 1;
}

/**
 * 15-minute slot of the reference year for a local wall-clock time.
 */
export function bucketOfYear(local: DateTime): number {
  return (
    referenceDayOfYear(local.month, local.day) * BUCKETS_PER_DAY +
    local.hour * BUCKETS_PER_HOUR +
    Math.floor(local.minute / 15)
  );
}

/**
 * Fill empty (null) slots by linear interpolation between the nearest
 * filled slots, treating the series as circular (Dec 31 wraps to Jan 1).
 * A series with no filled slot becomes all zeros.
 */
export function fillMissingBuckets(values: ReadonlyArray<number | null>): number[] {
  const size = values.length;
  const filled: number[] = [];
  values.forEach((value, index) => {
    if (value !== null) filled.push(index);
  });

  const result = values.map((value) => value ?? 0);
  if (filled.length === 0 || filled.length === size) {
    return result;
  }

  for (let k = 0; k < filled.length; k++) {
    const from = filled[k];
    const to = filled[(k + 1) % filled.length];
    const span = (to - from + size) % size || size;
    const start = result[from];
    const end = result[to];
    for (let step = 1; step < span; step++) {
      result[(from + step) % size] = start + ((end - start) * step) / span;
    }
  }
  return result;
}

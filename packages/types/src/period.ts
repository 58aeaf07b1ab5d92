/**
 * Period — a calendar month.
 *
 * Every timestamp in a projection is normalized to month granularity.
 * Periods are plain values: comparable, hashable through their key,
 * and independent of any array position.
 */

/** A calendar month. `month` is 1-based (1 = January). */
export interface Period {
  readonly year: number;
  readonly month: number;
}

/** A Period or its string form ("YYYY-MM" or an ISO date "YYYY-MM-DD..."). */
export type PeriodLike = Period | string;

const PERIOD_PATTERN = /^(\d{4})-(\d{2})(?:-\d{2}.*)?$/;

/**
 * Create a Period, validating the month range.
 */
export function period(year: number, month: number): Period {
  if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`Invalid period: year=${String(year)} month=${String(month)}`);
  }
  return { year, month };
}

/**
 * Parse "2026-01" or "2026-01-15" (the day is dropped).
 */
export function parsePeriod(value: string): Period {
  const match = PERIOD_PATTERN.exec(value.trim());
  if (match === null) {
    throw new RangeError(`Invalid period string: "${value}"`);
  }
  return period(Number(match[1]), Number(match[2]));
}

/**
 * Normalize a PeriodLike to a Period.
 */
export function toPeriod(value: PeriodLike): Period {
  return typeof value === "string" ? parsePeriod(value) : period(value.year, value.month);
}

/**
 * The canonical "YYYY-MM" key. Keys sort lexicographically in time order.
 */
export function formatPeriod(p: Period): string {
  return `${String(p.year).padStart(4, "0")}-${String(p.month).padStart(2, "0")}`;
}

/** Months since year 0. */
export function periodOrdinal(p: Period): number {
  return p.year * 12 + (p.month - 1);
}

export function fromOrdinal(ordinal: number): Period {
  const year = Math.floor(ordinal / 12);
  return { year, month: ordinal - year * 12 + 1 };
}

export function comparePeriods(a: Period, b: Period): -1 | 0 | 1 {
  const diff = periodOrdinal(a) - periodOrdinal(b);
  if (diff < 0) return -1;
  if (diff > 0) return 1;
  return 0;
}

export function addMonths(p: Period, months: number): Period {
  return fromOrdinal(periodOrdinal(p) + months);
}

/**
 * Number of months from `from` to `to` (negative when `to` is earlier).
 */
export function monthsBetween(from: Period, to: Period): number {
  return periodOrdinal(to) - periodOrdinal(from);
}

export function samePeriod(a: Period, b: Period): boolean {
  return a.year === b.year && a.month === b.month;
}

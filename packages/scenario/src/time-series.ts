/**
 * @brickplan/scenario — Time index and series.
 *
 * A TimeIndex is a run of consecutive months; a Series is one number per
 * month of an index. Series are looked up by Period, so a series of an
 * instrument that starts late can be placed on the scenario timeline
 * without reasoning about array offsets.
 *
 * Rules:
 * - Indexes are contiguous and immutable
 * - Binary operations require identical indexes
 * - Lookups outside the index throw RangeError
 */

import type { Period, PeriodLike } from "@brickplan/types";
import { addMonths, formatPeriod, monthsBetween, samePeriod, toPeriod } from "@brickplan/types";

export class TimeIndex implements Iterable<Period> {
  private constructor(
    public readonly start: Period,
    public readonly length: number,
  ) {}

  /** `months` consecutive periods beginning at `start`. */
  static fromStart(start: PeriodLike, months: number): TimeIndex {
    if (!Number.isInteger(months) || months < 0) {
      throw new RangeError(`TimeIndex length must be a non-negative integer, got ${String(months)}`);
    }
    return new TimeIndex(toPeriod(start), months);
  }

  /** Inclusive range [start, end]. */
  static fromRange(start: PeriodLike, end: PeriodLike): TimeIndex {
    const from = toPeriod(start);
    const to = toPeriod(end);
    const span = monthsBetween(from, to);
    if (span < 0) {
      throw new RangeError(`TimeIndex end ${formatPeriod(to)} is before start ${formatPeriod(from)}`);
    }
    return new TimeIndex(from, span + 1);
  }

  /** Last period, or undefined for an empty index. */
  get end(): Period | undefined {
    return this.length === 0 ? undefined : addMonths(this.start, this.length - 1);
  }

  at(i: number): Period {
    if (!Number.isInteger(i) || i < 0 || i >= this.length) {
      throw new RangeError(`Index ${String(i)} outside TimeIndex of length ${String(this.length)}`);
    }
    return addMonths(this.start, i);
  }

  /** Position of a period, -1 when outside. */
  indexOf(p: PeriodLike): number {
    const i = monthsBetween(this.start, toPeriod(p));
    return i >= 0 && i < this.length ? i : -1;
  }

  contains(p: PeriodLike): boolean {
    return this.indexOf(p) !== -1;
  }

  /** Sub-index [from, to), clamped to this index. */
  slice(from: number, to: number = this.length): TimeIndex {
    const lo = Math.min(Math.max(from, 0), this.length);
    const hi = Math.min(Math.max(to, lo), this.length);
    return new TimeIndex(addMonths(this.start, lo), hi - lo);
  }

  equals(other: TimeIndex): boolean {
    return this.length === other.length && samePeriod(this.start, other.start);
  }

  periods(): Period[] {
    return [...this];
  }

  keys(): string[] {
    return this.periods().map(formatPeriod);
  }

  *[Symbol.iterator](): Iterator<Period> {
    for (let i = 0; i < this.length; i++) {
      yield addMonths(this.start, i);
    }
  }
}

export class Series {
  private constructor(
    public readonly index: TimeIndex,
    private readonly _values: readonly number[],
  ) {}

  static zeros(index: TimeIndex): Series {
    return Series.fill(index, 0);
  }

  static fill(index: TimeIndex, value: number): Series {
    return new Series(index, Object.freeze(new Array<number>(index.length).fill(value)));
  }

  static from(index: TimeIndex, values: readonly number[]): Series {
    if (values.length !== index.length) {
      throw new RangeError(
        `Series length ${String(values.length)} does not match TimeIndex length ${String(index.length)}`,
      );
    }
    return new Series(index, Object.freeze([...values]));
  }

  /** Element-wise sum of series sharing one index; zeros when empty. */
  static sum(index: TimeIndex, series: Iterable<Series>): Series {
    let total = Series.zeros(index);
    for (const s of series) {
      total = total.add(s);
    }
    return total;
  }

  get length(): number {
    return this._values.length;
  }

  get(p: PeriodLike): number {
    const i = this.index.indexOf(p);
    if (i === -1) {
      const key = formatPeriod(toPeriod(p));
      throw new RangeError(`Period ${key} outside series index`);
    }
    return this.at(i);
  }

  at(i: number): number {
    const value = this._values[i];
    if (value === undefined) {
      throw new RangeError(`Index ${String(i)} outside series of length ${String(this.length)}`);
    }
    return value;
  }

  values(): number[] {
    return [...this._values];
  }

  add(other: Series): Series {
    return this.combine(other, (a, b) => a + b);
  }

  subtract(other: Series): Series {
    return this.combine(other, (a, b) => a - b);
  }

  map(fn: (value: number, period: Period, i: number) => number): Series {
    return new Series(
      this.index,
      Object.freeze(this._values.map((v, i) => fn(v, this.index.at(i), i))),
    );
  }

  total(): number {
    return this._values.reduce((acc, v) => acc + v, 0);
  }

  /** Last value, or undefined for an empty series. */
  last(): number | undefined {
    return this._values[this._values.length - 1];
  }

  /** `{ "YYYY-MM": value }` in index order. */
  toRecord(): Record<string, number> {
    const out: Record<string, number> = {};
    this._values.forEach((v, i) => {
      out[formatPeriod(this.index.at(i))] = v;
    });
    return out;
  }

  private combine(other: Series, op: (a: number, b: number) => number): Series {
    if (!this.index.equals(other.index)) {
      throw new RangeError("Cannot combine series with different indexes");
    }
    return new Series(
      this.index,
      Object.freeze(this._values.map((v, i) => op(v, other.at(i)))),
    );
  }
}

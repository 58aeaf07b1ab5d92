/**
 * Where an instrument's local index sits in its own life.
 *
 * The local index starts at the later of the window start and the
 * scenario start, so an instrument that started before the horizon
 * arrives with months already behind it.
 */

import { Series } from "@brickplan/scenario";
import type { InstrumentEvent, InstrumentOutput, SimulationContext } from "@brickplan/scenario";
import { monthsBetween } from "@brickplan/types";

export interface Timeline {
  /** Local positions. */
  readonly length: number;
  /** Months of the instrument's life before local position 0. */
  readonly elapsed: number;
  /** Local position of the last active month. */
  readonly last: number;
  /** The window closes on or before the scenario's last month. */
  readonly closes: boolean;
}

export function timeline(ctx: SimulationContext): Timeline {
  const { window } = ctx;
  return {
    length: ctx.index.length,
    elapsed: Math.max(0, monthsBetween(window.start, ctx.index.start)),
    last: window.endIndex - window.startIndex,
    closes: ctx.scenarioIndex.contains(window.end),
  };
}

type SeriesField = "cashIn" | "cashOut" | "assetValue" | "debtBalance" | "interest";

/**
 * Wrap plain arrays as an output on the local index; absent fields are
 * zero.
 */
export function localOutput(
  ctx: SimulationContext,
  fields: Partial<Record<SeriesField, readonly number[]>>,
  events: readonly InstrumentEvent[] = [],
): InstrumentOutput {
  const series = (values: readonly number[] | undefined): Series =>
    values === undefined ? Series.zeros(ctx.index) : Series.from(ctx.index, values);
  return {
    cashIn: series(fields.cashIn),
    cashOut: series(fields.cashOut),
    assetValue: series(fields.assetValue),
    debtBalance: series(fields.debtBalance),
    interest: series(fields.interest),
    events,
  };
}

export function money(value: number): string {
  return value.toFixed(2);
}

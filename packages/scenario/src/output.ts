/**
 * @brickplan/scenario — Output placement.
 *
 * Strategies simulate on their local index. The engine checks the shape
 * of what they return and places it on the scenario timeline: flows
 * outside the activation window become zero, stocks are kept as
 * reported.
 */

import { formatPeriod } from "@brickplan/types";
import { IdentityError } from "./errors.js";
import { Series } from "./time-series.js";
import type { TimeIndex } from "./time-series.js";
import type { ActivationWindow, InstrumentEvent, InstrumentOutput } from "./types.js";

const SERIES_FIELDS = ["cashIn", "cashOut", "assetValue", "debtBalance", "interest"] as const;
const FLOW_FIELDS: ReadonlySet<string> = new Set(["cashIn", "cashOut", "interest"]);

export function emptyOutput(index: TimeIndex): InstrumentOutput {
  const zeros = Series.zeros(index);
  return {
    cashIn: zeros,
    cashOut: zeros,
    assetValue: zeros,
    debtBalance: zeros,
    interest: zeros,
    events: [],
  };
}

/**
 * Throw OUTPUT_SHAPE unless every series sits on `index`.
 */
export function assertOutputShape(instrumentId: string, output: InstrumentOutput, index: TimeIndex): void {
  const fields: [string, Series][] = SERIES_FIELDS.map((field) => [field, output[field]]);
  if (output.units !== undefined) fields.push(["units", output.units]);

  for (const [field, series] of fields) {
    if (!series.index.equals(index)) {
      throw new IdentityError(
        "OUTPUT_SHAPE",
        `Strategy output for "${instrumentId}" has ${field} of length ${String(series.length)}, ` +
          `expected ${String(index.length)} from ${formatPeriod(index.start)}`,
      );
    }
  }
}

/**
 * Shift a local output onto the scenario index and mask flows outside
 * the window. Appends a `window_end` event when the window closes
 * inside the horizon.
 */
export function placeOutput(
  instrumentId: string,
  local: InstrumentOutput,
  window: ActivationWindow,
  scenario: TimeIndex,
): InstrumentOutput {
  const place = (field: string, series: Series): Series => {
    const values = new Array<number>(scenario.length).fill(0);
    for (let i = 0; i < series.length; i++) {
      const t = window.startIndex + i;
      if (t >= scenario.length) break;
      const masked = FLOW_FIELDS.has(field) && t > window.endIndex;
      values[t] = masked ? 0 : series.at(i);
    }
    return Series.from(scenario, values);
  };

  const events: InstrumentEvent[] = local.events.filter((e) => scenario.contains(e.period));
  if (window.endsInHorizon) {
    events.push({
      period: window.end,
      kind: "window_end",
      message: `Activation window of "${instrumentId}" ends ${formatPeriod(window.end)}`,
    });
  }

  return {
    cashIn: place("cashIn", local.cashIn),
    cashOut: place("cashOut", local.cashOut),
    assetValue: place("assetValue", local.assetValue),
    debtBalance: place("debtBalance", local.debtBalance),
    interest: place("interest", local.interest),
    ...(local.units !== undefined ? { units: place("units", local.units) } : {}),
    events,
  };
}

/**
 * Element-wise sum of outputs on one index. `units` is summed when any
 * output reports it; events are merged in period order.
 */
export function sumOutputs(index: TimeIndex, outputs: readonly InstrumentOutput[]): InstrumentOutput {
  const withUnits = outputs.filter((o) => o.units !== undefined);
  const events = outputs
    .flatMap((o) => o.events)
    .map((event, i) => ({ event, i }))
    .sort((a, b) => index.indexOf(a.event.period) - index.indexOf(b.event.period) || a.i - b.i)
    .map(({ event }) => event);

  return {
    cashIn: Series.sum(index, outputs.map((o) => o.cashIn)),
    cashOut: Series.sum(index, outputs.map((o) => o.cashOut)),
    assetValue: Series.sum(index, outputs.map((o) => o.assetValue)),
    debtBalance: Series.sum(index, outputs.map((o) => o.debtBalance)),
    interest: Series.sum(index, outputs.map((o) => o.interest)),
    ...(withUnits.length > 0
      ? { units: Series.sum(index, withUnits.flatMap((o) => (o.units === undefined ? [] : [o.units]))) }
      : {}),
    events,
  };
}

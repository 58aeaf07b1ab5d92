/**
 * Scripted strategies: each instrument reports exactly the series its
 * params list, so a test can build any shape of result.
 */

import type { Instrument, ParamValue, Params } from "@brickplan/types";
import { Scenario, Series, StrategyCatalog } from "@brickplan/scenario";
import type { ScenarioResult, SimulationContext, Strategy } from "@brickplan/scenario";

function series(ctx: SimulationContext, value: ParamValue | undefined): Series {
  if (!Array.isArray(value)) return Series.zeros(ctx.index);
  return Series.from(
    ctx.index,
    value.map((v: ParamValue) => (typeof v === "number" ? v : 0)),
  );
}

const scripted: Strategy = {
  simulate(instrument, ctx) {
    const { params } = instrument;
    return {
      cashIn: series(ctx, params.cashIn),
      cashOut: series(ctx, params.cashOut),
      assetValue: series(ctx, params.assetValue),
      debtBalance: series(ctx, params.debtBalance),
      interest: Series.zeros(ctx.index),
      ...(params.units !== undefined ? { units: series(ctx, params.units) } : {}),
      events: [],
    };
  },
};

const cashAccount: Strategy = {
  simulate(instrument, ctx) {
    let balance = typeof instrument.params.initialBalance === "number" ? instrument.params.initialBalance : 0;
    const routedIn = ctx.routed?.cashIn.values() ?? [];
    const routedOut = ctx.routed?.cashOut.values() ?? [];
    const balances = ctx.index.periods().map((_, i) => {
      balance += (routedIn[i] ?? 0) - (routedOut[i] ?? 0);
      return balance;
    });
    const zeros = Series.zeros(ctx.index);
    return {
      cashIn: zeros,
      cashOut: zeros,
      assetValue: Series.from(ctx.index, balances),
      debtBalance: zeros,
      interest: zeros,
      events: [],
    };
  },
};

export function catalog(): StrategyCatalog {
  return new StrategyCatalog()
    .register("asset", "a.cash", cashAccount, { role: "cash" })
    .register("asset", "a.scripted", scripted)
    .register("liability", "l.scripted", scripted)
    .register("flow", "f.scripted", scripted);
}

export function scriptedInstrument(
  id: string,
  family: Instrument["family"],
  params: Params,
  window?: Instrument["window"],
): Instrument {
  const kind = family === "asset" ? "a.scripted" : family === "liability" ? "l.scripted" : "f.scripted";
  return { id, name: id, kind, family, params, ...(window !== undefined ? { window } : {}) };
}

/** Run three months from 2026-01 with a cash account and the given instruments. */
export function run(instruments: Instrument[], cashParams: Params = { initialBalance: 1000 }): ScenarioResult {
  const scenario = new Scenario({
    name: "Validation",
    instruments: [{ id: "cash", name: "Cash", kind: "a.cash", family: "asset", params: cashParams }, ...instruments],
    catalog: catalog(),
  });
  return scenario.run({ start: "2026-01", months: 3 });
}

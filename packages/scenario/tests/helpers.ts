/**
 * Test strategies and fixtures.
 *
 * Deliberately small: each strategy produces numbers that are easy to
 * trace by hand.
 */

import type { Family, Instrument, ParamValue, Params } from "@brickplan/types";
import pino from "pino";
import type { Logger } from "pino";
import { StrategyCatalog } from "../src/catalog.js";
import { Series } from "../src/time-series.js";
import type { InstrumentOutput, SimulationContext, Strategy } from "../src/types.js";

export function num(value: ParamValue | undefined, fallback = 0): number {
  return typeof value === "number" ? value : fallback;
}

function output(ctx: SimulationContext, fields: Partial<Record<"cashIn" | "cashOut" | "assetValue" | "debtBalance" | "interest", number[]>>): InstrumentOutput {
  const series = (values: number[] | undefined): Series =>
    values === undefined ? Series.zeros(ctx.index) : Series.from(ctx.index, values);
  return {
    cashIn: series(fields.cashIn),
    cashOut: series(fields.cashOut),
    assetValue: series(fields.assetValue),
    debtBalance: series(fields.debtBalance),
    interest: series(fields.interest),
    events: [],
  };
}

/** Balance = previous + routed in − routed out, then monthly interest. */
export const cashStrategy: Strategy = {
  simulate(instrument, ctx) {
    const rate = num(instrument.params.interestPa) / 12;
    const routedIn = ctx.routed?.cashIn.values() ?? [];
    const routedOut = ctx.routed?.cashOut.values() ?? [];
    let balance = num(instrument.params.initialBalance);
    const balances: number[] = [];
    const interest: number[] = [];
    for (let i = 0; i < ctx.index.length; i++) {
      balance += (routedIn[i] ?? 0) - (routedOut[i] ?? 0);
      const earned = balance * rate;
      balance += earned;
      balances.push(balance);
      interest.push(earned);
    }
    return output(ctx, { assetValue: balances, interest });
  },
};

/** Fixed monthly amount in (`income`) or out (`expense`). */
export function fixedFlow(direction: "in" | "out"): Strategy {
  return {
    simulate(instrument, ctx) {
      const amounts = ctx.index.periods().map(() => num(instrument.params.amount));
      return output(ctx, direction === "in" ? { cashIn: amounts } : { cashOut: amounts });
    },
  };
}

/** Constant value, no cash. */
export const holdStrategy: Strategy = {
  simulate(instrument, ctx) {
    return output(ctx, { assetValue: ctx.index.periods().map(() => num(instrument.params.value)) });
  },
};

/** Bought for `price` in the first month, worth `price` afterwards. */
export const purchaseStrategy: Strategy = {
  simulate(instrument, ctx) {
    const price = num(instrument.params.price);
    return output(ctx, {
      cashOut: ctx.index.periods().map((_, i) => (i === 0 ? price : 0)),
      assetValue: ctx.index.periods().map(() => price),
    });
  },
};

/** Borrow a fixed amount in the first month, never repaid. */
export const borrowStrategy: Strategy = {
  prepare(instrument, ctx) {
    const property = instrument.links?.principal?.fromProperty;
    if (property === undefined) return undefined;
    return { principal: num(ctx.lookup(property).params.price) * num(instrument.params.ltv, 1) };
  },
  simulate(instrument, ctx) {
    const principal = num(instrument.params.principal);
    return output(ctx, {
      cashIn: ctx.index.periods().map((_, i) => (i === 0 ? principal : 0)),
      debtBalance: ctx.index.periods().map(() => principal),
    });
  },
};

/** Moves `amount` a month from cash into an internal pot. */
export const sweepStrategy: Strategy = {
  simulate(instrument, ctx) {
    const amount = num(instrument.params.amount);
    return output(ctx, {
      cashOut: ctx.index.periods().map(() => amount),
      assetValue: ctx.index.periods().map((_, i) => amount * (i + 1)),
    });
  },
};

/** Takes cash out of the account without booking it anywhere. */
export const leakyTransferStrategy: Strategy = {
  simulate(instrument, ctx) {
    return output(ctx, { cashOut: ctx.index.periods().map(() => num(instrument.params.amount)) });
  },
};

/** Always answers on the scenario index, whatever its window. */
export const wrongShapeStrategy: Strategy = {
  simulate(_instrument, ctx) {
    const zeros = Series.zeros(ctx.scenarioIndex);
    return { cashIn: zeros, cashOut: zeros, assetValue: zeros, debtBalance: zeros, interest: zeros, events: [] };
  },
};

/** A flow that wrongly reports a stock. */
export const stockyFlowStrategy: Strategy = {
  simulate(_instrument, ctx) {
    return output(ctx, { assetValue: ctx.index.periods().map(() => 50) });
  },
};

export function testCatalog(): StrategyCatalog {
  return new StrategyCatalog()
    .register("asset", "a.cash", cashStrategy, { role: "cash" })
    .register("asset", "a.hold", holdStrategy)
    .register("asset", "a.purchase", purchaseStrategy)
    .register("liability", "l.borrow", borrowStrategy)
    .register("flow", "f.income", fixedFlow("in"))
    .register("flow", "f.expense", fixedFlow("out"))
    .register("flow", "f.stocky", stockyFlowStrategy)
    .register("transfer", "t.sweep", sweepStrategy)
    .register("transfer", "t.leaky", leakyTransferStrategy)
    .register("asset", "a.wrong", wrongShapeStrategy);
}

export function instrument(
  id: string,
  family: Family,
  kind: string,
  params: Params = {},
  extra: Partial<Pick<Instrument, "links" | "window" | "currency">> = {},
): Instrument {
  return { id, name: id, kind, family, params, ...extra };
}

export const cash = (initialBalance = 1000, interestPa = 0): Instrument =>
  instrument("cash", "asset", "a.cash", { initialBalance, interestPa });
export const salary = (amount = 500): Instrument => instrument("salary", "flow", "f.income", { amount });
export const rent = (amount = 200): Instrument => instrument("rent", "flow", "f.expense", { amount });

/** Pino logger that keeps every record in memory. */
export function capturingLogger(): { logger: Logger; records: Record<string, unknown>[] } {
  const records: Record<string, unknown>[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === "object" && parsed !== null) {
          records.push(parsed as Record<string, unknown>);
        }
      },
    },
  );
  return { logger, records };
}

/**
 * Fixed recurring flows (`f.income.fixed`, `f.expense.fixed`).
 *
 * amountMonthly every active month, stepped by annualStepPct on each
 * anniversary of the window start. Nothing flows outside the window.
 */

import type { Strategy } from "@brickplan/scenario";
import type { Instrument } from "@brickplan/types";
import { optionalNumber, requireNumber } from "./params.js";
import { localOutput, timeline } from "./timeline.js";

export type FlowDirection = "income" | "expense";

function readParams(instrument: Instrument): { amountMonthly: number; annualStepPct: number } {
  return {
    amountMonthly: requireNumber(instrument, "amountMonthly", { min: 0 }),
    annualStepPct: optionalNumber(instrument, "annualStepPct", 0, { above: -1 }),
  };
}

export function fixedFlow(direction: FlowDirection): Strategy {
  return {
    prepare(instrument) {
      readParams(instrument);
      return undefined;
    },

    simulate(instrument, ctx) {
      const { amountMonthly, annualStepPct } = readParams(instrument);
      const tl = timeline(ctx);
      const amounts = ctx.index.periods().map((_, i) => {
        if (i > tl.last) return 0;
        const years = Math.floor((tl.elapsed + i) / 12);
        return amountMonthly * Math.pow(1 + annualStepPct, years);
      });
      return localOutput(ctx, direction === "income" ? { cashIn: amounts } : { cashOut: amounts });
    },
  };
}

export const fixedIncome: Strategy = fixedFlow("income");
export const fixedExpense: Strategy = fixedFlow("expense");

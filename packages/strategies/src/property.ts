/**
 * Property (`a.property`).
 *
 * Bought in the first month of its window for price plus feesPct of
 * the price, then appreciates at appreciationPa compounded monthly.
 * With sellOnWindowEnd the property is sold in the last active month
 * (less sellFeesPct); otherwise its value is held flat once the window
 * closes.
 *
 * A property whose window started before the horizon is already owned:
 * no purchase, value carried forward from the price.
 */

import type { InstrumentEvent, Strategy } from "@brickplan/scenario";
import type { Instrument } from "@brickplan/types";
import { money, localOutput, timeline } from "./timeline.js";
import { optionalBoolean, optionalNumber, requireNumber } from "./params.js";

interface PropertyParams {
  readonly price: number;
  readonly appreciationPa: number;
  readonly feesPct: number;
  readonly sellOnWindowEnd: boolean;
  readonly sellFeesPct: number;
}

function readParams(instrument: Instrument): PropertyParams {
  return {
    price: requireNumber(instrument, "price", { above: 0 }),
    appreciationPa: optionalNumber(instrument, "appreciationPa", 0, { above: -1 }),
    feesPct: optionalNumber(instrument, "feesPct", 0, { min: 0 }),
    sellOnWindowEnd: optionalBoolean(instrument, "sellOnWindowEnd", false),
    sellFeesPct: optionalNumber(instrument, "sellFeesPct", 0, { min: 0 }),
  };
}

export const property: Strategy = {
  prepare(instrument) {
    readParams(instrument);
    return undefined;
  },

  simulate(instrument, ctx) {
    const p = readParams(instrument);
    const tl = timeline(ctx);
    const cashIn = new Array<number>(tl.length).fill(0);
    const cashOut = new Array<number>(tl.length).fill(0);
    const events: InstrumentEvent[] = [];

    // Value after `life` months of ownership.
    const valueAt = (life: number): number => p.price * Math.pow(1 + p.appreciationPa, life / 12);
    const value = ctx.index.periods().map((_, i) => valueAt(tl.elapsed + Math.min(i, tl.last)));

    if (tl.elapsed === 0) {
      const fees = p.price * p.feesPct;
      cashOut[0] = p.price + fees;
      events.push({
        period: ctx.index.start,
        kind: "purchase",
        message: `Bought ${instrument.name} for ${money(p.price)} plus ${money(fees)} fees`,
        amount: p.price + fees,
      });
    }

    if (p.sellOnWindowEnd && tl.closes) {
      const t = tl.last;
      const gross = value[t] ?? 0;
      const proceeds = gross * (1 - p.sellFeesPct);
      cashIn[t] = proceeds;
      value.fill(0, t);
      events.push({
        period: ctx.index.at(t),
        kind: "sale",
        message: `Sold ${instrument.name} for ${money(proceeds)}`,
        amount: proceeds,
      });
    }

    return localOutput(ctx, { cashIn, cashOut, assetValue: value }, events);
  },
};

/**
 * Annuity loan (`l.loan.annuity`).
 *
 * Drawn in the first month of its window, repaid in equal monthly
 * instalments from the following month over termMonths at ratePa.
 * The instalment in the final term month settles whatever rounding
 * left.
 *
 * Principal, in order of precedence:
 * - params.principal
 * - links.principal.nominal
 * - links.principal.fromProperty: the property's price less downPayment
 * - links.principal.remainingOf: the balance another loan paid off in or
 *   before this loan's first month (refinancing)
 *
 * When the window closes inside the horizon with debt left,
 * balloonPolicy decides: "payoff" repays it in the last active month;
 * "carry" leaves it on the books, held flat. The default is "payoff"
 * when the window sets an end or a duration, "carry" otherwise.
 */

import type { InstrumentEvent, SimulationContext, Strategy } from "@brickplan/scenario";
import type { Instrument, Params } from "@brickplan/types";
import { comparePeriods, formatPeriod } from "@brickplan/types";
import { invalidParams, maybeNumber, optionalChoice, optionalNumber, requireNumber } from "./params.js";
import { localOutput, money, timeline } from "./timeline.js";

export const BALLOON_POLICIES = ["payoff", "carry"] as const;
export type BalloonPolicy = (typeof BALLOON_POLICIES)[number];

/**
 * Level monthly instalment repaying `principal` over `termMonths` at
 * `monthlyRate`.
 */
export function annuityPayment(principal: number, monthlyRate: number, termMonths: number): number {
  if (monthlyRate === 0) return principal / termMonths;
  return (principal * monthlyRate) / (1 - Math.pow(1 + monthlyRate, -termMonths));
}

function lookupPrice(instrument: Instrument, propertyId: string, ctx: SimulationContext): number {
  const price = ctx.lookup(propertyId).params.price;
  if (typeof price !== "number") {
    throw invalidParams(instrument, `financed property "${propertyId}" has no numeric price`);
  }
  return price;
}

function balloonPolicy(instrument: Instrument): BalloonPolicy {
  const bounded = instrument.window?.end !== undefined || instrument.window?.durationMonths !== undefined;
  return optionalChoice(instrument, "balloonPolicy", BALLOON_POLICIES, bounded ? "payoff" : "carry");
}

/** Principal known before simulation, if any. */
function declaredPrincipal(instrument: Instrument, ctx: SimulationContext): number | undefined {
  const explicit = maybeNumber(instrument, "principal", { above: 0 });
  if (explicit !== undefined) return explicit;

  const link = instrument.links?.principal;
  if (link?.nominal !== undefined) {
    if (!(link.nominal > 0)) {
      throw invalidParams(instrument, `links.principal.nominal must be positive, got ${String(link.nominal)}`);
    }
    return link.nominal;
  }
  if (link?.fromProperty !== undefined) {
    const downPayment = optionalNumber(instrument, "downPayment", 0, { min: 0 });
    const financed = lookupPrice(instrument, link.fromProperty, ctx) - downPayment;
    if (financed <= 0) {
      throw invalidParams(
        instrument,
        `downPayment ${money(downPayment)} leaves nothing to finance on "${link.fromProperty}"`,
      );
    }
    return financed;
  }
  if (link?.remainingOf !== undefined) return undefined;

  throw invalidParams(instrument, "needs params.principal or a links.principal source");
}

function refinancedPrincipal(instrument: Instrument, refId: string, ctx: SimulationContext): number {
  const payoff = ctx
    .outputOf(refId)
    ?.events.find(
      (e) => e.kind === "payoff" && e.amount !== undefined && comparePeriods(e.period, ctx.window.start) <= 0,
    );
  if (payoff?.amount === undefined) {
    throw invalidParams(instrument, `refinances "${refId}", which is not paid off by ${formatPeriod(ctx.window.start)}`);
  }
  return payoff.amount;
}

export const annuityLoan: Strategy = {
  prepare(instrument, ctx) {
    requireNumber(instrument, "termMonths", { min: 1, integer: true });
    optionalNumber(instrument, "ratePa", 0, { min: 0 });
    const principal = declaredPrincipal(instrument, ctx);

    const derived: Params = { balloonPolicy: balloonPolicy(instrument) };
    return principal === undefined ? derived : { ...derived, principal };
  },

  simulate(instrument, ctx) {
    const termMonths = requireNumber(instrument, "termMonths", { min: 1, integer: true });
    const rate = optionalNumber(instrument, "ratePa", 0, { min: 0 }) / 12;
    const policy = balloonPolicy(instrument);
    const remainingOf = instrument.links?.principal?.remainingOf;
    const principal =
      declaredPrincipal(instrument, ctx) ??
      (remainingOf !== undefined ? refinancedPrincipal(instrument, remainingOf, ctx) : 0);
    const payment = annuityPayment(principal, rate, termMonths);

    const tl = timeline(ctx);
    const cashIn = new Array<number>(tl.length).fill(0);
    const cashOut = new Array<number>(tl.length).fill(0);
    const interest = new Array<number>(tl.length).fill(0);
    const debt = new Array<number>(tl.length).fill(0);
    const events: InstrumentEvent[] = [];

    let balance = 0;
    const activeMonths = tl.elapsed + tl.last + 1;
    for (let life = 0; life < activeMonths; life++) {
      const i = life - tl.elapsed;
      let drawn = 0;
      let paid = 0;
      let charged = 0;

      if (life === 0) {
        balance = principal;
        drawn = principal;
      } else if (balance > 0) {
        charged = balance * rate;
        const repaid = life >= termMonths ? balance : Math.min(payment - charged, balance);
        balance -= repaid;
        paid = charged + repaid;
      }
      if (i < 0) continue;

      cashIn[i] = drawn;
      cashOut[i] = paid;
      interest[i] = -charged;
      debt[i] = balance;
    }

    const last = tl.last;
    if (tl.closes && balance > 0) {
      const period = ctx.index.at(last);
      if (policy === "payoff") {
        events.push({
          period,
          kind: "payoff",
          message: `Balloon payoff of ${money(balance)} on ${instrument.name}`,
          amount: balance,
        });
        cashOut[last] = (cashOut[last] ?? 0) + balance;
        debt[last] = 0;
      } else {
        events.push({
          period,
          kind: "balloon_due",
          message: `${money(balance)} still owed on ${instrument.name} when its window ends`,
          amount: balance,
        });
      }
    }
    // Held flat once the window has closed.
    debt.fill(debt[last] ?? 0, last + 1);

    if (principal > 0 && tl.elapsed === 0) {
      events.unshift({
        period: ctx.index.start,
        kind: "draw",
        message: `Drew ${money(principal)} on ${instrument.name}`,
        amount: principal,
      });
    }
    return localOutput(ctx, { cashIn, cashOut, interest, debtBalance: debt }, events);
  },
};

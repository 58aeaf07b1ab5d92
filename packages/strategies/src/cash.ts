/**
 * Cash account (`a.cash`, role cash).
 *
 * Receives the routed flows of every other instrument. Each month the
 * balance moves by routed in − routed out, then earns interestPa / 12 on
 * the result (negative balances pay it).
 *
 * Params: initialBalance (0), interestPa (0), overdraftLimit, minBuffer.
 * The last two are policies checked after the run, not enforced here.
 */

import type { Strategy } from "@brickplan/scenario";
import { localOutput } from "./timeline.js";
import { maybeNumber, optionalNumber } from "./params.js";

export const cashAccount: Strategy = {
  prepare(instrument, ctx) {
    const initialBalance = optionalNumber(instrument, "initialBalance", 0);
    optionalNumber(instrument, "interestPa", 0);
    maybeNumber(instrument, "overdraftLimit", { min: 0 });
    const minBuffer = maybeNumber(instrument, "minBuffer", { min: 0 });

    if (minBuffer !== undefined && minBuffer > initialBalance) {
      ctx.logger.warn({ minBuffer, initialBalance }, "Minimum buffer exceeds the initial balance");
    }
    return undefined;
  },

  simulate(instrument, ctx) {
    const rate = optionalNumber(instrument, "interestPa", 0) / 12;
    const routedIn = ctx.routed?.cashIn.values() ?? [];
    const routedOut = ctx.routed?.cashOut.values() ?? [];

    let balance = optionalNumber(instrument, "initialBalance", 0);
    const balances: number[] = [];
    const interest: number[] = [];
    for (let i = 0; i < ctx.index.length; i++) {
      balance += (routedIn[i] ?? 0) - (routedOut[i] ?? 0);
      const earned = balance * rate;
      balance += earned;
      balances.push(balance);
      interest.push(earned);
    }
    return localOutput(ctx, { assetValue: balances, interest });
  },
};

/**
 * @brickplan/scenario — Ledger compilation.
 *
 * Turns simulated outputs into journal entries. Per instrument and
 * period one entry carries:
 * - the cash leg on the cash account (cashIn − cashOut)
 * - the node leg on the instrument's own account (Δasset − Δdebt)
 * - the boundary remainder that makes the entry net to zero
 *
 * Flows post cash against their boundary node only. Transfers stay
 * internal: a non-zero remainder is an identity violation. The cash
 * account posts whatever its balance moved beyond the routed legs
 * (opening balance, interest) against the boundary.
 *
 * All amounts are quantized to the currency's precision before they
 * are compared or posted.
 */

import type { AccountRegistry, Journal, PostingInput } from "@brickplan/ledger";
import {
  BOUNDARY_ACCOUNT_ID,
  brickAccountId,
  createEntry,
  currencyDecimals,
  formatAmount,
  generateEntryId,
  quantizeScaled,
} from "@brickplan/ledger";
import type { Currency, Instrument } from "@brickplan/types";
import { formatPeriod } from "@brickplan/types";
import { IdentityError } from "./errors.js";
import type { Series, TimeIndex } from "./time-series.js";
import type { ActivationWindow, InstrumentOutput } from "./types.js";

export type EntryType = "flow" | "node" | "opening" | "interest" | "residual";

export interface CompileInput {
  readonly index: TimeIndex;
  readonly currency: Currency;
  readonly journal: Journal;
  readonly accounts: AccountRegistry;
  /** Non-cash instruments in execution order. */
  readonly instruments: readonly Instrument[];
  readonly cash: Instrument;
  readonly outputs: ReadonlyMap<string, InstrumentOutput>;
  readonly windows: ReadonlyMap<string, ActivationWindow>;
}

export function compileLedger(input: CompileInput): void {
  const { index, currency, journal, accounts } = input;
  const decimals = currencyDecimals(currency);
  const q = (series: Series, t: number): bigint => (t < 0 ? 0n : quantizeScaled(series.at(t), decimals));
  const cashAccount = brickAccountId(input.cash.id, input.cash.family);
  const routedLegs = new Array<bigint>(index.length).fill(0n);

  const post = (instrument: Instrument, t: number, sequence: number, type: EntryType, legs: [string, bigint][]): void => {
    const postings: PostingInput[] = legs
      .filter(([, amount]) => amount !== 0n)
      .map(([accountId, amount]) => ({
        accountId,
        money: { amount: formatAmount(amount, decimals), currency, decimals },
      }));
    if (postings.length === 0) return;

    const period = index.at(t);
    journal.post(
      createEntry({
        id: generateEntryId({
          instrumentId: instrument.id,
          period,
          params: instrument.params,
          links: instrument.links,
          sequence,
        }),
        period,
        postings,
        metadata: { instrumentId: instrument.id, kind: instrument.kind, family: instrument.family, type },
      }),
    );
  };

  for (const instrument of input.instruments) {
    const output = input.outputs.get(instrument.id);
    if (output === undefined) continue;
    const node = brickAccountId(instrument.id, instrument.family);

    if (instrument.family === "flow") {
      accounts.validateFlowAccounts(node, [cashAccount]);
    } else if (instrument.family === "transfer") {
      accounts.validateTransferAccounts(node, cashAccount);
    }

    for (let t = 0; t < index.length; t++) {
      const cash = q(output.cashIn, t) - q(output.cashOut, t);
      routedLegs[t] = (routedLegs[t] ?? 0n) + cash;

      if (instrument.family === "flow") {
        post(instrument, t, 0, "flow", [
          [cashAccount, cash],
          [node, -cash],
        ]);
        continue;
      }

      const nodeLeg =
        q(output.assetValue, t) - q(output.assetValue, t - 1) - (q(output.debtBalance, t) - q(output.debtBalance, t - 1));
      const remainder = -(cash + nodeLeg);

      if (instrument.family === "transfer" && remainder !== 0n) {
        throw new IdentityError(
          "TRANSFER_LEAK",
          `Transfer "${instrument.id}" does not net to zero in ${formatPeriod(index.at(t))}: ` +
            `${formatAmount(remainder, decimals)} ${currency} would cross the boundary`,
        );
      }

      post(instrument, t, 0, "node", [
        [cashAccount, cash],
        [node, nodeLeg],
        [BOUNDARY_ACCOUNT_ID, remainder],
      ]);
    }
  }

  const cashOutput = input.outputs.get(input.cash.id);
  if (cashOutput === undefined) return;
  const opening = input.windows.get(input.cash.id);
  const firstActive = opening?.active === true ? opening.startIndex : -1;

  for (let t = 0; t < index.length; t++) {
    const residual = q(cashOutput.assetValue, t) - q(cashOutput.assetValue, t - 1) - (routedLegs[t] ?? 0n);

    if (t === firstActive) {
      const interest = q(cashOutput.interest, t);
      const openingLeg = residual - interest;
      post(input.cash, t, 0, "opening", [
        [cashAccount, openingLeg],
        [BOUNDARY_ACCOUNT_ID, -openingLeg],
      ]);
      post(input.cash, t, 1, "interest", [
        [cashAccount, interest],
        [BOUNDARY_ACCOUNT_ID, -interest],
      ]);
    } else {
      post(input.cash, t, 0, "residual", [
        [cashAccount, residual],
        [BOUNDARY_ACCOUNT_ID, -residual],
      ]);
    }
  }
}

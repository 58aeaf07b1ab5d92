/**
 * @brickplan/scenario — Aggregation.
 *
 * Scenario totals, MacroBrick aggregates and calendar re-bucketing.
 *
 * Rules:
 * - Totals sum executed outputs only, so an instrument shared by several
 *   MacroBricks is counted once
 * - Equity comes from the journal (internal accounts) and must agree
 *   with assets − liabilities up to rounding
 * - Re-bucketing sums flows and keeps the last value of stocks
 */

import type { AccountRegistry, Journal } from "@brickplan/ledger";
import { currencyDecimals, formatAmount, parseAmount } from "@brickplan/ledger";
import type { Registry } from "@brickplan/registry";
import type { Currency, Period } from "@brickplan/types";
import { formatPeriod } from "@brickplan/types";
import { IdentityError } from "./errors.js";
import { sumOutputs } from "./output.js";
import { Series } from "./time-series.js";
import type { TimeIndex } from "./time-series.js";
import type { InstrumentOutput, Totals, TotalsField } from "./types.js";

// =============================================================================
// Totals
// =============================================================================

/**
 * Net internal balance at the end of each period, from a single pass
 * over the journal.
 */
export function equityFromJournal(
  journal: Journal,
  accounts: AccountRegistry,
  index: TimeIndex,
  currency: Currency,
): Series {
  const decimals = currencyDecimals(currency);
  const end = index.end;
  if (end === undefined) return Series.zeros(index);

  const perPeriod = new Array<bigint>(index.length).fill(0n);
  for (const entry of journal.entriesBetween(index.start, end)) {
    const t = index.indexOf(entry.period);
    for (const posting of entry.postings) {
      if (posting.money.currency !== currency) continue;
      if (accounts.getAccount(posting.accountId)?.scope !== "internal") continue;
      perPeriod[t] = (perPeriod[t] ?? 0n) + parseAmount(posting.money.amount, posting.money.decimals);
    }
  }

  let running = 0n;
  return Series.from(
    index,
    perPeriod.map((net) => {
      running += net;
      return Number(formatAmount(running, decimals));
    }),
  );
}

export interface TotalsInput {
  readonly index: TimeIndex;
  readonly currency: Currency;
  readonly outputs: readonly InstrumentOutput[];
  readonly cash: InstrumentOutput;
  readonly journal: Journal;
  readonly accounts: AccountRegistry;
}

export function computeTotals(input: TotalsInput): Totals {
  const { index, currency } = input;
  const summed = sumOutputs(index, input.outputs);
  const assets = summed.assetValue;
  const liabilities = summed.debtBalance;
  const equity = equityFromJournal(input.journal, input.accounts, index, currency);

  // Each stock series may round by half a unit per period.
  const tolerance = 10 ** -currencyDecimals(currency) * (input.outputs.length + 1);
  const netWorth = assets.subtract(liabilities);
  const breaks: string[] = [];
  for (let t = 0; t < index.length; t++) {
    const diff = equity.at(t) - netWorth.at(t);
    if (Math.abs(diff) > tolerance) {
      breaks.push(
        `${formatPeriod(index.at(t))}: journal equity ${String(equity.at(t))} vs assets − liabilities ${String(netWorth.at(t))}`,
      );
    }
  }
  if (breaks.length > 0) {
    throw new IdentityError(
      "EQUITY_IDENTITY",
      `Equity identity broken in ${String(breaks.length)} period(s); first: ${breaks[0] ?? ""}`,
      breaks,
    );
  }

  const cash = input.cash.assetValue;
  return {
    index,
    cashIn: summed.cashIn,
    cashOut: summed.cashOut,
    netCashFlow: summed.cashIn.subtract(summed.cashOut),
    assets,
    liabilities,
    interest: summed.interest,
    equity,
    cash,
    nonCash: assets.subtract(cash),
  };
}

// =============================================================================
// MacroBrick Aggregates
// =============================================================================

/**
 * Element-wise sums of each MacroBrick's executed members. MacroBricks
 * with no executed member are left out.
 */
export function buildStructResults(
  registry: Registry,
  outputs: ReadonlyMap<string, InstrumentOutput>,
  index: TimeIndex,
  filter?: readonly string[],
): Record<string, InstrumentOutput> {
  const ids = filter === undefined ? registry.macroBrickIds() : filter.filter((id) => registry.isMacroBrick(id));
  const result: Record<string, InstrumentOutput> = {};

  for (const id of ids) {
    const members = registry
      .getFlatMembers(id)
      .flatMap((member) => {
        const output = outputs.get(member);
        return output === undefined ? [] : [output];
      });
    if (members.length === 0) continue;
    result[id] = sumOutputs(index, members);
  }

  return result;
}

// =============================================================================
// Re-bucketing
// =============================================================================

export type Frequency = "quarter" | "year";

const FLOW_TOTALS: readonly TotalsField[] = ["cashIn", "cashOut", "netCashFlow", "interest"];
const STOCK_TOTALS: readonly TotalsField[] = ["assets", "liabilities", "equity", "cash", "nonCash"];

export type TotalsBucket = { readonly label: string; readonly start: Period; readonly end: Period } & Readonly<
  Record<TotalsField, number>
>;

function bucketLabel(p: Period, frequency: Frequency): string {
  return frequency === "year" ? String(p.year) : `${String(p.year)}-Q${String(Math.floor((p.month - 1) / 3) + 1)}`;
}

/**
 * Group monthly totals into calendar quarters or years. A partial first
 * or last bucket covers only the months in the index.
 */
export function aggregateTotals(totals: Totals, frequency: Frequency): TotalsBucket[] {
  const buckets: TotalsBucket[] = [];
  let current: { label: string; start: Period; end: Period; values: Record<TotalsField, number> } | undefined;

  const flush = (): void => {
    if (current !== undefined) {
      buckets.push({ label: current.label, start: current.start, end: current.end, ...current.values });
    }
  };

  totals.index.periods().forEach((p, t) => {
    const label = bucketLabel(p, frequency);
    if (current === undefined || current.label !== label) {
      flush();
      current = {
        label,
        start: p,
        end: p,
        values: {
          cashIn: 0,
          cashOut: 0,
          netCashFlow: 0,
          interest: 0,
          assets: 0,
          liabilities: 0,
          equity: 0,
          cash: 0,
          nonCash: 0,
        },
      };
    }
    current.end = p;
    for (const field of FLOW_TOTALS) current.values[field] += totals[field].at(t);
    for (const field of STOCK_TOTALS) current.values[field] = totals[field].at(t);
  });
  flush();

  return buckets;
}


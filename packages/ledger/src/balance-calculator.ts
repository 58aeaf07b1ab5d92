/**
 * @brickplan/ledger — Balance replay.
 *
 * Pure functions over an ordered entry list. The journal hands these
 * entries already sorted by period, then insertion order.
 *
 * Rules:
 * - Balances are computed per currency (never cross-currency)
 * - Replay stops at the first entry past the cut-off
 */

import type { Period } from "@brickplan/types";
import { comparePeriods, formatPeriod } from "@brickplan/types";
import type { JournalEntry, TrialBalance, TrialBalanceLine } from "./types.js";
import { formatAmount, parseAmount } from "./money-math.js";

/**
 * Key for grouping postings by account + currency.
 */
export function balanceKey(accountId: string, currency: string): string {
  return `${accountId}::${currency}`;
}

/**
 * Internal accumulator for building balances.
 */
export interface BalanceAccumulator {
  readonly accountId: string;
  readonly currency: string;
  readonly decimals: number;
  net: bigint;
}

/**
 * Apply one entry's postings to a set of accumulators.
 */
export function accumulate(
  accumulators: Map<string, BalanceAccumulator>,
  entry: JournalEntry,
): void {
  for (const posting of entry.postings) {
    const { currency, decimals } = posting.money;
    const key = balanceKey(posting.accountId, currency);
    let acc = accumulators.get(key);
    if (acc === undefined) {
      acc = { accountId: posting.accountId, currency, decimals, net: 0n };
      accumulators.set(key, acc);
    }
    acc.net += parseAmount(posting.money.amount, decimals);
  }
}

/**
 * Replay sorted entries up to and including `at`.
 */
export function replay(
  sorted: readonly JournalEntry[],
  at?: Period,
): Map<string, BalanceAccumulator> {
  const accumulators = new Map<string, BalanceAccumulator>();
  for (const entry of sorted) {
    if (at !== undefined && comparePeriods(entry.period, at) > 0) break;
    accumulate(accumulators, entry);
  }
  return accumulators;
}

/**
 * Build a trial balance from accumulators. Balanced when every
 * currency nets to zero across all accounts.
 */
export function computeTrialBalance(
  accumulators: ReadonlyMap<string, BalanceAccumulator>,
  at?: Period,
): TrialBalance {
  const lines: TrialBalanceLine[] = [];
  const currencyTotals = new Map<string, bigint>();

  for (const acc of accumulators.values()) {
    lines.push({
      accountId: acc.accountId,
      currency: acc.currency,
      decimals: acc.decimals,
      balance: formatAmount(acc.net, acc.decimals),
    });
    currencyTotals.set(acc.currency, (currencyTotals.get(acc.currency) ?? 0n) + acc.net);
  }

  let balanced = true;
  for (const total of currencyTotals.values()) {
    if (total !== 0n) {
      balanced = false;
      break;
    }
  }

  return {
    lines,
    asOf: at === undefined ? undefined : formatPeriod(at),
    balanced,
  };
}

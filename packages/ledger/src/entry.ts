/**
 * @brickplan/ledger — Journal entry construction.
 *
 * createEntry() is the only way to build a JournalEntry. Postings never
 * exist on their own.
 *
 * Validation rules (fail-closed — all must pass):
 * 1. At least two postings
 * 2. Every Money value is well-formed
 * 3. One precision per currency within the entry
 * 4. Postings sum to exactly zero per currency
 */

import { toPeriod } from "@brickplan/types";
import type { EntryInput, JournalEntry, Posting } from "./types.js";
import { LedgerError } from "./types.js";
import { formatAmount, parseAmount, validateMoney } from "./money-math.js";

interface CurrencyTotal {
  readonly decimals: number;
  sum: bigint;
}

/**
 * Sum postings per currency, rejecting mixed precision.
 */
function totalsByCurrency(postings: readonly Posting[]): Map<string, CurrencyTotal> {
  const totals = new Map<string, CurrencyTotal>();

  for (const posting of postings) {
    const { currency, decimals } = posting.money;
    let total = totals.get(currency);
    if (total === undefined) {
      total = { decimals, sum: 0n };
      totals.set(currency, total);
    } else if (total.decimals !== decimals) {
      throw new LedgerError(
        "CURRENCY_MISMATCH",
        `Currency "${currency}" appears with ${String(total.decimals)} and ${String(decimals)} decimals`,
      );
    }
    total.sum += parseAmount(posting.money.amount, decimals);
  }

  return totals;
}

/**
 * Assert the structural invariants of an entry. Throws LedgerError.
 */
export function assertBalanced(id: string, postings: readonly Posting[]): void {
  if (postings.length < 2) {
    throw new LedgerError(
      "EMPTY_ENTRY",
      `Entry "${id}" needs at least two postings, got ${String(postings.length)}`,
    );
  }

  for (const posting of postings) {
    validateMoney(posting.money);
  }

  for (const [currency, total] of totalsByCurrency(postings)) {
    if (total.sum !== 0n) {
      throw new LedgerError(
        "UNBALANCED_ENTRY",
        `Entry "${id}" is unbalanced for ${currency}: postings sum to ${formatAmount(total.sum, total.decimals)}`,
      );
    }
  }
}

/**
 * Non-throwing variant used by invariant sweeps.
 */
export function checkBalanced(entry: JournalEntry): string | undefined {
  try {
    assertBalanced(entry.id, entry.postings);
    return undefined;
  } catch (error) {
    if (error instanceof LedgerError) return error.message;
    throw error;
  }
}

/**
 * Build a validated, immutable journal entry.
 */
export function createEntry(input: EntryInput): JournalEntry {
  const postings: Posting[] = input.postings.map((p) => ({
    accountId: p.accountId,
    money: { ...p.money },
    metadata: { ...(p.metadata ?? {}) },
  }));

  assertBalanced(input.id, postings);

  return Object.freeze({
    id: input.id,
    period: toPeriod(input.period),
    postings: Object.freeze(postings),
    metadata: { ...(input.metadata ?? {}) },
  });
}

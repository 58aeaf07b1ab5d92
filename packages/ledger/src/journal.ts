/**
 * @brickplan/ledger — Journal.
 *
 * Append-only double-entry journal. Once an entry is posted, it is
 * permanent. Corrections are new reversing entries.
 *
 * API surface:
 * - post() — Append a balanced entry (the only write operation)
 * - balance() — Current or as-of balance of one account
 * - trialBalance() — Every (account, currency) pair in one replay pass
 * - cashflow() — Net movement within a window, optionally by scope
 * - validateInvariants() — Violation list, never throws
 * - entries() / entriesForAccount() / entriesBetween()
 */

import type { AccountScope, Currency, Money, PeriodLike } from "@brickplan/types";
import { comparePeriods, formatPeriod, toPeriod } from "@brickplan/types";
import type { AccountRegistry } from "./accounts.js";
import { accumulate, balanceKey, computeTrialBalance, replay } from "./balance-calculator.js";
import type { BalanceAccumulator } from "./balance-calculator.js";
import { currencyDecimals } from "./currency.js";
import { assertBalanced, checkBalanced } from "./entry.js";
import { formatAmount, parseAmount } from "./money-math.js";
import type { JournalEntry, TrialBalance } from "./types.js";
import { LedgerError } from "./types.js";

export class Journal {
  private readonly _entries: JournalEntry[] = [];
  private readonly _entryIds: Set<string> = new Set();
  private readonly _balances: Map<string, BalanceAccumulator> = new Map();
  private readonly _decimals: Map<string, number> = new Map();
  private _sorted: JournalEntry[] | undefined;

  constructor(private readonly _accounts?: AccountRegistry) {}

  /** The account registry this journal resolves scopes against, if any. */
  get accounts(): AccountRegistry | undefined {
    return this._accounts;
  }

  // ─── Core Append (The Only Write Operation) ──────────────────────────

  /**
   * Append an entry.
   *
   * Re-validates the entry, rejects a reused id and a currency posted
   * at a precision that differs from earlier entries.
   */
  post(entry: JournalEntry): JournalEntry {
    assertBalanced(entry.id, entry.postings);

    if (this._entryIds.has(entry.id)) {
      throw new LedgerError("DUPLICATE_ENTRY_ID", `Entry ID already exists in journal: "${entry.id}"`);
    }

    for (const posting of entry.postings) {
      const known = this._decimals.get(posting.money.currency);
      if (known !== undefined && known !== posting.money.decimals) {
        throw new LedgerError(
          "CURRENCY_MISMATCH",
          `Currency "${posting.money.currency}" was posted with ${String(known)} decimals, entry "${entry.id}" uses ${String(posting.money.decimals)}`,
        );
      }
    }

    for (const posting of entry.postings) {
      this._decimals.set(posting.money.currency, posting.money.decimals);
    }
    this._entries.push(entry);
    this._entryIds.add(entry.id);
    accumulate(this._balances, entry);
    this._sorted = undefined;
    return entry;
  }

  has(entryId: string): boolean {
    return this._entryIds.has(entryId);
  }

  // ─── Balance Queries ─────────────────────────────────────────────────

  /**
   * Balance of one account in one currency. Positive = net debit.
   * Without `at` the running cache answers; with `at` entries up to and
   * including that period are replayed.
   */
  balance(accountId: string, currency: Currency, at?: PeriodLike): Money {
    const decimals = this._decimals.get(currency) ?? currencyDecimals(currency);
    const key = balanceKey(accountId, currency);

    let net: bigint;
    if (at === undefined) {
      net = this._balances.get(key)?.net ?? 0n;
    } else {
      const cutoff = toPeriod(at);
      net = 0n;
      for (const entry of this.sortedEntries()) {
        if (comparePeriods(entry.period, cutoff) > 0) break;
        for (const posting of entry.postings) {
          if (posting.accountId === accountId && posting.money.currency === currency) {
            net += parseAmount(posting.money.amount, decimals);
          }
        }
      }
    }

    return { amount: formatAmount(net, decimals), currency, decimals };
  }

  trialBalance(at?: PeriodLike): TrialBalance {
    if (at === undefined) {
      return computeTrialBalance(replay(this.sortedEntries()));
    }
    const cutoff = toPeriod(at);
    return computeTrialBalance(replay(this.sortedEntries(), cutoff), cutoff);
  }

  /**
   * Net posting sum per currency for entries within [start, end].
   * With a scope, only postings to accounts of that scope count, which
   * needs the journal's account registry.
   */
  cashflow(start: PeriodLike, end: PeriodLike, scope?: AccountScope): readonly Money[] {
    if (scope !== undefined && this._accounts === undefined) {
      throw new LedgerError(
        "SCOPE_VIOLATION",
        "cashflow() with a scope filter needs a journal built with an AccountRegistry",
      );
    }

    const totals = new Map<string, { decimals: number; net: bigint }>();
    for (const entry of this.entriesBetween(start, end)) {
      for (const posting of entry.postings) {
        if (scope !== undefined && this._accounts?.getAccount(posting.accountId)?.scope !== scope) {
          continue;
        }
        const { currency, decimals } = posting.money;
        const total = totals.get(currency) ?? { decimals, net: 0n };
        total.net += parseAmount(posting.money.amount, decimals);
        totals.set(currency, total);
      }
    }

    return [...totals.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([currency, total]) => ({
        amount: formatAmount(total.net, total.decimals),
        currency,
        decimals: total.decimals,
      }));
  }

  // ─── Invariants ──────────────────────────────────────────────────────

  /**
   * Re-check every entry and, given a registry, every posting's account.
   * Returns the violations; an empty list means the journal is sound.
   */
  validateInvariants(accounts: AccountRegistry | undefined = this._accounts): string[] {
    const violations: string[] = [];

    for (const entry of this._entries) {
      const problem = checkBalanced(entry);
      if (problem !== undefined) {
        violations.push(problem);
      }
      if (accounts !== undefined) {
        for (const posting of entry.postings) {
          if (!accounts.hasAccount(posting.accountId)) {
            violations.push(
              `Entry "${entry.id}" (${formatPeriod(entry.period)}) posts to orphan account "${posting.accountId}"`,
            );
          }
        }
      }
    }

    return violations;
  }

  // ─── Entry Queries ───────────────────────────────────────────────────

  /** Entries in insertion order. */
  entries(): readonly JournalEntry[] {
    return [...this._entries];
  }

  /** Entries touching an account, in replay order. */
  entriesForAccount(accountId: string): readonly JournalEntry[] {
    return this.sortedEntries().filter((e) => e.postings.some((p) => p.accountId === accountId));
  }

  /** Entries with start ≤ period ≤ end, in replay order. */
  entriesBetween(start: PeriodLike, end: PeriodLike): readonly JournalEntry[] {
    const from = toPeriod(start);
    const to = toPeriod(end);
    return this.sortedEntries().filter(
      (e) => comparePeriods(e.period, from) >= 0 && comparePeriods(e.period, to) <= 0,
    );
  }

  get size(): number {
    return this._entries.length;
  }

  /**
   * Entries ordered by period, ties kept in insertion order.
   */
  private sortedEntries(): readonly JournalEntry[] {
    if (this._sorted === undefined) {
      this._sorted = [...this._entries].sort((a, b) => comparePeriods(a.period, b.period));
    }
    return this._sorted;
  }
}

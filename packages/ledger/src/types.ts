/**
 * @brickplan/ledger — Internal types for the journal engine.
 *
 * These extend the shared @brickplan/types with journal-specific
 * structures used by the ledger and its consumers.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of stored entries
 * - Fail-closed: invalid entries throw, never silently succeed
 */

import type {
  AccountScope,
  Currency,
  Family,
  InstrumentLinks,
  Money,
  ParamValue,
  Params,
  Period,
  PeriodLike,
} from "@brickplan/types";

// ─── Entry Types ─────────────────────────────────────────────────────────

/** Free-form metadata attached to postings and entries. */
export type EntryMetadata = Readonly<Record<string, ParamValue>>;

/**
 * One signed leg of a journal entry.
 * Positive amounts are debits, negative amounts are credits.
 */
export interface Posting {
  readonly accountId: string;
  readonly money: Money;
  readonly metadata: EntryMetadata;
}

/** Posting as supplied to createEntry(). */
export interface PostingInput {
  readonly accountId: string;
  readonly money: Money;
  readonly metadata?: EntryMetadata | undefined;
}

/**
 * A balanced, immutable journal entry.
 * Only createEntry() produces these.
 */
export interface JournalEntry {
  readonly id: string;
  readonly period: Period;
  readonly postings: readonly Posting[];
  readonly metadata: EntryMetadata;
}

export interface EntryInput {
  readonly id: string;
  readonly period: PeriodLike;
  readonly postings: readonly PostingInput[];
  readonly metadata?: EntryMetadata | undefined;
}

/** Fields hashed into a deterministic entry id. */
export interface EntryIdInput {
  readonly instrumentId: string;
  readonly period: PeriodLike;
  readonly params?: Params | undefined;
  readonly links?: InstrumentLinks | undefined;
  readonly sequence: number;
}

// ─── Account Types ───────────────────────────────────────────────────────

/** Family → account-id prefix and classification for instrument nodes. */
export interface BrickAccountRule {
  readonly prefix: string;
  readonly scope: AccountScope;
  readonly type: "asset" | "liability" | "pnl";
}

export type BrickAccountRules = Readonly<Record<Family, BrickAccountRule>>;

// ─── Report Types ────────────────────────────────────────────────────────

/**
 * A single line in the trial balance: the signed net of one
 * (account, currency) pair. Positive = net debit.
 */
export interface TrialBalanceLine {
  readonly accountId: string;
  readonly currency: Currency;
  readonly decimals: number;
  readonly balance: string;
}

/**
 * The full trial balance report.
 * Lines MUST net to zero per currency.
 */
export interface TrialBalance {
  readonly lines: readonly TrialBalanceLine[];
  /** "YYYY-MM" cut-off, absent for the current state. */
  readonly asOf?: string | undefined;
  readonly balanced: boolean;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "UNKNOWN_ACCOUNT"
  | "SCOPE_VIOLATION"
  | "UNBALANCED_ENTRY"
  | "EMPTY_ENTRY"
  | "CURRENCY_MISMATCH"
  | "INVALID_AMOUNT"
  | "INVALID_MONEY"
  | "DUPLICATE_ENTRY_ID";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

/**
 * @brickplan/ledger — Append-only double-entry journal.
 *
 * Enforces double-entry invariants for scenario projections:
 * - Every entry nets to zero per currency
 * - Entries are immutable once posted, ids are never reused
 * - Internal transfers never touch the boundary
 * - All monetary arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - All types are readonly
 * - No mutation of stored entries
 * - Fail-closed: invalid entries throw, never silently succeed
 */

// Journal
export { Journal } from "./journal.js";
export { createEntry, assertBalanced, checkBalanced } from "./entry.js";
export { generateEntryId, ENTRY_ID_LENGTH } from "./entry-id.js";

// Accounts
export {
  AccountRegistry,
  BOUNDARY_ACCOUNT_ID,
  BRICK_ACCOUNT_RULES,
  brickAccountId,
} from "./accounts.js";

// Balance replay
export { computeTrialBalance, replay } from "./balance-calculator.js";

// Amount scaling
export { parseAmount, formatAmount, validateMoney } from "./money-math.js";

// Currencies
export {
  CURRENCY_DECIMALS,
  DEFAULT_DECIMALS,
  currencyDecimals,
  quantizeScaled,
  quantize,
  toMoney,
  moneyToNumber,
} from "./currency.js";

// Types
export type {
  EntryMetadata,
  Posting,
  PostingInput,
  JournalEntry,
  EntryInput,
  EntryIdInput,
  BrickAccountRule,
  BrickAccountRules,
  TrialBalanceLine,
  TrialBalance,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";

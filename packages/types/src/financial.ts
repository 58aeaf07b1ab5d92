/**
 * Financial Types
 *
 * Core financial primitives for deterministic double-entry projections.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Currency is always explicit
 * - Journal entries are append-only by contract
 */

/**
 * ISO 4217 currency code (e.g. "EUR", "USD", "JPY").
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 * Signed: in a posting, positive is a debit and negative is a credit.
 */
export interface Money {
  /** String representation of the amount (e.g., "100.50", "-1000") */
  readonly amount: string;

  /** Currency code (e.g., "EUR") */
  readonly currency: Currency;

  /** Number of decimal places for this currency (EUR = 2, JPY = 0). */
  readonly decimals: number;
}

/**
 * Which side of the net-worth boundary an account sits on.
 *
 * - internal: assets and liabilities owned inside the projection
 * - boundary: the external world (income sources, expense sinks, P&L)
 */
export type AccountScope = "internal" | "boundary";

/** Account classification. */
export type AccountType =
  | "asset"
  | "liability"
  | "income"
  | "expense"
  | "equity"
  | "pnl";

/**
 * An account in the chart of accounts.
 */
export interface Account {
  readonly id: string;
  readonly name: string;
  readonly scope: AccountScope;
  readonly type: AccountType;
  readonly currency: Currency;
}

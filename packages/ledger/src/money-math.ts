/**
 * @brickplan/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 * Amounts are signed: postings carry debits as positive values and
 * credits as negative values.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be valid decimal strings
 */

import type { Money } from "@brickplan/types";
import { LedgerError } from "./types.js";

const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;

// ─── Scaling ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "-50.25" with decimals=2 → -5025n
 * "1000" with decimals=0 → 1000n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = typeof amount === "string" ? amount.trim() : "";
  if (!AMOUNT_PATTERN.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${String(amount)}"`);
  }

  const negative = trimmed.startsWith("-");
  const [intPart = "0", fracPart = ""] = (negative ? trimmed.slice(1) : trimmed).split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const digits = (negative ? -scaled : scaled).toString().padStart(decimals + 1, "0");
  const result = `${digits.slice(0, -decimals)}.${digits.slice(-decimals)}`;
  return negative ? `-${result}` : result;
}

// ─── Validation ──────────────────────────────────────────────────────────

/**
 * Validate that a Money object is well-formed.
 * Throws LedgerError if invalid.
 */
export function validateMoney(money: Money): void {
  if (typeof money.currency !== "string" || money.currency.trim() === "") {
    throw new LedgerError("INVALID_MONEY", `Money currency must be a non-empty string, got: "${String(money.currency)}"`);
  }

  if (typeof money.decimals !== "number" || !Number.isInteger(money.decimals) || money.decimals < 0) {
    throw new LedgerError("INVALID_MONEY", `Money decimals must be a non-negative integer, got: ${String(money.decimals)}`);
  }

  parseAmount(money.amount, money.decimals);
}

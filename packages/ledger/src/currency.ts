/**
 * @brickplan/ledger — Currency precision and quantization.
 *
 * Strategies compute in floating point; everything that enters the
 * journal is quantized to the currency's minor unit first.
 *
 * Rules:
 * - Rounding is half-to-even on the shortest decimal form of the number
 * - Unknown currency codes use 2 decimals
 */

import type { Currency, Money } from "@brickplan/types";
import { LedgerError } from "./types.js";
import { formatAmount, parseAmount } from "./money-math.js";

export const DEFAULT_DECIMALS = 2;

/** Minor-unit precision per ISO 4217 code. */
export const CURRENCY_DECIMALS: Readonly<Record<string, number>> = {
  EUR: 2,
  USD: 2,
  GBP: 2,
  CHF: 2,
  JPY: 0,
};

export function currencyDecimals(currency: Currency): number {
  return CURRENCY_DECIMALS[currency.toUpperCase()] ?? DEFAULT_DECIMALS;
}

function decimalText(value: number, decimals: number): string {
  const text = String(value);
  if (!text.includes("e")) return text;
  // Below 1e21 exponent form only appears for tiny magnitudes
  return value.toFixed(Math.min(decimals + 2, 100));
}

/**
 * Round a number to `decimals` places (half-to-even) and return it
 * scaled as a bigint.
 *
 * 1.005, 2 → 100n (the shortest form "1.005" is an exact tie)
 * 2.5, 0   → 2n
 * -0.125, 2 → -12n
 */
export function quantizeScaled(value: number, decimals: number): bigint {
  if (!Number.isFinite(value)) {
    throw new LedgerError("INVALID_AMOUNT", `Cannot quantize non-finite value: ${String(value)}`);
  }

  if (Math.abs(value) >= 1e21) {
    return BigInt(value) * 10n ** BigInt(decimals);
  }

  const text = decimalText(value, decimals);
  const negative = text.startsWith("-");
  const abs = negative ? text.slice(1) : text;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  const kept = fracPart.slice(0, decimals).padEnd(decimals, "0");
  const rest = fracPart.slice(decimals);
  let scaled = BigInt(intPart + kept);

  if (rest.length > 0) {
    const first = rest.charCodeAt(0) - 48;
    const tail = /[1-9]/.test(rest.slice(1));
    if (first > 5 || (first === 5 && tail) || (first === 5 && scaled % 2n === 1n)) {
      scaled += 1n;
    }
  }

  return negative ? -scaled : scaled;
}

/**
 * Quantize a number to Money in the given currency.
 */
export function toMoney(value: number, currency: Currency): Money {
  const decimals = currencyDecimals(currency);
  return {
    amount: formatAmount(quantizeScaled(value, decimals), decimals),
    currency,
    decimals,
  };
}

/**
 * Quantize a number and return it as a plain number at currency precision.
 */
export function quantize(value: number, currency: Currency): number {
  return moneyToNumber(toMoney(value, currency));
}

export function moneyToNumber(money: Money): number {
  return Number(formatAmount(parseAmount(money.amount, money.decimals), money.decimals));
}

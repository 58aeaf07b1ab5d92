/**
 * Tests for the deterministic money math engine.
 *
 * Covers:
 * - parseAmount / formatAmount on signed amounts
 * - Money validation
 */

import { describe, it, expect } from "vitest";
import type { Money } from "@brickplan/types";
import {
  parseAmount,
  formatAmount,
  validateMoney,
} from "../src/money-math.js";
import { LedgerError } from "../src/types.js";

// ─── Helpers ─────────────────────────────────────────────────────────────

function eur(amount: string): Money {
  return { amount, currency: "EUR", decimals: 2 };
}

// ─── parseAmount ─────────────────────────────────────────────────────────

describe("parseAmount", () => {
  it("parses whole and fractional numbers", () => {
    expect(parseAmount("100", 2)).toBe(10000n);
    expect(parseAmount("100.5", 2)).toBe(10050n);
    expect(parseAmount("0.07", 2)).toBe(7n);
  });

  it("parses negative numbers", () => {
    expect(parseAmount("-1000", 2)).toBe(-100000n);
    expect(parseAmount("-50.25", 2)).toBe(-5025n);
  });

  it("handles zero decimals", () => {
    expect(parseAmount("1500", 0)).toBe(1500n);
  });

  it("rejects excess decimal places", () => {
    expect(() => parseAmount("1.005", 2)).toThrow(LedgerError);
  });

  it("rejects malformed input", () => {
    for (const bad of ["", "  ", "abc", "1.2.3", "+5", "1e3"]) {
      expect(() => parseAmount(bad, 2)).toThrow(LedgerError);
    }
  });

  it("uses the INVALID_AMOUNT code", () => {
    try {
      parseAmount("x", 2);
      expect.unreachable("should have thrown");
    } catch (e) {
      expect((e as LedgerError).code).toBe("INVALID_AMOUNT");
    }
  });
});

// ─── formatAmount ────────────────────────────────────────────────────────

describe("formatAmount", () => {
  it("formats with fixed decimals", () => {
    expect(formatAmount(10050n, 2)).toBe("100.50");
    expect(formatAmount(7n, 2)).toBe("0.07");
    expect(formatAmount(0n, 2)).toBe("0.00");
  });

  it("formats negative amounts", () => {
    expect(formatAmount(-5025n, 2)).toBe("-50.25");
    expect(formatAmount(-3n, 2)).toBe("-0.03");
  });

  it("formats zero decimals", () => {
    expect(formatAmount(-1500n, 0)).toBe("-1500");
  });
});

// ─── Validation ──────────────────────────────────────────────────────────

describe("validateMoney", () => {
  it("accepts valid money", () => {
    expect(() => validateMoney(eur("-12.34"))).not.toThrow();
  });

  it("rejects empty currency", () => {
    expect(() => validateMoney({ amount: "1", currency: "", decimals: 2 })).toThrow(LedgerError);
  });

  it("rejects non-integer decimals", () => {
    expect(() => validateMoney({ amount: "1", currency: "EUR", decimals: 1.5 })).toThrow(LedgerError);
  });
});

/**
 * Property-Based Tests for @brickplan/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Every entry built by createEntry nets to zero per currency
 * 2. The trial balance of any posted journal is balanced
 * 3. As-of replay at the last period equals the running cache
 * 4. Entry ids are deterministic and key-order independent
 * 5. Posting a generated id twice is rejected
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Money } from "@brickplan/types";
import { createEntry } from "../src/entry.js";
import { generateEntryId } from "../src/entry-id.js";
import { Journal } from "../src/journal.js";
import { formatAmount, parseAmount } from "../src/money-math.js";
import { LedgerError } from "../src/types.js";
import type { JournalEntry, PostingInput } from "../src/types.js";

// =============================================================================
// Arbitraries
// =============================================================================

const ACCOUNTS = ["a:cash", "a:house", "l:loan", "f:salary", "b:boundary"] as const;

const arbAccount = fc.constantFrom(...ACCOUNTS);

const arbCurrency = fc.constantFrom(
  { currency: "EUR", decimals: 2 },
  { currency: "JPY", decimals: 0 },
);

const arbScaled = fc.bigInt({ min: -10_000_000n, max: 10_000_000n });

/**
 * A balanced posting list: random legs plus one balancing leg per currency.
 */
const arbPostings: fc.Arbitrary<PostingInput[]> = fc
  .array(fc.tuple(arbAccount, arbCurrency, arbScaled), { minLength: 1, maxLength: 6 })
  .chain((legs) =>
    arbAccount.map((balancingAccount) => {
      const postings: PostingInput[] = [];
      const sums = new Map<string, { decimals: number; sum: bigint }>();
      for (const [accountId, { currency, decimals }, scaled] of legs) {
        postings.push({ accountId, money: { amount: formatAmount(scaled, decimals), currency, decimals } });
        const s = sums.get(currency) ?? { decimals, sum: 0n };
        s.sum += scaled;
        sums.set(currency, s);
      }
      for (const [currency, { decimals, sum }] of sums) {
        postings.push({
          accountId: balancingAccount,
          money: { amount: formatAmount(-sum, decimals), currency, decimals },
        });
      }
      return postings;
    }),
  );

const arbPeriod = fc.record({
  year: fc.integer({ min: 2020, max: 2030 }),
  month: fc.integer({ min: 1, max: 12 }),
});

function sumByCurrency(money: readonly Money[]): Map<string, bigint> {
  const out = new Map<string, bigint>();
  for (const m of money) {
    out.set(m.currency, (out.get(m.currency) ?? 0n) + parseAmount(m.amount, m.decimals));
  }
  return out;
}

// =============================================================================
// Properties
// =============================================================================

describe("zero-sum entries", () => {
  it("every created entry nets to zero per currency", () => {
    fc.assert(
      fc.property(arbPostings, arbPeriod, (postings, period) => {
        const entry = createEntry({ id: "p", period, postings });
        for (const total of sumByCurrency(entry.postings.map((p) => p.money)).values()) {
          expect(total).toBe(0n);
        }
      }),
    );
  });

  it("perturbing one leg breaks the entry", () => {
    fc.assert(
      fc.property(arbPostings, fc.bigInt({ min: 1n, max: 1000n }), (postings, delta) => {
        const [first, ...rest] = postings;
        if (first === undefined) return;
        const bumped: PostingInput = {
          accountId: first.accountId,
          money: {
            ...first.money,
            amount: formatAmount(parseAmount(first.money.amount, first.money.decimals) + delta, first.money.decimals),
          },
        };
        expect(() => createEntry({ id: "p", period: "2026-01", postings: [bumped, ...rest] })).toThrow(LedgerError);
      }),
    );
  });
});

describe("journal replay", () => {
  it("trial balance is always balanced and as-of replay matches the cache", () => {
    fc.assert(
      fc.property(fc.array(fc.tuple(arbPostings, arbPeriod), { minLength: 1, maxLength: 15 }), (batches) => {
        const journal = new Journal();
        const entries: JournalEntry[] = batches.map(([postings, period], i) =>
          createEntry({ id: `e${String(i)}`, period, postings }),
        );
        for (const e of entries) journal.post(e);

        expect(journal.trialBalance().balanced).toBe(true);

        const last = entries.reduce((max, e) =>
          e.period.year * 12 + e.period.month > max.period.year * 12 + max.period.month ? e : max,
        );
        for (const account of ACCOUNTS) {
          expect(journal.balance(account, "EUR", last.period)).toEqual(journal.balance(account, "EUR"));
        }
      }),
    );
  });
});

describe("entry ids", () => {
  it("are 16 hex chars and deterministic", () => {
    fc.assert(
      fc.property(fc.string(), arbPeriod, fc.nat(100), (instrumentId, period, sequence) => {
        const a = generateEntryId({ instrumentId, period, sequence });
        const b = generateEntryId({ instrumentId, period, sequence });
        expect(a).toBe(b);
        expect(a).toMatch(/^[0-9a-f]{16}$/);
      }),
    );
  });

  it("ignore parameter key order", () => {
    const a = generateEntryId({
      instrumentId: "loan",
      period: "2026-01",
      params: { ratePa: 0.03, termMonths: 240 },
      sequence: 0,
    });
    const b = generateEntryId({
      instrumentId: "loan",
      period: { year: 2026, month: 1 },
      params: { termMonths: 240, ratePa: 0.03 },
      sequence: 0,
    });
    expect(a).toBe(b);
  });

  it("change with the sequence, period and links", () => {
    const base = { instrumentId: "loan", period: "2026-01", sequence: 0 };
    const id = generateEntryId(base);
    expect(generateEntryId({ ...base, sequence: 1 })).not.toBe(id);
    expect(generateEntryId({ ...base, period: "2026-02" })).not.toBe(id);
    expect(generateEntryId({ ...base, links: { start: { onEndOf: "old" } } })).not.toBe(id);
  });

  it("treat absent link fields as missing", () => {
    const base = { instrumentId: "loan", period: "2026-01", sequence: 0 };
    expect(generateEntryId({ ...base, links: { principal: { fromProperty: "house", nominal: undefined } } })).toBe(
      generateEntryId({ ...base, links: { principal: { fromProperty: "house" } } }),
    );
  });

  it("posting a regenerated id twice is rejected", () => {
    const journal = new Journal();
    const make = (): JournalEntry =>
      createEntry({
        id: generateEntryId({ instrumentId: "salary", period: "2026-01", sequence: 0 }),
        period: "2026-01",
        postings: [
          { accountId: "a:cash", money: { amount: "1000", currency: "EUR", decimals: 2 } },
          { accountId: "f:salary", money: { amount: "-1000", currency: "EUR", decimals: 2 } },
        ],
      });
    journal.post(make());
    expect(() => journal.post(make())).toThrow(/already exists/);
  });
});

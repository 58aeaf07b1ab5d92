/**
 * @brickplan/ledger — Account registry.
 *
 * Manages the chart of accounts and the internal/boundary line that
 * every posting is checked against.
 *
 * Rules:
 * - Registration is an idempotent upsert by id
 * - The boundary account "b:boundary" always exists
 * - Transfers stay internal; flows cross the boundary exactly once
 */

import type { Account, AccountScope, Currency, Family } from "@brickplan/types";
import type { BrickAccountRules } from "./types.js";
import { LedgerError } from "./types.js";

/** The single well-known account representing the external world. */
export const BOUNDARY_ACCOUNT_ID = "b:boundary";

/**
 * Canonical node prefixes and classification per instrument family.
 */
export const BRICK_ACCOUNT_RULES: BrickAccountRules = {
  asset: { prefix: "a", scope: "internal", type: "asset" },
  liability: { prefix: "l", scope: "internal", type: "liability" },
  flow: { prefix: "f", scope: "boundary", type: "pnl" },
  transfer: { prefix: "t", scope: "internal", type: "asset" },
};

/**
 * Canonical account id for an instrument node, e.g. "a:house".
 */
export function brickAccountId(instrumentId: string, family: Family): string {
  return `${BRICK_ACCOUNT_RULES[family].prefix}:${instrumentId}`;
}

export class AccountRegistry {
  private readonly _accounts: Map<string, Account> = new Map();

  constructor(currency: Currency = "EUR") {
    this.registerAccount({
      id: BOUNDARY_ACCOUNT_ID,
      name: "External world",
      scope: "boundary",
      type: "pnl",
      currency,
    });
  }

  /**
   * Register or replace an account.
   */
  registerAccount(account: Account): Account {
    const stored: Account = { ...account };
    this._accounts.set(account.id, stored);
    return stored;
  }

  /**
   * Register the node account of an instrument under its canonical id.
   */
  registerBrickAccount(
    instrumentId: string,
    family: Family,
    name: string,
    currency: Currency = "EUR",
  ): Account {
    const rule = BRICK_ACCOUNT_RULES[family];
    return this.registerAccount({
      id: brickAccountId(instrumentId, family),
      name,
      scope: rule.scope,
      type: rule.type,
      currency,
    });
  }

  getAccount(id: string): Account | undefined {
    return this._accounts.get(id);
  }

  hasAccount(id: string): boolean {
    return this._accounts.has(id);
  }

  /**
   * Get an account or throw UNKNOWN_ACCOUNT.
   */
  assertExists(id: string): Account {
    const account = this._accounts.get(id);
    if (account === undefined) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account: "${id}"`);
    }
    return account;
  }

  getAll(): readonly Account[] {
    return [...this._accounts.values()];
  }

  getByScope(scope: AccountScope): readonly Account[] {
    return [...this._accounts.values()].filter((a) => a.scope === scope);
  }

  get count(): number {
    return this._accounts.size;
  }

  // ─── Routing Checks ──────────────────────────────────────────────────

  /**
   * Both sides of a transfer must be internal accounts.
   */
  validateTransferAccounts(fromId: string, toId: string): void {
    for (const id of [fromId, toId]) {
      const account = this.assertExists(id);
      if (account.scope !== "internal") {
        throw new LedgerError(
          "SCOPE_VIOLATION",
          `Transfer account "${id}" must be internal, got ${account.scope}`,
        );
      }
    }
  }

  /**
   * A flow crosses the boundary: one boundary account against
   * internal accounts only.
   */
  validateFlowAccounts(boundaryId: string, internalIds: readonly string[]): void {
    const boundary = this.assertExists(boundaryId);
    if (boundary.scope !== "boundary") {
      throw new LedgerError(
        "SCOPE_VIOLATION",
        `Flow source/sink "${boundaryId}" must be a boundary account, got ${boundary.scope}`,
      );
    }
    for (const id of internalIds) {
      const account = this.assertExists(id);
      if (account.scope !== "internal") {
        throw new LedgerError(
          "SCOPE_VIOLATION",
          `Flow counterpart "${id}" must be internal, got ${account.scope}`,
        );
      }
    }
  }
}

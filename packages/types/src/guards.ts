/**
 * Runtime Type Guards
 *
 * Narrowing functions for brickplan domain types.
 * These enable safe runtime validation at system boundaries
 * (scenario definitions, deserialized data, strategy outputs).
 */

import type { Money, AccountScope, AccountType, Account } from "./financial.js";
import type { Period } from "./period.js";
import type { Family, Instrument, MacroBrick } from "./instrument.js";

// =============================================================================
// Financial guards
// =============================================================================

const ACCOUNT_SCOPES = new Set<string>(["internal", "boundary"]);
const ACCOUNT_TYPES = new Set<string>([
  "asset", "liability", "income", "expense", "equity", "pnl",
]);
const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;

export function isMoney(value: unknown): value is Money {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.amount === "string" &&
    AMOUNT_PATTERN.test(v.amount) &&
    typeof v.currency === "string" &&
    v.currency.length > 0 &&
    typeof v.decimals === "number" &&
    Number.isInteger(v.decimals) &&
    v.decimals >= 0
  );
}

export function isAccountScope(value: unknown): value is AccountScope {
  return typeof value === "string" && ACCOUNT_SCOPES.has(value);
}

export function isAccountType(value: unknown): value is AccountType {
  return typeof value === "string" && ACCOUNT_TYPES.has(value);
}

export function isAccount(value: unknown): value is Account {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.name === "string" &&
    isAccountScope(v.scope) &&
    isAccountType(v.type) &&
    typeof v.currency === "string"
  );
}

// =============================================================================
// Time guards
// =============================================================================

export function isPeriod(value: unknown): value is Period {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.year === "number" &&
    Number.isInteger(v.year) &&
    typeof v.month === "number" &&
    Number.isInteger(v.month) &&
    v.month >= 1 &&
    v.month <= 12
  );
}

// =============================================================================
// Instrument guards
// =============================================================================

const FAMILIES = new Set<string>(["asset", "liability", "flow", "transfer"]);

export function isFamily(value: unknown): value is Family {
  return typeof value === "string" && FAMILIES.has(value);
}

export function isInstrument(value: unknown): value is Instrument {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.name === "string" &&
    typeof v.kind === "string" &&
    v.kind.length > 0 &&
    isFamily(v.family) &&
    v.params !== null &&
    typeof v.params === "object" &&
    !Array.isArray(v.params)
  );
}

export function isMacroBrick(value: unknown): value is MacroBrick {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.name === "string" &&
    Array.isArray(v.members) &&
    v.members.every((m) => typeof m === "string")
  );
}

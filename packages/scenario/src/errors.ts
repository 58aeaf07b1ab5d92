/**
 * @brickplan/scenario — Errors.
 *
 * ConfigError: the scenario cannot be run as configured. Raised before
 * anything is posted.
 * IdentityError: a run produced numbers that break an accounting
 * identity. Never downgraded to a warning.
 */

export type ConfigErrorCode =
  | "UNKNOWN_ID"
  | "DUPLICATE_ID"
  | "UNKNOWN_STRATEGY"
  | "DUPLICATE_STRATEGY"
  | "INVALID_WINDOW"
  | "INVALID_HORIZON"
  | "LINK_CONFLICT"
  | "LINK_CYCLE"
  | "CASH_ACCOUNT"
  | "CURRENCY"
  | "INVALID_PARAMS"
  | "INVALID_DEFINITION";

export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly instrumentId: string | undefined;

  constructor(code: ConfigErrorCode, message: string, instrumentId?: string) {
    super(message);
    this.name = "ConfigError";
    this.code = code;
    this.instrumentId = instrumentId;
  }
}

export type IdentityErrorCode =
  | "OUTPUT_SHAPE"
  | "EQUITY_IDENTITY"
  | "TRANSFER_LEAK"
  | "ROUTING_INVARIANT";

export class IdentityError extends Error {
  public readonly code: IdentityErrorCode;
  public readonly violations: readonly string[];

  constructor(code: IdentityErrorCode, message: string, violations: readonly string[] = []) {
    super(message);
    this.name = "IdentityError";
    this.code = code;
    this.violations = violations;
  }
}

/**
 * @brickplan/validator — Types.
 *
 * A run is validated by a fixed list of independent checks. Each check
 * reports whether it holds and the evidence when it does not.
 */

import type { Logger } from "pino";

// =============================================================================
// Results
// =============================================================================

export type ValidationVerdict = "PASS" | "FAIL";

/**
 * Result of a single check.
 */
export interface CheckResult {
  /** Name of the check */
  readonly check: string;

  /** Whether the check holds */
  readonly holds: boolean;

  /** Evidence of violations (empty if holds) */
  readonly violations: readonly string[];
}

/**
 * Result of running every check.
 */
export interface RunValidationReport {
  readonly verdict: ValidationVerdict;
  readonly checks: readonly CheckResult[];
  /** Every violation, prefixed with its check name */
  readonly failures: readonly string[];
}

// =============================================================================
// Options
// =============================================================================

export type ValidationMode = "raise" | "warn";

export interface ValidateRunOptions {
  /** raise (default) throws on any failure; warn logs and returns. */
  readonly mode?: ValidationMode | undefined;
  /** Absolute tolerance in currency units. Default 0.01. */
  readonly tolerance?: number | undefined;
  readonly logger?: Logger | undefined;
}

export const DEFAULT_TOLERANCE = 0.01;

// =============================================================================
// Errors
// =============================================================================

/**
 * Thrown in raise mode. The message lists every failure.
 */
export class RunValidationError extends Error {
  public readonly code = "RUN_VALIDATION_FAILED" as const;
  public readonly report: RunValidationReport;

  constructor(report: RunValidationReport) {
    super(
      `Run validation failed with ${String(report.failures.length)} violation(s):\n` +
        report.failures.map((f) => `- ${f}`).join("\n"),
    );
    this.name = "RunValidationError";
    this.report = report;
  }
}

/**
 * @brickplan/validator — validateRun.
 *
 * Runs every check on a completed result. In raise mode any failure
 * throws one RunValidationError listing all of them; in warn mode the
 * failures are logged and the report is returned.
 */

import type { AppConfig, ScenarioResult } from "@brickplan/scenario";
import { silentLogger } from "@brickplan/scenario";
import { RUN_CHECKS } from "./checks.js";
import type { RunValidationReport, ValidateRunOptions } from "./types.js";
import { DEFAULT_TOLERANCE, RunValidationError } from "./types.js";

export function validateRun(run: ScenarioResult, options: ValidateRunOptions = {}): RunValidationReport {
  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  const mode = options.mode ?? "raise";

  const checks = RUN_CHECKS.map((check) => check(run, tolerance));
  const failures = checks.flatMap((c) => c.violations.map((v) => `${c.check}: ${v}`));
  const report: RunValidationReport = {
    verdict: failures.length === 0 ? "PASS" : "FAIL",
    checks,
    failures,
  };

  if (report.verdict === "FAIL") {
    if (mode === "raise") {
      throw new RunValidationError(report);
    }
    (options.logger ?? silentLogger()).warn(
      { failures, failed: checks.filter((c) => !c.holds).map((c) => c.check) },
      "Run validation failed",
    );
  }

  return report;
}

/**
 * Validator options from environment configuration.
 */
export function validationOptionsFrom(config: AppConfig): ValidateRunOptions {
  return { mode: config.VALIDATION_MODE, tolerance: config.VALIDATION_TOLERANCE };
}

/**
 * @brickplan/validator — Post-run validation.
 *
 * Checks a completed scenario run for accounting identities and
 * instrument behaviour that no single strategy can see on its own.
 */

export { validateRun, validationOptionsFrom } from "./validate-run.js";
export {
  RUN_CHECKS,
  checkEquityIdentity,
  checkNetCashFlow,
  checkLiabilityNonIncrease,
  checkLiquidity,
  checkUnits,
  checkBalloonPayoff,
  checkIncomeEscalation,
  checkWindowEndIdentity,
} from "./checks.js";

export type {
  CheckResult,
  RunValidationReport,
  ValidateRunOptions,
  ValidationMode,
  ValidationVerdict,
} from "./types.js";
export { RunValidationError, DEFAULT_TOLERANCE } from "./types.js";

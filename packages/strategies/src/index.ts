/**
 * @brickplan/strategies — Reference strategies.
 *
 * A cash account, a property, an annuity loan and fixed recurring
 * income and expense. Callers inject them through a StrategyCatalog
 * like any other strategy.
 */

export { createDefaultCatalog, registerDefaultStrategies } from "./catalog.js";
export { cashAccount } from "./cash.js";
export { property } from "./property.js";
export { annuityLoan, annuityPayment, BALLOON_POLICIES } from "./loan-annuity.js";
export type { BalloonPolicy } from "./loan-annuity.js";
export { fixedFlow, fixedIncome, fixedExpense } from "./fixed-flow.js";
export type { FlowDirection } from "./fixed-flow.js";
export {
  invalidParams,
  maybeNumber,
  optionalBoolean,
  optionalChoice,
  optionalNumber,
  requireNumber,
} from "./params.js";
export type { NumberBounds } from "./params.js";
export { localOutput, timeline } from "./timeline.js";
export type { Timeline } from "./timeline.js";

/**
 * @brickplan/types — Shared domain types for brickplan projections.
 *
 * These types are used across all brickplan packages:
 * - Financial primitives (Money, accounts)
 * - Calendar periods and month arithmetic
 * - Instruments, links, activation windows and MacroBricks
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Financial types
export type {
  Money,
  Currency,
  AccountScope,
  AccountType,
  Account,
} from "./financial.js";

// Periods
export type { Period, PeriodLike } from "./period.js";
export {
  period,
  parsePeriod,
  toPeriod,
  formatPeriod,
  periodOrdinal,
  fromOrdinal,
  comparePeriods,
  addMonths,
  monthsBetween,
  samePeriod,
} from "./period.js";

// Instrument types
export type {
  Family,
  ParamValue,
  Params,
  PrincipalLink,
  StartLink,
  InstrumentLinks,
  ActivationWindowSpec,
  Instrument,
  MacroBrick,
} from "./instrument.js";

// Runtime type guards
export {
  isMoney,
  isAccountScope,
  isAccountType,
  isAccount,
  isPeriod,
  isFamily,
  isInstrument,
  isMacroBrick,
} from "./guards.js";

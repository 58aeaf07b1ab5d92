/**
 * @brickplan/scenario — Types.
 *
 * Strategy contract, simulation context, instrument output and the
 * run result. Everything a strategy returns or the engine hands out is
 * read-only by contract.
 */

import type { AccountRegistry, Journal } from "@brickplan/ledger";
import type { Currency, Instrument, Params, Period, PeriodLike } from "@brickplan/types";
import type { Logger } from "pino";
import type { Series, TimeIndex } from "./time-series.js";

// =============================================================================
// Instrument Output
// =============================================================================

/**
 * Something notable an instrument did in a period (purchase, payoff,
 * window end).
 */
export interface InstrumentEvent {
  readonly period: Period;
  readonly kind: string;
  readonly message: string;
  readonly amount?: number;
}

/**
 * What one instrument produced over an index.
 *
 * cashIn/cashOut/interest are flows (per period); assetValue/debtBalance
 * and units are stocks (end of period). Interest is positive when
 * earned and negative when paid.
 */
export interface InstrumentOutput {
  readonly cashIn: Series;
  readonly cashOut: Series;
  readonly assetValue: Series;
  readonly debtBalance: Series;
  readonly interest: Series;
  readonly units?: Series;
  readonly events: readonly InstrumentEvent[];
}

// =============================================================================
// Strategy Contract
// =============================================================================

/**
 * Resolved activation window of one instrument against the scenario
 * index. `startIndex` and `endIndex` are scenario positions; an
 * instrument that starts after the horizon is inactive.
 */
export interface ActivationWindow {
  readonly start: Period;
  readonly end: Period;
  readonly startIndex: number;
  readonly endIndex: number;
  readonly active: boolean;
  /** The last active month lies before the scenario's last month. */
  readonly endsInHorizon: boolean;
}

/** Summed flows of every other executed instrument, on the scenario index. */
export interface RoutedFlows {
  readonly cashIn: Series;
  readonly cashOut: Series;
}

export interface SimulationContext {
  /** Instrument-local index: window start to scenario end. */
  readonly index: TimeIndex;
  readonly scenarioIndex: TimeIndex;
  readonly window: ActivationWindow;
  readonly currency: Currency;
  /** Working copy of any instrument in the scenario. Throws ConfigError when unknown. */
  lookup(instrumentId: string): Instrument;
  /** Scenario-time output of an instrument simulated earlier in this run. */
  outputOf(instrumentId: string): InstrumentOutput | undefined;
  /** Present only for the cash instrument. */
  readonly routed: RoutedFlows | undefined;
  readonly journal: Journal;
  readonly accounts: AccountRegistry;
  readonly logger: Logger;
}

/**
 * Pluggable instrument behaviour. `prepare` may return derived
 * parameters, merged into the run's working copy before simulation.
 */
export interface Strategy {
  prepare?(instrument: Instrument, ctx: SimulationContext): Params | undefined;
  simulate(instrument: Instrument, ctx: SimulationContext): InstrumentOutput;
}

// =============================================================================
// Configuration & Options
// =============================================================================

export interface ScenarioConfig {
  /** Log a warning per instrument reached through several selected MacroBricks. */
  readonly warnOnOverlap: boolean;
  readonly includeStructResults: boolean;
  /** Check journal invariants after routing. */
  readonly validateRouting: boolean;
  /** Scenario currency when neither the options nor the definition name one. */
  readonly currency: Currency;
}

export const DEFAULT_SCENARIO_CONFIG: ScenarioConfig = {
  warnOnOverlap: true,
  includeStructResults: true,
  validateRouting: true,
  currency: "EUR",
};

export interface RunOptions {
  readonly start: PeriodLike;
  readonly months: number;
  /** Instrument and MacroBrick ids; undefined runs every instrument. */
  readonly selection?: readonly string[];
  readonly includeStructResults?: boolean;
  /** Restrict MacroBrick aggregates to these ids. */
  readonly structsFilter?: readonly string[];
}

// =============================================================================
// Result
// =============================================================================

export interface OverlapInfo {
  readonly macroBricks: readonly string[];
  readonly count: number;
}

export interface Totals {
  readonly index: TimeIndex;
  readonly cashIn: Series;
  readonly cashOut: Series;
  readonly netCashFlow: Series;
  readonly assets: Series;
  readonly liabilities: Series;
  readonly interest: Series;
  readonly equity: Series;
  readonly cash: Series;
  readonly nonCash: Series;
}

export type TotalsField = Exclude<keyof Totals, "index">;

export interface RunMeta {
  /** Order in which instruments were simulated; the cash instrument is last. */
  readonly executionOrder: readonly string[];
  readonly overlaps: Readonly<Record<string, OverlapInfo>>;
  readonly index: TimeIndex;
  readonly cashInstrumentId: string;
}

export interface ScenarioResult {
  readonly outputs: Readonly<Record<string, InstrumentOutput>>;
  readonly totals: Totals;
  readonly byStruct: Readonly<Record<string, InstrumentOutput>>;
  readonly journal: Journal;
  readonly accounts: AccountRegistry;
  /** Per-run working copies of the executed instruments. */
  readonly instruments: Readonly<Record<string, Instrument>>;
  readonly windows: Readonly<Record<string, ActivationWindow>>;
  readonly meta: RunMeta;
}

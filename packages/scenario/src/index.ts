/**
 * @brickplan/scenario — Scenario execution engine.
 *
 * Resolves a selection of instruments and MacroBricks into a
 * deterministic execution order, runs each instrument's strategy on its
 * activation window, routes cash through a single cash account,
 * compiles the double-entry journal and aggregates the results.
 */

// Engine
export { Scenario } from "./scenario.js";
export type { ScenarioOptions, DefinitionDependencies } from "./scenario.js";
export { StrategyCatalog } from "./catalog.js";
export type { StrategyRole, StrategyRegistration, RegisterOptions } from "./catalog.js";

// Time
export { TimeIndex, Series } from "./time-series.js";

// Pipeline stages
export { resolveSelection } from "./selection.js";
export type { Selection, SelectionOptions } from "./selection.js";
export { buildDependencyGraph, topologicalOrder } from "./graph.js";
export type { TopologicalOrder } from "./graph.js";
export { cloneInstruments, resolveLinks } from "./links.js";
export { resolveWindow, windowBounds } from "./window.js";
export { assertOutputShape, emptyOutput, placeOutput, sumOutputs } from "./output.js";
export { compileLedger } from "./posting.js";
export type { CompileInput, EntryType } from "./posting.js";
export { aggregateTotals, buildStructResults, computeTotals, equityFromJournal } from "./aggregation.js";
export type { Frequency, TotalsBucket, TotalsInput } from "./aggregation.js";

// Definitions
export {
  parseDefinition,
  ScenarioDefinitionSchema,
  InstrumentSchema,
  MacroBrickSchema,
  ParamValueSchema,
} from "./definition.js";
export type { ScenarioDefinition, ParsedDefinition } from "./definition.js";

// Configuration & logging
export { ConfigSchema, loadConfig, scenarioConfigFrom } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Errors
export { ConfigError, IdentityError } from "./errors.js";
export type { ConfigErrorCode, IdentityErrorCode } from "./errors.js";

// Types
export type {
  ActivationWindow,
  InstrumentEvent,
  InstrumentOutput,
  OverlapInfo,
  RoutedFlows,
  RunMeta,
  RunOptions,
  ScenarioConfig,
  ScenarioResult,
  SimulationContext,
  Strategy,
  Totals,
  TotalsField,
} from "./types.js";
export { DEFAULT_SCENARIO_CONFIG } from "./types.js";

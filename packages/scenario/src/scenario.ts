/**
 * @brickplan/scenario — Scenario.
 *
 * Owns instruments, MacroBricks and configuration, and runs the
 * execution pipeline:
 *
 *   RESOLVE_SELECTION → BUILD_DEPENDENCY_GRAPH → TOPOLOGICAL_ORDER →
 *   INITIALIZE_CONTEXT → PREPARE → SIMULATE → ROUTE_CASH → AGGREGATE →
 *   BUILD_MACRO_AGGREGATES
 *
 * Every run starts from deep copies of the definitions and builds its
 * own journal and accounts. The result is published only when every
 * stage succeeded, so a failed run leaves the previous result in place.
 */

import { AccountRegistry, Journal } from "@brickplan/ledger";
import { Registry, slugifyName } from "@brickplan/registry";
import type { DisjointReport } from "@brickplan/registry";
import type { Currency, Instrument, MacroBrick, Period } from "@brickplan/types";
import { formatPeriod, toPeriod } from "@brickplan/types";
import type { Logger } from "pino";
import { buildStructResults, computeTotals } from "./aggregation.js";
import type { StrategyCatalog } from "./catalog.js";
import { parseDefinition } from "./definition.js";
import { ConfigError, IdentityError } from "./errors.js";
import { buildDependencyGraph, topologicalOrder } from "./graph.js";
import { cloneInstruments, resolveLinks } from "./links.js";
import { silentLogger } from "./logger.js";
import { assertOutputShape, emptyOutput, placeOutput } from "./output.js";
import { compileLedger } from "./posting.js";
import { resolveSelection } from "./selection.js";
import { Series, TimeIndex } from "./time-series.js";
import type {
  ActivationWindow,
  InstrumentOutput,
  RoutedFlows,
  RunOptions,
  ScenarioConfig,
  ScenarioResult,
  SimulationContext,
} from "./types.js";
import { DEFAULT_SCENARIO_CONFIG } from "./types.js";
import { resolveWindow } from "./window.js";

export interface ScenarioOptions {
  /** Defaults to the slug of the name. */
  readonly id?: string | undefined;
  readonly name: string;
  readonly instruments: readonly Instrument[];
  readonly macroBricks?: readonly MacroBrick[] | undefined;
  readonly catalog: StrategyCatalog;
  readonly currency?: Currency | undefined;
  readonly config?: Partial<ScenarioConfig> | undefined;
  readonly logger?: Logger | undefined;
}

export interface DefinitionDependencies {
  readonly catalog: StrategyCatalog;
  readonly logger?: Logger | undefined;
  /** Overrides what the definition sets. */
  readonly config?: Partial<ScenarioConfig> | undefined;
  /** Used when the definition names no currency. */
  readonly currency?: Currency | undefined;
}

export class Scenario {
  readonly id: string;
  readonly name: string;
  readonly currency: Currency;
  readonly config: ScenarioConfig;
  readonly registry: Registry;

  private readonly _catalog: StrategyCatalog;
  private readonly _logger: Logger;
  private _lastResult: ScenarioResult | undefined;

  constructor(options: ScenarioOptions) {
    this.name = options.name;
    this.id = options.id ?? slugifyName(options.name);
    this.config = { ...DEFAULT_SCENARIO_CONFIG, ...options.config };
    this.currency = options.currency ?? this.config.currency;
    this._catalog = options.catalog;
    this._logger = (options.logger ?? silentLogger()).child({ scenario: this.id });

    const instruments = new Map<string, Instrument>();
    for (const instrument of options.instruments) {
      if (instruments.has(instrument.id)) {
        throw new ConfigError("DUPLICATE_ID", `Instrument id "${instrument.id}" is declared twice`, instrument.id);
      }
      instruments.set(instrument.id, structuredClone(instrument));
    }
    const macroBricks = new Map<string, MacroBrick>();
    for (const macroBrick of options.macroBricks ?? []) {
      if (macroBricks.has(macroBrick.id)) {
        throw new ConfigError("DUPLICATE_ID", `MacroBrick id "${macroBrick.id}" is declared twice`, macroBrick.id);
      }
      macroBricks.set(macroBrick.id, structuredClone(macroBrick));
    }

    this.registry = new Registry(instruments, macroBricks);
  }

  /**
   * Build a scenario from plain data, validated with Zod.
   */
  static fromDefinition(data: unknown, deps: DefinitionDependencies): Scenario {
    const def = parseDefinition(data);
    return new Scenario({
      id: def.id,
      name: def.name,
      currency: def.currency ?? deps.currency,
      instruments: def.instruments,
      macroBricks: def.macroBricks,
      catalog: deps.catalog,
      config: { ...def.config, ...deps.config },
      logger: deps.logger,
    });
  }

  /** Result of the last successful run. */
  get lastResult(): ScenarioResult | undefined {
    return this._lastResult;
  }

  checkDisjoint(macroBrickIds: readonly string[]): DisjointReport {
    return this.registry.checkDisjoint(macroBrickIds);
  }

  assertDisjoint(label: string, macroBrickIds: readonly string[]): void {
    this.registry.assertDisjoint(label, macroBrickIds);
  }

  // ─── Run ─────────────────────────────────────────────────────────────

  run(options: RunOptions): ScenarioResult {
    const index = this.horizon(options);
    const logger = this._logger;
    logger.debug({ start: formatPeriod(index.start), months: index.length }, "Scenario run started");

    // Per-run working copies with links resolved.
    const working = resolveLinks(cloneInstruments(this.registry.instruments()), index);

    // RESOLVE_SELECTION
    const selection = resolveSelection(this.registry, options.selection, {
      logger,
      warnOnOverlap: this.config.warnOnOverlap,
    });
    const selected = selection.instrumentIds.map((id) => this.working(working, id));

    for (const instrument of selected) {
      this._catalog.resolve(instrument);
      const currency = instrument.currency ?? this.currency;
      if (currency !== this.currency) {
        throw new ConfigError(
          "CURRENCY",
          `Instrument "${instrument.id}" is in ${currency}; scenario "${this.id}" runs in ${this.currency}`,
          instrument.id,
        );
      }
    }

    const cashIds = selected.filter((i) => this._catalog.isCashKind(i.family, i.kind)).map((i) => i.id);
    const [cashId] = cashIds;
    if (cashId === undefined || cashIds.length > 1) {
      throw new ConfigError(
        "CASH_ACCOUNT",
        cashIds.length === 0
          ? "Execution set contains no cash account"
          : `Execution set contains ${String(cashIds.length)} cash accounts: ${cashIds.join(", ")}`,
      );
    }

    // BUILD_DEPENDENCY_GRAPH → TOPOLOGICAL_ORDER
    const graph = buildDependencyGraph(selected);
    const { order } = topologicalOrder(graph, logger);
    const executionOrder = [...order.filter((id) => id !== cashId), cashId];

    // INITIALIZE_CONTEXT
    const accounts = new AccountRegistry(this.currency);
    const journal = new Journal(accounts);
    const windows = new Map<string, ActivationWindow>();
    for (const id of executionOrder) {
      const instrument = this.working(working, id);
      accounts.registerBrickAccount(id, instrument.family, instrument.name, this.currency);
      windows.set(id, resolveWindow(id, instrument.window, index, logger));
    }
    const cashWindow = this.window(windows, cashId);
    if (!cashWindow.active || cashWindow.startIndex !== 0 || cashWindow.endsInHorizon) {
      throw new ConfigError(
        "CASH_ACCOUNT",
        `Cash account "${cashId}" must be active over the whole horizon ` +
          `(${formatPeriod(index.start)} .. ${formatPeriod(index.at(index.length - 1))}); ` +
          `its window is ${formatPeriod(cashWindow.start)} .. ${formatPeriod(cashWindow.end)}`,
        cashId,
      );
    }

    const outputs = new Map<string, InstrumentOutput>();
    const context = (id: string, routed?: RoutedFlows): SimulationContext => {
      const window = this.window(windows, id);
      return {
        index: index.slice(window.startIndex),
        scenarioIndex: index,
        window,
        currency: this.currency,
        lookup: (ref) => this.working(working, ref),
        outputOf: (ref) => outputs.get(ref),
        routed,
        journal,
        accounts,
        logger: logger.child({ instrumentId: id }),
      };
    };

    // PREPARE
    for (const id of executionOrder) {
      const instrument = this.working(working, id);
      const strategy = this._catalog.resolve(instrument);
      if (strategy.prepare === undefined || !this.window(windows, id).active) continue;
      const derived = strategy.prepare(instrument, context(id));
      if (derived !== undefined) {
        working.set(id, { ...instrument, params: { ...instrument.params, ...derived } });
      }
    }

    // SIMULATE (cash last, on the routed flows of everything else)
    const simulate = (id: string, routed?: RoutedFlows): void => {
      const instrument = this.working(working, id);
      const window = this.window(windows, id);
      if (!window.active) {
        outputs.set(id, emptyOutput(index));
        return;
      }
      const ctx = context(id, routed);
      const local = this._catalog.resolve(instrument).simulate(instrument, ctx);
      assertOutputShape(id, local, ctx.index);
      outputs.set(id, placeOutput(id, local, window, index));
    };

    const nonCash = executionOrder.filter((id) => id !== cashId);
    for (const id of nonCash) simulate(id);

    const others = nonCash.flatMap((id) => {
      const output = outputs.get(id);
      return output === undefined ? [] : [output];
    });
    simulate(cashId, {
      cashIn: Series.sum(index, others.map((o) => o.cashIn)),
      cashOut: Series.sum(index, others.map((o) => o.cashOut)),
    });

    // ROUTE_CASH
    compileLedger({
      index,
      currency: this.currency,
      journal,
      accounts,
      instruments: nonCash.map((id) => this.working(working, id)),
      cash: this.working(working, cashId),
      outputs,
      windows,
    });
    if (this.config.validateRouting) {
      const violations = journal.validateInvariants(accounts);
      if (violations.length > 0) {
        throw new IdentityError(
          "ROUTING_INVARIANT",
          `Journal invariants violated after routing (${String(violations.length)})`,
          violations,
        );
      }
    }

    // AGGREGATE
    const cashOutput = outputs.get(cashId) ?? emptyOutput(index);
    const totals = computeTotals({
      index,
      currency: this.currency,
      outputs: executionOrder.flatMap((id) => {
        const output = outputs.get(id);
        return output === undefined ? [] : [output];
      }),
      cash: cashOutput,
      journal,
      accounts,
    });

    // BUILD_MACRO_AGGREGATES
    const includeStructs = options.includeStructResults ?? this.config.includeStructResults;
    const byStruct = includeStructs ? buildStructResults(this.registry, outputs, index, options.structsFilter) : {};

    const result: ScenarioResult = {
      outputs: Object.fromEntries(outputs),
      totals,
      byStruct,
      journal,
      accounts,
      instruments: Object.fromEntries(executionOrder.map((id) => [id, this.working(working, id)])),
      windows: Object.fromEntries(windows),
      meta: {
        executionOrder,
        overlaps: selection.overlaps,
        index,
        cashInstrumentId: cashId,
      },
    };

    logger.debug({ entries: journal.size, instruments: executionOrder.length }, "Scenario run finished");
    this._lastResult = result;
    return result;
  }

  // ─── Helpers ─────────────────────────────────────────────────────────

  private horizon(options: RunOptions): TimeIndex {
    let start: Period;
    try {
      start = toPeriod(options.start);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigError("INVALID_HORIZON", `Invalid scenario start: ${reason}`);
    }
    if (!Number.isInteger(options.months) || options.months < 1) {
      throw new ConfigError(
        "INVALID_HORIZON",
        `Scenario horizon must be at least one whole month, got ${String(options.months)}`,
      );
    }
    return TimeIndex.fromStart(start, options.months);
  }

  private working(working: ReadonlyMap<string, Instrument>, id: string): Instrument {
    const instrument = working.get(id);
    if (instrument === undefined) {
      throw new ConfigError("UNKNOWN_ID", `Unknown instrument "${id}"`, id);
    }
    return instrument;
  }

  private window(windows: ReadonlyMap<string, ActivationWindow>, id: string): ActivationWindow {
    const window = windows.get(id);
    if (window === undefined) {
      throw new ConfigError("UNKNOWN_ID", `Instrument "${id}" has no activation window in this run`, id);
    }
    return window;
  }
}

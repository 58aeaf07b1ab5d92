/**
 * @brickplan/scenario — Strategy catalog.
 *
 * One kind → strategy table per family. The catalog is built by the
 * caller and handed to a Scenario; nothing is registered globally.
 */

import type { Family, Instrument } from "@brickplan/types";
import { ConfigError } from "./errors.js";
import type { Strategy } from "./types.js";

export type StrategyRole = "cash";

export interface StrategyRegistration {
  readonly family: Family;
  readonly kind: string;
  readonly strategy: Strategy;
  readonly role: StrategyRole | undefined;
}

export interface RegisterOptions {
  /** Marks the kind as the cash account that receives routed flows. */
  readonly role?: StrategyRole;
}

export class StrategyCatalog {
  private readonly _tables: Map<Family, Map<string, StrategyRegistration>> = new Map();

  register(family: Family, kind: string, strategy: Strategy, options: RegisterOptions = {}): this {
    const table = this._tables.get(family) ?? new Map<string, StrategyRegistration>();
    if (table.has(kind)) {
      throw new ConfigError(
        "DUPLICATE_STRATEGY",
        `Strategy for ${family} kind "${kind}" is already registered`,
      );
    }
    table.set(kind, { family, kind, strategy, role: options.role });
    this._tables.set(family, table);
    return this;
  }

  has(family: Family, kind: string): boolean {
    return this._tables.get(family)?.has(kind) ?? false;
  }

  /**
   * Strategy for an instrument. Throws UNKNOWN_STRATEGY.
   */
  resolve(instrument: Pick<Instrument, "id" | "family" | "kind">): Strategy {
    return this.registration(instrument).strategy;
  }

  isCashKind(family: Family, kind: string): boolean {
    return this._tables.get(family)?.get(kind)?.role === "cash";
  }

  /** Registered kinds, sorted; all families when none is given. */
  kinds(family?: Family): string[] {
    const tables = family === undefined ? [...this._tables.values()] : [this._tables.get(family)];
    const kinds: string[] = [];
    for (const table of tables) {
      if (table !== undefined) kinds.push(...table.keys());
    }
    return kinds.sort();
  }

  private registration(instrument: Pick<Instrument, "id" | "family" | "kind">): StrategyRegistration {
    const entry = this._tables.get(instrument.family)?.get(instrument.kind);
    if (entry === undefined) {
      throw new ConfigError(
        "UNKNOWN_STRATEGY",
        `No ${instrument.family} strategy registered for kind "${instrument.kind}" (instrument "${instrument.id}")`,
        instrument.id,
      );
    }
    return entry;
  }
}

/**
 * @brickplan/registry — Registry.
 *
 * Immutable index over instruments and MacroBricks. Everything derived
 * (flattened membership, overlap map, structural report) is computed
 * once in the constructor and never mutated afterwards.
 *
 * Expansion is a depth-first walk with two sets: ids on the active path
 * ("in progress") and ids already expanded ("completed"). Meeting an
 * in-progress id is a cycle; meeting a completed id is a diamond and is
 * served from the cache.
 */

import type { Instrument, MacroBrick } from "@brickplan/types";
import { createValidationReport, formatValidationReport } from "./report.js";
import type {
  DisjointConflict,
  DisjointReport,
  InstrumentMap,
  MacroBrickMap,
  ValidationReport,
} from "./types.js";
import { RESERVED_PREFIXES, RegistryError } from "./types.js";

/**
 * Rotate a cycle so it starts at its smallest id; used to deduplicate
 * the same cycle found from different entry points.
 */
function normalizeCycle(cycle: readonly string[]): readonly string[] {
  let start = 0;
  cycle.forEach((id, i) => {
    const current = cycle[start];
    if (current !== undefined && id < current) start = i;
  });
  return [...cycle.slice(start), ...cycle.slice(0, start)];
}

export class Registry {
  private readonly _instruments: Map<string, Instrument>;
  private readonly _macroBricks: Map<string, MacroBrick>;
  private readonly _flatMembers: Map<string, readonly string[]> = new Map();
  private readonly _owners: Map<string, readonly string[]> = new Map();
  private readonly _report: ValidationReport;

  constructor(instruments: InstrumentMap, macroBricks: MacroBrickMap = new Map()) {
    this._instruments = new Map(instruments);
    this._macroBricks = new Map(macroBricks);
    this._report = this.inspect();

    if (this._report.hasErrors) {
      throw new RegistryError(
        "INVALID_STRUCTURE",
        `Registry structure is invalid:\n${formatValidationReport(this._report)}`,
        { report: this._report },
      );
    }
  }

  // ─── Lookups ─────────────────────────────────────────────────────────

  isInstrument(id: string): boolean {
    return this._instruments.has(id);
  }

  isMacroBrick(id: string): boolean {
    return this._macroBricks.has(id);
  }

  getInstrument(id: string): Instrument {
    const instrument = this._instruments.get(id);
    if (instrument === undefined) {
      throw new RegistryError("NOT_FOUND", `Instrument "${id}" not found in registry`);
    }
    return instrument;
  }

  getMacroBrick(id: string): MacroBrick {
    const macroBrick = this._macroBricks.get(id);
    if (macroBrick === undefined) {
      throw new RegistryError("NOT_FOUND", `MacroBrick "${id}" not found in registry`);
    }
    return macroBrick;
  }

  /**
   * Cached transitive instrument ids of a MacroBrick, first-seen order.
   */
  getFlatMembers(macroBrickId: string): readonly string[] {
    const members = this._flatMembers.get(macroBrickId);
    if (members === undefined) {
      throw new RegistryError("NOT_FOUND", `MacroBrick "${macroBrickId}" not found in registry`);
    }
    return members;
  }

  instrumentIds(): readonly string[] {
    return [...this._instruments.keys()];
  }

  macroBrickIds(): readonly string[] {
    return [...this._macroBricks.keys()];
  }

  instruments(): readonly Instrument[] {
    return [...this._instruments.values()];
  }

  macroBricks(): readonly MacroBrick[] {
    return [...this._macroBricks.values()];
  }

  /**
   * Ids of every MacroBrick whose flattened set contains the instrument.
   */
  owners(instrumentId: string): readonly string[] {
    return this._owners.get(instrumentId) ?? [];
  }

  /** Instruments owned by two or more MacroBricks. */
  overlaps(): Readonly<Record<string, readonly string[]>> {
    return this._report.overlapsGlobal;
  }

  get size(): number {
    return this._instruments.size + this._macroBricks.size;
  }

  // ─── Expansion ───────────────────────────────────────────────────────

  /**
   * Transitive instrument ids of a MacroBrick, first-seen order, no
   * duplicates. Throws CYCLE or UNKNOWN_MEMBER.
   */
  expandMemberBricks(macroBrickId: string): readonly string[] {
    const cached = this._flatMembers.get(macroBrickId);
    if (cached !== undefined) return cached;
    if (!this._macroBricks.has(macroBrickId)) {
      throw new RegistryError("NOT_FOUND", `MacroBrick "${macroBrickId}" not found in registry`);
    }
    return this.expand(macroBrickId, [], new Set(), this._flatMembers);
  }

  /**
   * Two-set DFS. With `unknown` given, unknown members are collected
   * there and skipped instead of thrown.
   */
  private expand(
    id: string,
    path: string[],
    inProgress: Set<string>,
    completed: Map<string, readonly string[]>,
    unknown?: string[],
  ): readonly string[] {
    const done = completed.get(id);
    if (done !== undefined) return done;

    if (inProgress.has(id)) {
      const cycle = path.slice(path.indexOf(id));
      throw new RegistryError(
        "CYCLE",
        `Cycle detected in MacroBrick membership: ${[...cycle, id].join(" -> ")}`,
        { path: cycle },
      );
    }

    const macroBrick = this.getMacroBrick(id);
    inProgress.add(id);
    path.push(id);

    const flat: string[] = [];
    const seen = new Set<string>();
    const add = (instrumentId: string): void => {
      if (!seen.has(instrumentId)) {
        seen.add(instrumentId);
        flat.push(instrumentId);
      }
    };

    for (const member of macroBrick.members) {
      if (this._instruments.has(member)) {
        add(member);
      } else if (this._macroBricks.has(member)) {
        for (const nested of this.expand(member, path, inProgress, completed, unknown)) {
          add(nested);
        }
      } else if (unknown !== undefined) {
        unknown.push(member);
      } else {
        throw new RegistryError(
          "UNKNOWN_MEMBER",
          `MacroBrick "${id}" contains unknown member id "${member}"`,
          { path: [...path, member] },
        );
      }
    }

    path.pop();
    inProgress.delete(id);
    completed.set(id, flat);
    return flat;
  }

  // ─── Validation ──────────────────────────────────────────────────────

  /**
   * The structural report. A constructed registry never carries errors,
   * so this returns warnings (empty MacroBricks, overlaps) at most; a
   * report with errors is raised as INVALID_STRUCTURE.
   */
  validate(): ValidationReport {
    if (this._report.hasErrors) {
      throw new RegistryError("INVALID_STRUCTURE", formatValidationReport(this._report), {
        report: this._report,
      });
    }
    return this._report;
  }

  /**
   * Collect every structural finding without stopping at the first.
   * Fills the flat-member and owner caches for MacroBricks that expand.
   */
  private inspect(): ValidationReport {
    const idConflicts: string[] = [];
    const unknownIds: string[] = [];
    const cycles: (readonly string[])[] = [];
    const cycleKeys = new Set<string>();
    const emptyMacroBricks: string[] = [];

    const checkPrefix = (kind: string, id: string): void => {
      for (const prefix of RESERVED_PREFIXES) {
        if (id.startsWith(prefix)) {
          idConflicts.push(`${kind} id "${id}" uses reserved prefix "${prefix}"`);
        }
      }
    };
    for (const id of this._instruments.keys()) checkPrefix("Instrument", id);
    for (const id of this._macroBricks.keys()) checkPrefix("MacroBrick", id);
    for (const id of [...this._instruments.keys()].filter((i) => this._macroBricks.has(i)).sort()) {
      idConflicts.push(`"${id}" is both an instrument and a MacroBrick`);
    }

    for (const id of this._macroBricks.keys()) {
      const missing: string[] = [];
      try {
        const flat = this.expand(id, [], new Set(), this._flatMembers, missing);
        if (flat.length === 0 && missing.length === 0) emptyMacroBricks.push(id);
      } catch (error) {
        if (!(error instanceof RegistryError)) throw error;
        if (error.code === "CYCLE" && error.path !== undefined) {
          const cycle = normalizeCycle(error.path);
          const key = cycle.join("\u0000");
          if (!cycleKeys.has(key)) {
            cycleKeys.add(key);
            cycles.push(cycle);
          }
        } else {
          throw error;
        }
      } finally {
        for (const member of missing) {
          if (!unknownIds.includes(member)) unknownIds.push(member);
        }
      }
    }

    const owners = new Map<string, string[]>();
    for (const [macroBrickId, flat] of this._flatMembers) {
      for (const instrumentId of flat) {
        const list = owners.get(instrumentId) ?? [];
        list.push(macroBrickId);
        owners.set(instrumentId, list);
      }
    }
    const overlapsGlobal: Record<string, readonly string[]> = {};
    for (const [instrumentId, list] of owners) {
      const sorted = [...list].sort();
      this._owners.set(instrumentId, sorted);
      if (sorted.length > 1) overlapsGlobal[instrumentId] = sorted;
    }

    return createValidationReport({ unknownIds, cycles, idConflicts, emptyMacroBricks, overlapsGlobal });
  }

  // ─── Disjointness ────────────────────────────────────────────────────

  /**
   * Pairwise shared instruments between the given MacroBricks.
   */
  checkDisjoint(macroBrickIds: readonly string[]): DisjointReport {
    const conflicts: DisjointConflict[] = [];

    for (let i = 0; i < macroBrickIds.length; i++) {
      for (let j = i + 1; j < macroBrickIds.length; j++) {
        const first = macroBrickIds[i];
        const second = macroBrickIds[j];
        if (first === undefined || second === undefined) continue;
        const other = new Set(this.getFlatMembers(second));
        const shared = this.getFlatMembers(first).filter((id) => other.has(id)).sort();
        if (shared.length > 0) {
          conflicts.push({ first, second, sharedInstruments: shared });
        }
      }
    }

    return { isDisjoint: conflicts.length === 0, conflicts };
  }

  /**
   * Throw NOT_DISJOINT when any two of the MacroBricks share an instrument.
   */
  assertDisjoint(label: string, macroBrickIds: readonly string[]): void {
    const report = this.checkDisjoint(macroBrickIds);
    if (!report.isDisjoint) {
      const details = report.conflicts
        .map((c) => `"${c.first}" and "${c.second}" share ${c.sharedInstruments.join(", ")}`)
        .join("; ");
      throw new RegistryError("NOT_DISJOINT", `${label}: MacroBricks are not disjoint: ${details}`);
    }
  }
}

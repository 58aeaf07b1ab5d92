/**
 * @brickplan/registry — Types for the instrument/MacroBrick registry.
 *
 * Rules:
 * - Reports are plain data, safe to serialize
 * - Errors vs warnings: unknown ids, cycles and id conflicts are errors;
 *   empty MacroBricks and overlaps are warnings
 */

import type { Instrument, MacroBrick } from "@brickplan/types";

/** Ids starting with these belong to the engine's own namespaces. */
export const RESERVED_PREFIXES = ["b:", "mb:"] as const;

export type InstrumentMap = ReadonlyMap<string, Instrument>;
export type MacroBrickMap = ReadonlyMap<string, MacroBrick>;

// ─── Reports ─────────────────────────────────────────────────────────────

/**
 * Aggregated structural report for a registry.
 */
export interface ValidationReport {
  readonly unknownIds: readonly string[];
  /** Each cycle as the ids on it, starting at its smallest id. */
  readonly cycles: readonly (readonly string[])[];
  readonly idConflicts: readonly string[];
  readonly emptyMacroBricks: readonly string[];
  /** Instrument id → sorted ids of every MacroBrick containing it (2+ only). */
  readonly overlapsGlobal: Readonly<Record<string, readonly string[]>>;
  readonly hasErrors: boolean;
  readonly hasWarnings: boolean;
  readonly isValid: boolean;
  /** 0 valid, 1 errors, 2 warnings only. */
  readonly exitCode: 0 | 1 | 2;
}

export interface DisjointConflict {
  readonly first: string;
  readonly second: string;
  readonly sharedInstruments: readonly string[];
}

export interface DisjointReport {
  readonly isDisjoint: boolean;
  readonly conflicts: readonly DisjointConflict[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type RegistryErrorCode =
  | "CYCLE"
  | "UNKNOWN_MEMBER"
  | "NOT_FOUND"
  | "INVALID_STRUCTURE"
  | "INVALID_ID"
  | "NOT_DISJOINT";

/**
 * Structured error from the registry.
 * `path` names the cycle for CYCLE; `report` carries the full
 * ValidationReport for INVALID_STRUCTURE.
 */
export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;
  public readonly path: readonly string[] | undefined;
  public readonly report: ValidationReport | undefined;

  constructor(
    code: RegistryErrorCode,
    message: string,
    details: { path?: readonly string[]; report?: ValidationReport } = {},
  ) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
    this.path = details.path;
    this.report = details.report;
  }
}

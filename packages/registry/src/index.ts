/**
 * @brickplan/registry — Instrument and MacroBrick registry.
 *
 * Indexes instruments and MacroBricks, proves the membership graph is
 * acyclic, caches flattened membership and reports overlaps.
 */

export { Registry } from "./registry.js";
export { createMacroBrick, slugifyName } from "./macrobrick.js";
export type { MacroBrickInput } from "./macrobrick.js";
export { createValidationReport, formatValidationReport } from "./report.js";
export type { ReportFindings } from "./report.js";

export type {
  InstrumentMap,
  MacroBrickMap,
  ValidationReport,
  DisjointConflict,
  DisjointReport,
  RegistryErrorCode,
} from "./types.js";
export { RegistryError, RESERVED_PREFIXES } from "./types.js";

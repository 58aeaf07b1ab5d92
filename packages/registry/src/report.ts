/**
 * @brickplan/registry — Report construction and formatting.
 */

import type { ValidationReport } from "./types.js";

export interface ReportFindings {
  readonly unknownIds?: readonly string[];
  readonly cycles?: readonly (readonly string[])[];
  readonly idConflicts?: readonly string[];
  readonly emptyMacroBricks?: readonly string[];
  readonly overlapsGlobal?: Readonly<Record<string, readonly string[]>>;
}

/**
 * Derive the status flags from raw findings.
 */
export function createValidationReport(findings: ReportFindings = {}): ValidationReport {
  const unknownIds = findings.unknownIds ?? [];
  const cycles = findings.cycles ?? [];
  const idConflicts = findings.idConflicts ?? [];
  const emptyMacroBricks = findings.emptyMacroBricks ?? [];
  const overlapsGlobal = findings.overlapsGlobal ?? {};

  const hasErrors = unknownIds.length > 0 || cycles.length > 0 || idConflicts.length > 0;
  const hasWarnings = emptyMacroBricks.length > 0 || Object.keys(overlapsGlobal).length > 0;

  return {
    unknownIds,
    cycles,
    idConflicts,
    emptyMacroBricks,
    overlapsGlobal,
    hasErrors,
    hasWarnings,
    isValid: !hasErrors,
    exitCode: hasErrors ? 1 : hasWarnings ? 2 : 0,
  };
}

/**
 * Human-readable, one finding per line.
 */
export function formatValidationReport(report: ValidationReport): string {
  const lines = [report.isValid ? "Validation passed" : "Validation failed"];

  if (report.unknownIds.length > 0) {
    lines.push(`Unknown ids: ${report.unknownIds.join(", ")}`);
  }
  for (const cycle of report.cycles) {
    lines.push(`Cycle: ${[...cycle, cycle[0] ?? ""].join(" -> ")}`);
  }
  for (const conflict of report.idConflicts) {
    lines.push(`Id conflict: ${conflict}`);
  }
  if (report.emptyMacroBricks.length > 0) {
    lines.push(`Empty MacroBricks: ${report.emptyMacroBricks.join(", ")}`);
  }
  for (const [instrumentId, owners] of Object.entries(report.overlapsGlobal)) {
    lines.push(`Instrument "${instrumentId}" shared by: ${owners.join(", ")}`);
  }

  return lines.join("\n");
}

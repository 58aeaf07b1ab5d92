/**
 * @brickplan/scenario — Link resolution.
 *
 * Runs on the per-run working copies before selection. A start link
 * places an instrument's start `offsetMonths` after the last active
 * month of the referenced instrument (0 = that same month).
 */

import type { Instrument, Period } from "@brickplan/types";
import { addMonths, formatPeriod, samePeriod } from "@brickplan/types";
import { ConfigError } from "./errors.js";
import type { TimeIndex } from "./time-series.js";
import { windowBounds } from "./window.js";

/**
 * Deep copies of the definitions, keyed by id.
 */
export function cloneInstruments(instruments: readonly Instrument[]): Map<string, Instrument> {
  const working = new Map<string, Instrument>();
  for (const instrument of instruments) {
    working.set(instrument.id, structuredClone(instrument));
  }
  return working;
}

/**
 * Check that every referenced id exists and derive start periods from
 * start links. Returns a new map; the input is not modified.
 */
export function resolveLinks(
  working: ReadonlyMap<string, Instrument>,
  index: TimeIndex,
): Map<string, Instrument> {
  const resolved = new Map(working);
  const derived = new Map<string, Period>();
  const visiting: string[] = [];

  const requireKnown = (owner: string, field: string, ref: string): void => {
    if (!working.has(ref)) {
      throw new ConfigError("UNKNOWN_ID", `Instrument "${owner}" links ${field} to unknown instrument "${ref}"`, owner);
    }
  };

  const resolveStart = (id: string): void => {
    if (derived.has(id)) return;
    const instrument = resolved.get(id);
    const link = instrument?.links?.start;
    if (instrument === undefined || link === undefined) return;

    if (visiting.includes(id)) {
      const cycle = [...visiting.slice(visiting.indexOf(id)), id];
      throw new ConfigError("LINK_CYCLE", `Start links form a cycle: ${cycle.join(" -> ")}`, id);
    }

    requireKnown(id, "start.onEndOf", link.onEndOf);
    visiting.push(id);
    resolveStart(link.onEndOf);
    visiting.pop();

    const ref = resolved.get(link.onEndOf);
    const refEnd = windowBounds(link.onEndOf, ref?.window, index).end;
    const start = addMonths(refEnd, link.offsetMonths ?? 0);

    const explicit = instrument.window?.start;
    if (explicit !== undefined) {
      const given = windowBounds(id, { start: explicit }, index).start;
      if (!samePeriod(given, start)) {
        throw new ConfigError(
          "LINK_CONFLICT",
          `Instrument "${id}" starts ${formatPeriod(given)} but its start link on "${link.onEndOf}" gives ${formatPeriod(start)}`,
          id,
        );
      }
    }

    derived.set(id, start);
    resolved.set(id, { ...instrument, window: { ...instrument.window, start } });
  };

  for (const [id, instrument] of working) {
    const principal = instrument.links?.principal;
    if (principal?.fromProperty !== undefined) requireKnown(id, "principal.fromProperty", principal.fromProperty);
    if (principal?.remainingOf !== undefined) requireKnown(id, "principal.remainingOf", principal.remainingOf);
  }
  for (const id of [...working.keys()].sort()) {
    resolveStart(id);
  }

  return resolved;
}

/**
 * @brickplan/scenario — Selection.
 *
 * Turns a list of instrument and MacroBrick ids into the execution set.
 * MacroBricks expand through the registry's cached membership and the
 * union is deduplicated, so an instrument reached through several
 * selected MacroBricks runs once. Such overlaps are reported.
 */

import type { Registry } from "@brickplan/registry";
import type { Logger } from "pino";
import { ConfigError } from "./errors.js";
import type { OverlapInfo } from "./types.js";

export interface Selection {
  /** Instrument ids in first-seen order. */
  readonly instrumentIds: readonly string[];
  readonly overlaps: Readonly<Record<string, OverlapInfo>>;
}

export interface SelectionOptions {
  readonly logger: Logger;
  readonly warnOnOverlap: boolean;
}

export function resolveSelection(
  registry: Registry,
  selection: readonly string[] | undefined,
  options: SelectionOptions,
): Selection {
  if (selection === undefined) {
    return { instrumentIds: registry.instrumentIds(), overlaps: {} };
  }

  const ids: string[] = [];
  const seen = new Set<string>();
  const owners = new Map<string, Set<string>>();

  const add = (id: string): void => {
    if (!seen.has(id)) {
      seen.add(id);
      ids.push(id);
    }
  };

  for (const id of selection) {
    if (registry.isInstrument(id)) {
      add(id);
    } else if (registry.isMacroBrick(id)) {
      for (const member of registry.getFlatMembers(id)) {
        add(member);
        const set = owners.get(member) ?? new Set<string>();
        set.add(id);
        owners.set(member, set);
      }
    } else {
      throw new ConfigError("UNKNOWN_ID", `Selection contains unknown id "${id}"`);
    }
  }

  const overlaps: Record<string, OverlapInfo> = {};
  for (const [instrumentId, macroBricks] of owners) {
    if (macroBricks.size < 2) continue;
    const sorted = [...macroBricks].sort();
    overlaps[instrumentId] = { macroBricks: sorted, count: sorted.length };
    if (options.warnOnOverlap) {
      options.logger.warn(
        { instrumentId, macroBricks: sorted },
        "Instrument is shared by several selected MacroBricks; it runs once",
      );
    }
  }

  return { instrumentIds: ids, overlaps };
}

import { Scenario } from "@brickplan/scenario";
import type { ScenarioResult } from "@brickplan/scenario";
import type { Family, Instrument, Params } from "@brickplan/types";
import pino from "pino";
import type { Logger } from "pino";
import { createDefaultCatalog } from "../src/catalog.js";

export function instrument(
  id: string,
  family: Family,
  kind: string,
  params: Params,
  extra: Partial<Pick<Instrument, "links" | "window" | "name">> = {},
): Instrument {
  return { id, name: id, kind, family, params, ...extra };
}

export const cash = (params: Params = { initialBalance: 1_000_000 }): Instrument =>
  instrument("cash", "asset", "a.cash", params);

export interface RunInput {
  readonly start?: string;
  readonly months: number;
  readonly cash?: Params;
  readonly logger?: Logger;
}

/** Run the instruments next to a well-funded cash account. */
export function runWith(instruments: Instrument[], input: RunInput): ScenarioResult {
  const scenario = new Scenario({
    name: "Household",
    instruments: [cash(input.cash), ...instruments],
    catalog: createDefaultCatalog(),
    logger: input.logger,
  });
  return scenario.run({ start: input.start ?? "2026-01", months: input.months });
}

export function values(result: ScenarioResult, id: string, field: "cashIn" | "cashOut" | "assetValue" | "debtBalance" | "interest"): number[] {
  const output = result.outputs[id];
  if (output === undefined) throw new Error(`no output for ${id}`);
  return output[field].values();
}

export function eventKinds(result: ScenarioResult, id: string): string[] {
  return (result.outputs[id]?.events ?? []).map((e) => e.kind);
}

export function capturingLogger(): { logger: Logger; records: Record<string, unknown>[] } {
  const records: Record<string, unknown>[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === "object" && parsed !== null) {
          records.push(parsed as Record<string, unknown>);
        }
      },
    },
  );
  return { logger, records };
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

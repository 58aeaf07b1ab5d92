/**
 * @brickplan/scenario — Scenario definitions.
 *
 * Zod schemas for scenarios supplied as plain data (parsed JSON, YAML,
 * fixtures). Parsing yields the option object the Scenario constructor
 * takes, minus the injected catalog and logger.
 */

import { createMacroBrick } from "@brickplan/registry";
import type { Instrument, MacroBrick, ParamValue } from "@brickplan/types";
import { z } from "zod";
import type { ZodError } from "zod";
import { ConfigError } from "./errors.js";
import type { ScenarioConfig } from "./types.js";

// =============================================================================
// Schemas
// =============================================================================

export const ParamValueSchema: z.ZodType<ParamValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ParamValueSchema),
    z.record(ParamValueSchema),
  ]),
);

const PeriodLikeSchema = z.union([
  z.string().regex(/^\d{4}-\d{2}(-\d{2}.*)?$/, "Expected YYYY-MM or an ISO date"),
  z.object({
    year: z.number().int(),
    month: z.number().int().min(1).max(12),
  }),
]);

export const InstrumentSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).optional(),
  kind: z.string().min(1),
  family: z.enum(["asset", "liability", "flow", "transfer"]),
  currency: z.string().regex(/^[A-Z]{3}$/).optional(),
  params: z.record(ParamValueSchema).default({}),
  links: z
    .object({
      principal: z
        .object({
          fromProperty: z.string().min(1).optional(),
          remainingOf: z.string().min(1).optional(),
          nominal: z.number().optional(),
        })
        .optional(),
      start: z
        .object({
          onEndOf: z.string().min(1),
          offsetMonths: z.number().int().optional(),
        })
        .optional(),
    })
    .optional(),
  window: z
    .object({
      start: PeriodLikeSchema.optional(),
      end: PeriodLikeSchema.optional(),
      durationMonths: z.number().int().optional(),
    })
    .optional(),
});

export const MacroBrickSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  members: z.array(z.string().min(1)).default([]),
  tags: z.array(z.string()).default([]),
});

export const ScenarioDefinitionSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  currency: z.string().regex(/^[A-Z]{3}$/).optional(),
  instruments: z.array(InstrumentSchema),
  macroBricks: z.array(MacroBrickSchema).default([]),
  config: z
    .object({
      warnOnOverlap: z.boolean().optional(),
      includeStructResults: z.boolean().optional(),
      validateRouting: z.boolean().optional(),
    })
    .optional(),
});

export type ScenarioDefinition = z.input<typeof ScenarioDefinitionSchema>;

export interface ParsedDefinition {
  readonly id: string | undefined;
  readonly name: string;
  readonly currency: string | undefined;
  readonly instruments: readonly Instrument[];
  readonly macroBricks: readonly MacroBrick[];
  readonly config: Partial<ScenarioConfig>;
}

// =============================================================================
// Parsing
// =============================================================================

function formatZodErrors(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate a plain-data scenario. Throws INVALID_DEFINITION listing
 * every issue.
 */
export function parseDefinition(data: unknown): ParsedDefinition {
  const result = ScenarioDefinitionSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError("INVALID_DEFINITION", `Invalid scenario definition: ${formatZodErrors(result.error)}`);
  }
  const def = result.data;

  const config: Partial<ScenarioConfig> = {
    ...(def.config?.warnOnOverlap !== undefined ? { warnOnOverlap: def.config.warnOnOverlap } : {}),
    ...(def.config?.includeStructResults !== undefined
      ? { includeStructResults: def.config.includeStructResults }
      : {}),
    ...(def.config?.validateRouting !== undefined ? { validateRouting: def.config.validateRouting } : {}),
  };

  return {
    id: def.id,
    name: def.name,
    currency: def.currency,
    instruments: def.instruments.map((i) => ({ ...i, name: i.name ?? i.id })),
    macroBricks: def.macroBricks.map((mb) => createMacroBrick(mb)),
    config,
  };
}

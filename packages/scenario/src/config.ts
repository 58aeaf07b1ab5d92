/**
 * @brickplan/scenario — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { ScenarioConfig } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

const flag = (fallback: "true" | "false") =>
  z
    .string()
    .transform((v) => v === "true")
    .default(fallback);

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  LOG_PRETTY: flag("false"),

  // Domain defaults
  DEFAULT_CURRENCY: z
    .string()
    .regex(/^[A-Z]{3}$/, "DEFAULT_CURRENCY must be a three-letter ISO 4217 code")
    .default("EUR"),

  // Engine
  WARN_ON_OVERLAP: flag("true"),
  INCLUDE_STRUCT_RESULTS: flag("true"),
  VALIDATE_ROUTING: flag("true"),

  // Validator
  VALIDATION_MODE: z.enum(["raise", "warn"]).default("raise"),
  VALIDATION_TOLERANCE: z.coerce.number().nonnegative().default(0.01),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

export function scenarioConfigFrom(config: AppConfig): ScenarioConfig {
  return {
    warnOnOverlap: config.WARN_ON_OVERLAP,
    includeStructResults: config.INCLUDE_STRUCT_RESULTS,
    validateRouting: config.VALIDATE_ROUTING,
    currency: config.DEFAULT_CURRENCY,
  };
}

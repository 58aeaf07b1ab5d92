/**
 * @brickplan/scenario — Logging.
 *
 * Structured pino logging. Pretty output is for terminals only.
 */

import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { AppConfig } from "./config.js";

export type { Logger } from "pino";

export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "LOG_PRETTY">,
  destination?: DestinationStream,
): Logger {
  const options = {
    level: config.LOG_LEVEL,
    ...(config.LOG_PRETTY && destination === undefined
      ? { transport: { target: "pino-pretty" } }
      : {}),
  };
  return destination === undefined ? pino(options) : pino(options, destination);
}

/** Logger that discards everything; the default when none is injected. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

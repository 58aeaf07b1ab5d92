/**
 * Parameter readers.
 *
 * Instrument params are JSON-like; strategies read them through these
 * helpers so a missing or mistyped value fails as a ConfigError naming
 * the instrument and the key.
 */

import { ConfigError } from "@brickplan/scenario";
import type { Instrument } from "@brickplan/types";

export interface NumberBounds {
  /** Inclusive lower bound. */
  readonly min?: number;
  /** Exclusive lower bound. */
  readonly above?: number;
  readonly integer?: boolean;
}

export function invalidParams(instrument: Instrument, message: string): ConfigError {
  return new ConfigError("INVALID_PARAMS", `Instrument "${instrument.id}": ${message}`, instrument.id);
}

function checkBounds(instrument: Instrument, key: string, value: number, bounds: NumberBounds): number {
  if (!Number.isFinite(value)) {
    throw invalidParams(instrument, `${key} must be a finite number`);
  }
  if (bounds.integer === true && !Number.isInteger(value)) {
    throw invalidParams(instrument, `${key} must be a whole number, got ${String(value)}`);
  }
  if (bounds.min !== undefined && value < bounds.min) {
    throw invalidParams(instrument, `${key} must be at least ${String(bounds.min)}, got ${String(value)}`);
  }
  if (bounds.above !== undefined && value <= bounds.above) {
    throw invalidParams(instrument, `${key} must be greater than ${String(bounds.above)}, got ${String(value)}`);
  }
  return value;
}

export function requireNumber(instrument: Instrument, key: string, bounds: NumberBounds = {}): number {
  const value = instrument.params[key];
  if (typeof value !== "number") {
    throw invalidParams(instrument, `missing numeric parameter ${key}`);
  }
  return checkBounds(instrument, key, value, bounds);
}

export function optionalNumber(instrument: Instrument, key: string, fallback: number, bounds: NumberBounds = {}): number {
  const value = instrument.params[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "number") {
    throw invalidParams(instrument, `${key} must be a number`);
  }
  return checkBounds(instrument, key, value, bounds);
}

/** Like optionalNumber, but absent stays absent. */
export function maybeNumber(instrument: Instrument, key: string, bounds: NumberBounds = {}): number | undefined {
  const value = instrument.params[key];
  if (value === undefined || value === null) return undefined;
  return requireNumber(instrument, key, bounds);
}

export function optionalBoolean(instrument: Instrument, key: string, fallback: boolean): boolean {
  const value = instrument.params[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "boolean") {
    throw invalidParams(instrument, `${key} must be true or false`);
  }
  return value;
}

export function optionalChoice<T extends string>(
  instrument: Instrument,
  key: string,
  choices: readonly T[],
  fallback: T,
): T {
  const value = instrument.params[key];
  if (value === undefined || value === null) return fallback;
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw invalidParams(instrument, `${key} must be one of ${choices.join(", ")}, got ${JSON.stringify(value)}`);
  }
  return match;
}

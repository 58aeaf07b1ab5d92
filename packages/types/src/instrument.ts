/**
 * Instrument Types
 *
 * An instrument ("brick") is a composable financial object. Its behaviour
 * comes from a strategy selected by (family, kind); the record itself only
 * carries data. MacroBricks group instruments and other MacroBricks.
 *
 * Rules:
 * - Definitions are immutable; the engine clones them per run
 * - Parameters are JSON-like so they can be hashed canonically
 * - Cross-references are structured, never free-form
 */

import type { Currency } from "./financial.js";
import type { PeriodLike } from "./period.js";

/** Instrument family. */
export type Family = "asset" | "liability" | "flow" | "transfer";

/** A JSON-like parameter value. */
export type ParamValue =
  | string
  | number
  | boolean
  | null
  | readonly ParamValue[]
  | { readonly [key: string]: ParamValue };

/** Strategy-specific parameters. */
export interface Params {
  readonly [key: string]: ParamValue;
}

/**
 * How a liability derives its principal.
 */
export interface PrincipalLink {
  /** Property instrument whose price (less down payment) is financed. */
  readonly fromProperty?: string;
  /** Liability whose remaining balance is refinanced. */
  readonly remainingOf?: string;
  /** Explicit amount. */
  readonly nominal?: number;
}

/**
 * Start this instrument when another one ends.
 */
export interface StartLink {
  readonly onEndOf: string;
  readonly offsetMonths?: number;
}

export interface InstrumentLinks {
  readonly principal?: PrincipalLink;
  readonly start?: StartLink;
}

/**
 * Activation window. Missing start = scenario start; missing end and
 * duration = scenario end. `end` wins over `durationMonths`.
 */
export interface ActivationWindowSpec {
  readonly start?: PeriodLike;
  readonly end?: PeriodLike;
  /** Counts the start month: 12 means start .. start + 11. */
  readonly durationMonths?: number;
}

export interface Instrument {
  readonly id: string;
  readonly name: string;
  /** Dot-separated discriminator, e.g. "a.cash", "l.loan.annuity". */
  readonly kind: string;
  readonly family: Family;
  readonly currency?: Currency;
  readonly params: Params;
  readonly links?: InstrumentLinks;
  readonly window?: ActivationWindowSpec;
}

/**
 * Named composite of instruments and nested MacroBricks (a DAG).
 */
export interface MacroBrick {
  readonly id: string;
  readonly name: string;
  readonly members: readonly string[];
  readonly tags?: readonly string[];
}

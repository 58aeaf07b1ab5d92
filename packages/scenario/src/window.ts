/**
 * @brickplan/scenario — Activation windows.
 *
 * Rules:
 * - No start: the scenario start
 * - `end` wins over `durationMonths` (with a warning)
 * - No end and no duration: the scenario end
 * - A duration below one month, or an end before the start, is invalid
 */

import type { ActivationWindowSpec, Period, PeriodLike } from "@brickplan/types";
import { addMonths, comparePeriods, formatPeriod, monthsBetween, toPeriod } from "@brickplan/types";
import type { Logger } from "pino";
import { ConfigError } from "./errors.js";
import type { TimeIndex } from "./time-series.js";
import type { ActivationWindow } from "./types.js";

function windowPeriod(instrumentId: string, field: string, value: PeriodLike): Period {
  try {
    return toPeriod(value);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError("INVALID_WINDOW", `Instrument "${instrumentId}" has an invalid window ${field}: ${reason}`, instrumentId);
  }
}

/**
 * First and last active month, independent of the horizon.
 */
export function windowBounds(
  instrumentId: string,
  spec: ActivationWindowSpec | undefined,
  index: TimeIndex,
  logger?: Logger,
): { start: Period; end: Period } {
  const start = spec?.start !== undefined ? windowPeriod(instrumentId, "start", spec.start) : index.start;
  const duration = spec?.durationMonths;

  if (duration !== undefined && (!Number.isInteger(duration) || duration < 1)) {
    throw new ConfigError(
      "INVALID_WINDOW",
      `Instrument "${instrumentId}" has durationMonths ${String(duration)}; it must be a whole number of at least 1`,
      instrumentId,
    );
  }

  let end: Period;
  if (spec?.end !== undefined) {
    end = windowPeriod(instrumentId, "end", spec.end);
    if (duration !== undefined) {
      logger?.warn(
        { instrumentId, end: formatPeriod(end), durationMonths: duration },
        "Window has both end and durationMonths; using end",
      );
    }
  } else if (duration !== undefined) {
    end = addMonths(start, duration - 1);
  } else {
    const scenarioEnd = index.end ?? index.start;
    end = comparePeriods(start, scenarioEnd) > 0 ? start : scenarioEnd;
  }

  if (comparePeriods(end, start) < 0) {
    throw new ConfigError(
      "INVALID_WINDOW",
      `Instrument "${instrumentId}" window ends (${formatPeriod(end)}) before it starts (${formatPeriod(start)})`,
      instrumentId,
    );
  }

  return { start, end };
}

/**
 * Resolve a window against the scenario index. A start before the
 * scenario start is clamped to the first scenario month.
 */
export function resolveWindow(
  instrumentId: string,
  spec: ActivationWindowSpec | undefined,
  index: TimeIndex,
  logger?: Logger,
): ActivationWindow {
  const { start, end } = windowBounds(instrumentId, spec, index, logger);
  const startIndex = Math.max(monthsBetween(index.start, start), 0);
  const lastOffset = monthsBetween(index.start, end);
  const endIndex = Math.min(lastOffset, index.length - 1);
  const active = startIndex < index.length && endIndex >= startIndex;

  return {
    start,
    end,
    startIndex,
    endIndex,
    active,
    endsInHorizon: active && lastOffset < index.length - 1,
  };
}

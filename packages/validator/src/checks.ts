/**
 * Run Checks
 *
 * Post-run checks over a completed ScenarioResult:
 * - Equity identity (equity = assets − liabilities)
 * - Net cash flow identity (net = in − out)
 * - Liabilities never grow after their initial draw
 * - Cash stays above its overdraft limit and minimum buffer
 * - Unit counts are never negative
 * - Loans with a payoff policy are settled when their window ends
 * - Escalating income never decreases within its window
 * - Stocks do not change after a window ends unless cash reconciles it
 *
 * Design:
 * - Pure: reads the result, never mutates it
 * - Each check returns pass/fail with evidence
 * - Composable: run individual checks or all at once
 */

import type { ScenarioResult } from "@brickplan/scenario";
import type { Instrument, ParamValue } from "@brickplan/types";
import { comparePeriods, formatPeriod } from "@brickplan/types";
import type { CheckResult } from "./types.js";

function fmt(value: number): string {
  return value.toFixed(2);
}

function numberParam(value: ParamValue | undefined): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function result(check: string, violations: string[]): CheckResult {
  return { check, holds: violations.length === 0, violations };
}

function executed(run: ScenarioResult, family: Instrument["family"]): Instrument[] {
  return run.meta.executionOrder.flatMap((id) => {
    const instrument = run.instruments[id];
    return instrument !== undefined && instrument.family === family ? [instrument] : [];
  });
}

// =============================================================================
// Identities
// =============================================================================

/**
 * Journal equity is rounded per instrument, so the allowance is the
 * tolerance once per executed instrument.
 */
export function checkEquityIdentity(run: ScenarioResult, tolerance: number): CheckResult {
  const { totals } = run;
  const allowed = tolerance * Math.max(1, run.meta.executionOrder.length);
  const violations: string[] = [];
  totals.index.periods().forEach((p, t) => {
    const expected = totals.assets.at(t) - totals.liabilities.at(t);
    const equity = totals.equity.at(t);
    if (Math.abs(equity - expected) > allowed) {
      violations.push(`${formatPeriod(p)}: equity ${fmt(equity)} ≠ assets − liabilities ${fmt(expected)}`);
    }
  });
  return result("equity_identity", violations);
}

export function checkNetCashFlow(run: ScenarioResult, tolerance: number): CheckResult {
  const { totals } = run;
  const violations: string[] = [];
  totals.index.periods().forEach((p, t) => {
    const expected = totals.cashIn.at(t) - totals.cashOut.at(t);
    const net = totals.netCashFlow.at(t);
    if (Math.abs(net - expected) > tolerance) {
      violations.push(`${formatPeriod(p)}: net cash flow ${fmt(net)} ≠ in − out ${fmt(expected)}`);
    }
  });
  return result("net_cash_flow", violations);
}

// =============================================================================
// Instrument Behaviour
// =============================================================================

/**
 * After its first active month a liability may only shrink.
 */
export function checkLiabilityNonIncrease(run: ScenarioResult, tolerance: number): CheckResult {
  const violations: string[] = [];
  const { index } = run.meta;

  for (const liability of executed(run, "liability")) {
    const window = run.windows[liability.id];
    const debt = run.outputs[liability.id]?.debtBalance;
    if (window === undefined || debt === undefined || !window.active) continue;

    for (let t = window.startIndex + 1; t < index.length; t++) {
      const increase = debt.at(t) - debt.at(t - 1);
      if (increase > tolerance) {
        violations.push(`${liability.id}: debt grows by ${fmt(increase)} in ${formatPeriod(index.at(t))}`);
      }
    }
  }
  return result("liability_non_increase", violations);
}

/**
 * The cash balance must respect `overdraftLimit` (balance ≥ −limit) and
 * `minBuffer` (balance ≥ buffer) where the cash account sets them.
 */
export function checkLiquidity(run: ScenarioResult, tolerance: number): CheckResult {
  const violations: string[] = [];
  const cashId = run.meta.cashInstrumentId;
  const params = run.instruments[cashId]?.params ?? {};
  const window = run.windows[cashId];
  const balance = run.outputs[cashId]?.assetValue;
  const overdraftLimit = numberParam(params.overdraftLimit);
  const minBuffer = numberParam(params.minBuffer);

  if (window !== undefined && balance !== undefined && window.active) {
    for (let t = window.startIndex; t <= window.endIndex; t++) {
      const value = balance.at(t);
      const period = formatPeriod(run.meta.index.at(t));
      if (overdraftLimit !== undefined && value < -overdraftLimit - tolerance) {
        violations.push(`${cashId}: balance ${fmt(value)} in ${period} exceeds overdraft limit ${fmt(overdraftLimit)}`);
      }
      if (minBuffer !== undefined && value < minBuffer - tolerance) {
        violations.push(`${cashId}: balance ${fmt(value)} in ${period} below minimum buffer ${fmt(minBuffer)}`);
      }
    }
  }
  return result("liquidity", violations);
}

export function checkUnits(run: ScenarioResult, tolerance: number): CheckResult {
  const violations: string[] = [];
  for (const id of run.meta.executionOrder) {
    const units = run.outputs[id]?.units;
    if (units === undefined) continue;
    units.values().forEach((value, t) => {
      if (value < -tolerance) {
        violations.push(`${id}: ${String(value)} units in ${formatPeriod(run.meta.index.at(t))}`);
      }
    });
  }
  return result("non_negative_units", violations);
}

/**
 * A liability with `balloonPolicy: "payoff"` whose window ends inside
 * the horizon must be fully repaid in its last month, and that month's
 * outflow must cover the balance carried into it.
 */
export function checkBalloonPayoff(run: ScenarioResult, tolerance: number): CheckResult {
  const violations: string[] = [];
  const { index } = run.meta;
  const scenarioEnd = index.end;

  for (const liability of executed(run, "liability")) {
    if (liability.params.balloonPolicy !== "payoff") continue;
    const window = run.windows[liability.id];
    const output = run.outputs[liability.id];
    if (window === undefined || output === undefined || !window.active || scenarioEnd === undefined) continue;
    if (comparePeriods(window.end, scenarioEnd) > 0) continue;

    const t = window.endIndex;
    const period = formatPeriod(index.at(t));
    const remaining = output.debtBalance.at(t);
    if (remaining > tolerance) {
      violations.push(`${liability.id}: ${fmt(remaining)} still owed at window end ${period}`);
    }
    if (t > window.startIndex) {
      const carried = output.debtBalance.at(t - 1);
      const paid = output.cashOut.at(t);
      if (carried > tolerance && paid < carried - tolerance) {
        violations.push(`${liability.id}: payoff ${fmt(paid)} in ${period} does not cover balance ${fmt(carried)}`);
      }
    }
  }
  return result("balloon_payoff", violations);
}

/**
 * Income with a non-negative `annualStepPct` never falls while active.
 */
export function checkIncomeEscalation(run: ScenarioResult, tolerance: number): CheckResult {
  const violations: string[] = [];
  const { index } = run.meta;

  for (const flow of executed(run, "flow")) {
    const step = numberParam(flow.params.annualStepPct);
    const window = run.windows[flow.id];
    const cashIn = run.outputs[flow.id]?.cashIn;
    if (step === undefined || step < 0 || window === undefined || cashIn === undefined || !window.active) continue;

    for (let t = window.startIndex + 1; t <= window.endIndex; t++) {
      const drop = cashIn.at(t - 1) - cashIn.at(t);
      if (drop > tolerance) {
        violations.push(`${flow.id}: income falls by ${fmt(drop)} in ${formatPeriod(index.at(t))}`);
      }
    }
  }
  return result("income_escalation", violations);
}

/**
 * Once a window has ended, the instrument's stocks may only change by
 * what its last active month moved in cash (a disposal). The two move
 * against each other: Δ(asset − debt) + (cashIn − cashOut) = 0, so a
 * sale that lowers the asset must bring the same amount in, and a payoff
 * that lowers the debt must take the same amount out.
 */
export function checkWindowEndIdentity(run: ScenarioResult, tolerance: number): CheckResult {
  const violations: string[] = [];
  const { index } = run.meta;

  for (const id of run.meta.executionOrder) {
    const instrument = run.instruments[id];
    const window = run.windows[id];
    const output = run.outputs[id];
    if (instrument === undefined || window === undefined || output === undefined) continue;
    if (instrument.family !== "asset" && instrument.family !== "liability") continue;
    if (!window.endsInHorizon) continue;

    const t = window.endIndex;
    const net = (i: number): number => output.assetValue.at(i) - output.debtBalance.at(i);
    const delta = net(t + 1) - net(t);
    if (Math.abs(delta) <= tolerance) continue;

    const flow = output.cashIn.at(t) - output.cashOut.at(t);
    if (Math.abs(delta + flow) > tolerance) {
      violations.push(
        `${id}: stocks move by ${fmt(delta)} after window end ${formatPeriod(index.at(t))} ` +
          `without matching cash (${fmt(flow)})`,
      );
    }
  }
  return result("window_end_identity", violations);
}

export const RUN_CHECKS: readonly ((run: ScenarioResult, tolerance: number) => CheckResult)[] = [
  checkEquityIdentity,
  checkNetCashFlow,
  checkLiabilityNonIncrease,
  checkLiquidity,
  checkUnits,
  checkBalloonPayoff,
  checkIncomeEscalation,
  checkWindowEndIdentity,
];

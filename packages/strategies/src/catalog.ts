/**
 * Default strategy catalog.
 */

import { StrategyCatalog } from "@brickplan/scenario";
import { cashAccount } from "./cash.js";
import { fixedExpense, fixedIncome } from "./fixed-flow.js";
import { annuityLoan } from "./loan-annuity.js";
import { property } from "./property.js";

/**
 * Register the reference strategies on an existing catalog.
 */
export function registerDefaultStrategies(catalog: StrategyCatalog): StrategyCatalog {
  return catalog
    .register("asset", "a.cash", cashAccount, { role: "cash" })
    .register("asset", "a.property", property)
    .register("liability", "l.loan.annuity", annuityLoan)
    .register("flow", "f.income.fixed", fixedIncome)
    .register("flow", "f.expense.fixed", fixedExpense);
}

export function createDefaultCatalog(): StrategyCatalog {
  return registerDefaultStrategies(new StrategyCatalog());
}

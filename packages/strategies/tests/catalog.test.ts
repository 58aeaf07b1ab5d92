import { StrategyCatalog } from "@brickplan/scenario";
import { describe, expect, it } from "vitest";
import { createDefaultCatalog, registerDefaultStrategies } from "../src/catalog.js";
import { cashAccount } from "../src/cash.js";

describe("default catalog", () => {
  it("registers the reference kinds", () => {
    const catalog = createDefaultCatalog();
    expect(catalog.kinds()).toEqual(["a.cash", "a.property", "f.expense.fixed", "f.income.fixed", "l.loan.annuity"]);
    expect(catalog.kinds("liability")).toEqual(["l.loan.annuity"]);
  });

  it("marks a.cash as the cash account", () => {
    const catalog = createDefaultCatalog();
    expect(catalog.isCashKind("asset", "a.cash")).toBe(true);
    expect(catalog.isCashKind("asset", "a.property")).toBe(false);
  });

  it("extends a caller's catalog", () => {
    const catalog = registerDefaultStrategies(new StrategyCatalog().register("flow", "f.custom", cashAccount));
    expect(catalog.has("flow", "f.custom")).toBe(true);
    expect(catalog.has("asset", "a.property")).toBe(true);
  });

  it("refuses to register the defaults twice", () => {
    expect(() => registerDefaultStrategies(createDefaultCatalog())).toThrow(
      'Strategy for asset kind "a.cash" is already registered',
    );
  });
});

import { describe, expect, it } from "vitest";
import { StrategyCatalog } from "../src/catalog.js";
import { ConfigError } from "../src/errors.js";
import { cashStrategy, holdStrategy, instrument } from "./helpers.js";

describe("StrategyCatalog", () => {
  const catalog = new StrategyCatalog()
    .register("asset", "a.cash", cashStrategy, { role: "cash" })
    .register("asset", "a.hold", holdStrategy)
    .register("liability", "a.hold", holdStrategy);

  it("resolves per family", () => {
    expect(catalog.resolve(instrument("x", "asset", "a.hold"))).toBe(holdStrategy);
    expect(catalog.has("liability", "a.hold")).toBe(true);
    expect(catalog.has("flow", "a.hold")).toBe(false);
  });

  it("knows which kinds are cash accounts", () => {
    expect(catalog.isCashKind("asset", "a.cash")).toBe(true);
    expect(catalog.isCashKind("asset", "a.hold")).toBe(false);
  });

  it("lists kinds", () => {
    expect(catalog.kinds("asset")).toEqual(["a.cash", "a.hold"]);
    expect(catalog.kinds()).toEqual(["a.cash", "a.hold", "a.hold"]);
    expect(catalog.kinds("transfer")).toEqual([]);
  });

  it("rejects duplicates and unknown kinds", () => {
    expect(() => catalog.register("asset", "a.cash", holdStrategy)).toThrow(ConfigError);
    expect(() => catalog.resolve(instrument("y", "flow", "f.salary"))).toThrow(
      'No flow strategy registered for kind "f.salary" (instrument "y")',
    );
  });
});

import type { Instrument } from "@brickplan/types";
import { describe, expect, it } from "vitest";
import { ConfigError } from "../src/errors.js";
import { cloneInstruments, resolveLinks } from "../src/links.js";
import { TimeIndex } from "../src/time-series.js";
import { resolveWindow } from "../src/window.js";
import { capturingLogger, instrument } from "./helpers.js";

const index = TimeIndex.fromStart("2026-01", 12);

describe("resolveWindow", () => {
  it("defaults to the whole horizon", () => {
    expect(resolveWindow("x", undefined, index)).toEqual({
      start: { year: 2026, month: 1 },
      end: { year: 2026, month: 12 },
      startIndex: 0,
      endIndex: 11,
      active: true,
      endsInHorizon: false,
    });
  });

  it("counts the start month in durationMonths", () => {
    const window = resolveWindow("x", { start: "2026-04", durationMonths: 3 }, index);
    expect(window.end).toEqual({ year: 2026, month: 6 });
    expect([window.startIndex, window.endIndex, window.endsInHorizon]).toEqual([3, 5, true]);
  });

  it("clamps a start before the horizon", () => {
    const window = resolveWindow("x", { start: "2025-10", end: "2026-02" }, index);
    expect([window.startIndex, window.endIndex, window.active]).toEqual([0, 1, true]);
  });

  it("marks windows outside the horizon inactive", () => {
    expect(resolveWindow("x", { start: "2027-03" }, index)).toMatchObject({
      start: { year: 2027, month: 3 },
      end: { year: 2027, month: 3 },
      startIndex: 14,
      active: false,
    });
    expect(resolveWindow("x", { start: "2024-01", end: "2025-06" }, index).active).toBe(false);
  });

  it("prefers end over duration and says so", () => {
    const { logger, records } = capturingLogger();
    const window = resolveWindow("x", { end: "2026-06", durationMonths: 2 }, index, logger);
    expect(window.end).toEqual({ year: 2026, month: 6 });
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ level: 40, instrumentId: "x", end: "2026-06", durationMonths: 2 });
  });

  it("rejects invalid windows", () => {
    expect(() => resolveWindow("x", { durationMonths: 0 }, index)).toThrow(ConfigError);
    expect(() => resolveWindow("x", { durationMonths: 1.5 }, index)).toThrow(ConfigError);
    expect(() => resolveWindow("x", { start: "2026-05", end: "2026-03" }, index)).toThrow(
      'Instrument "x" window ends (2026-03) before it starts (2026-05)',
    );
    expect(() => resolveWindow("x", { start: "soon" }, index)).toThrow(
      expect.objectContaining({ code: "INVALID_WINDOW", instrumentId: "x" }),
    );
  });
});

describe("resolveLinks", () => {
  const first = instrument("first", "flow", "f.expense", {}, { window: { end: "2026-03" } });
  const follow = (offsetMonths?: number, extra: Pick<Instrument, "window"> = {}): Instrument =>
    instrument(
      "follow",
      "flow",
      "f.expense",
      {},
      {
        links: { start: offsetMonths === undefined ? { onEndOf: "first" } : { onEndOf: "first", offsetMonths } },
        ...extra,
      },
    );

  it("starts in the last month of the referenced instrument by default", () => {
    const resolved = resolveLinks(cloneInstruments([first, follow()]), index);
    expect(resolved.get("follow")?.window?.start).toEqual({ year: 2026, month: 3 });
  });

  it("applies the offset", () => {
    const resolved = resolveLinks(cloneInstruments([first, follow(1)]), index);
    expect(resolved.get("follow")?.window?.start).toEqual({ year: 2026, month: 4 });
  });

  it("follows chains of links", () => {
    const middle = follow(1, { window: { durationMonths: 2 } });
    const last = instrument("last", "flow", "f.expense", {}, { links: { start: { onEndOf: "follow" } } });
    const resolved = resolveLinks(cloneInstruments([last, middle, first]), index);
    expect(resolved.get("follow")?.window).toEqual({ durationMonths: 2, start: { year: 2026, month: 4 } });
    expect(resolved.get("last")?.window?.start).toEqual({ year: 2026, month: 5 });
  });

  it("does not touch its input", () => {
    const working = cloneInstruments([first, follow()]);
    resolveLinks(working, index);
    expect(working.get("follow")?.window).toBeUndefined();
  });

  it("accepts an explicit start that agrees and rejects one that does not", () => {
    expect(() => resolveLinks(cloneInstruments([first, follow(1, { window: { start: "2026-04" } })]), index)).not.toThrow();
    expect(() => resolveLinks(cloneInstruments([first, follow(1, { window: { start: "2026-01" } })]), index)).toThrow(
      expect.objectContaining({ code: "LINK_CONFLICT", instrumentId: "follow" }),
    );
  });

  it("rejects unknown references", () => {
    expect(() => resolveLinks(cloneInstruments([follow()]), index)).toThrow(
      'Instrument "follow" links start.onEndOf to unknown instrument "first"',
    );
    const loan = instrument("loan", "liability", "l.borrow", {}, { links: { principal: { fromProperty: "house" } } });
    expect(() => resolveLinks(cloneInstruments([loan]), index)).toThrow(
      expect.objectContaining({ code: "UNKNOWN_ID" }),
    );
  });

  it("rejects start-link cycles", () => {
    const a = instrument("a", "flow", "f.expense", {}, { links: { start: { onEndOf: "b" } } });
    const b = instrument("b", "flow", "f.expense", {}, { links: { start: { onEndOf: "a" } } });
    expect(() => resolveLinks(cloneInstruments([a, b]), index)).toThrow("Start links form a cycle: a -> b -> a");
  });

  it("clones deeply", () => {
    const original = instrument("x", "asset", "a.hold", { nested: { value: 1 } });
    const clone = cloneInstruments([original]).get("x");
    expect(clone).toEqual(original);
    expect(clone).not.toBe(original);
    expect(clone?.params.nested).not.toBe(original.params.nested);
  });
});

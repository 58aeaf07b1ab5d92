/**
 * Tests for the Registry.
 *
 * Covers:
 * - Lookups and flattened membership
 * - Two-set DFS: cycles vs diamonds
 * - Structural report (errors, warnings, exit codes)
 * - Disjointness checks
 */

import { describe, it, expect } from "vitest";
import type { Instrument, MacroBrick } from "@brickplan/types";
import { Registry } from "../src/registry.js";
import { RegistryError } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

function inst(id: string): Instrument {
  return { id, name: id, kind: "a.cash", family: "asset", params: {} };
}

function mb(id: string, members: string[]): MacroBrick {
  return { id, name: id, members };
}

function instruments(...ids: string[]): Map<string, Instrument> {
  return new Map(ids.map((id) => [id, inst(id)]));
}

function macroBricks(...list: MacroBrick[]): Map<string, MacroBrick> {
  return new Map(list.map((m) => [m.id, m]));
}

function buildError(fn: () => unknown): RegistryError {
  try {
    fn();
  } catch (e) {
    if (e instanceof RegistryError) return e;
    throw e;
  }
  throw new Error("expected a RegistryError");
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("Registry", () => {
  describe("lookups", () => {
    const registry = new Registry(
      instruments("cash", "house", "loan"),
      macroBricks(mb("home", ["house", "loan"])),
    );

    it("classifies ids", () => {
      expect(registry.isInstrument("cash")).toBe(true);
      expect(registry.isMacroBrick("home")).toBe(true);
      expect(registry.isInstrument("home")).toBe(false);
      expect(registry.size).toBe(4);
    });

    it("returns definitions", () => {
      expect(registry.getInstrument("house").id).toBe("house");
      expect(registry.getMacroBrick("home").members).toEqual(["house", "loan"]);
      expect(registry.instrumentIds()).toEqual(["cash", "house", "loan"]);
      expect(registry.macroBrickIds()).toEqual(["home"]);
    });

    it("throws NOT_FOUND for unknown ids", () => {
      expect(buildError(() => registry.getInstrument("nope")).code).toBe("NOT_FOUND");
      expect(buildError(() => registry.getMacroBrick("nope")).code).toBe("NOT_FOUND");
      expect(buildError(() => registry.getFlatMembers("nope")).code).toBe("NOT_FOUND");
    });

    it("does not alias the input maps", () => {
      const input = instruments("a");
      const r = new Registry(input);
      input.set("b", inst("b"));
      expect(r.isInstrument("b")).toBe(false);
    });
  });

  describe("expandMemberBricks", () => {
    it("flattens nested MacroBricks in first-seen order", () => {
      const registry = new Registry(
        instruments("a", "b", "c", "d"),
        macroBricks(mb("inner", ["c", "b"]), mb("outer", ["a", "inner", "d"])),
      );
      expect(registry.expandMemberBricks("outer")).toEqual(["a", "c", "b", "d"]);
      expect(registry.getFlatMembers("inner")).toEqual(["c", "b"]);
    });

    it("treats diamonds as legal and deduplicates", () => {
      const registry = new Registry(
        instruments("x", "y"),
        macroBricks(
          mb("left", ["x"]),
          mb("right", ["x", "y"]),
          mb("top", ["left", "right"]),
        ),
      );
      expect(registry.expandMemberBricks("top")).toEqual(["x", "y"]);
    });

    it("serves the cache", () => {
      const registry = new Registry(instruments("a"), macroBricks(mb("g", ["a"])));
      expect(registry.expandMemberBricks("g")).toBe(registry.getFlatMembers("g"));
    });
  });

  describe("construction failures", () => {
    it("rejects a 2-cycle", () => {
      const err = buildError(
        () => new Registry(instruments("a"), macroBricks(mb("A", ["B"]), mb("B", ["A"]))),
      );
      expect(err.code).toBe("INVALID_STRUCTURE");
      expect(err.report?.cycles).toEqual([["A", "B"]]);
      expect(err.report?.exitCode).toBe(1);
    });

    it("rejects a self-cycle", () => {
      const err = buildError(() => new Registry(instruments("a"), macroBricks(mb("loop", ["a", "loop"]))));
      expect(err.report?.cycles).toEqual([["loop"]]);
    });

    it("names the cycle path in the message", () => {
      const err = buildError(
        () => new Registry(new Map(), macroBricks(mb("A", ["B"]), mb("B", ["C"]), mb("C", ["A"]))),
      );
      expect(err.report?.cycles).toEqual([["A", "B", "C"]]);
      expect(err.message).toContain("Cycle: A -> B -> C -> A");
    });

    it("reports unknown members", () => {
      const err = buildError(
        () => new Registry(instruments("a"), macroBricks(mb("g", ["a", "ghost"]), mb("h", ["ghost"]))),
      );
      expect(err.report?.unknownIds).toEqual(["ghost"]);
    });

    it("keeps collecting after the first problem in a MacroBrick", () => {
      const err = buildError(
        () => new Registry(instruments("a"), macroBricks(mb("g", ["ghost", "a", "phantom", "g"]))),
      );
      expect(err.report?.unknownIds).toEqual(["ghost", "phantom"]);
      expect(err.report?.cycles).toEqual([["g"]]);
      expect(err.report?.emptyMacroBricks).toEqual([]);
    });

    it("does not call a MacroBrick of unknown members empty", () => {
      const err = buildError(() => new Registry(instruments("a"), macroBricks(mb("g", ["ghost"]))));
      expect(err.report?.unknownIds).toEqual(["ghost"]);
      expect(err.report?.emptyMacroBricks).toEqual([]);
    });

    it("reports id conflicts and reserved prefixes", () => {
      const err = buildError(
        () => new Registry(instruments("same", "b:cash"), macroBricks(mb("same", []), mb("mb:x", []))),
      );
      expect(err.report?.idConflicts).toEqual([
        'Instrument id "b:cash" uses reserved prefix "b:"',
        'MacroBrick id "mb:x" uses reserved prefix "mb:"',
        '"same" is both an instrument and a MacroBrick',
      ]);
    });
  });

  describe("validate", () => {
    it("is clean for a plain registry", () => {
      const report = new Registry(instruments("a"), macroBricks(mb("g", ["a"]))).validate();
      expect(report).toMatchObject({ hasErrors: false, hasWarnings: false, isValid: true, exitCode: 0 });
    });

    it("warns on empty MacroBricks and overlaps", () => {
      const registry = new Registry(
        instruments("a", "b"),
        macroBricks(mb("g1", ["a", "b"]), mb("g2", ["a"]), mb("empty", [])),
      );
      const report = registry.validate();
      expect(report.emptyMacroBricks).toEqual(["empty"]);
      expect(report.overlapsGlobal).toEqual({ a: ["g1", "g2"] });
      expect(report.isValid).toBe(true);
      expect(report.hasWarnings).toBe(true);
      expect(report.exitCode).toBe(2);
      expect(registry.overlaps()).toEqual({ a: ["g1", "g2"] });
      expect(registry.owners("a")).toEqual(["g1", "g2"]);
      expect(registry.owners("b")).toEqual(["g1"]);
      expect(registry.owners("zzz")).toEqual([]);
    });

    it("counts nesting as ownership", () => {
      const registry = new Registry(instruments("a"), macroBricks(mb("inner", ["a"]), mb("outer", ["inner"])));
      expect(registry.overlaps()).toEqual({ a: ["inner", "outer"] });
    });
  });

  describe("disjointness", () => {
    const registry = new Registry(
      instruments("a", "b", "c"),
      macroBricks(mb("g1", ["a", "b"]), mb("g2", ["b", "c"]), mb("g3", ["c"])),
    );

    it("reports shared instruments per pair", () => {
      expect(registry.checkDisjoint(["g1", "g2", "g3"])).toEqual({
        isDisjoint: false,
        conflicts: [
          { first: "g1", second: "g2", sharedInstruments: ["b"] },
          { first: "g2", second: "g3", sharedInstruments: ["c"] },
        ],
      });
      expect(registry.checkDisjoint(["g1", "g3"]).isDisjoint).toBe(true);
    });

    it("assertDisjoint throws NOT_DISJOINT", () => {
      const err = buildError(() => registry.assertDisjoint("budget", ["g1", "g2"]));
      expect(err.code).toBe("NOT_DISJOINT");
      expect(err.message).toBe('budget: MacroBricks are not disjoint: "g1" and "g2" share b');
      expect(() => registry.assertDisjoint("budget", ["g1", "g3"])).not.toThrow();
    });
  });
});

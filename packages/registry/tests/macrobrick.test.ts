import { describe, it, expect } from "vitest";
import { createMacroBrick, slugifyName } from "../src/macrobrick.js";
import { RegistryError } from "../src/types.js";

describe("slugifyName", () => {
  it("lowercases and joins words with dashes", () => {
    expect(slugifyName("Rental Portfolio")).toBe("rental-portfolio");
    expect(slugifyName("  Home & Garden (2026) ")).toBe("home-garden-2026");
  });

  it("strips accents", () => {
    expect(slugifyName("Café Über")).toBe("cafe-uber");
  });
});

describe("createMacroBrick", () => {
  it("keeps an explicit id", () => {
    expect(createMacroBrick({ id: "home", name: "My Home", members: ["house"] })).toEqual({
      id: "home",
      name: "My Home",
      members: ["house"],
      tags: [],
    });
  });

  it("derives the id from the name", () => {
    expect(createMacroBrick({ name: "Rental Portfolio" }).id).toBe("rental-portfolio");
  });

  it("rejects names without usable characters", () => {
    expect(() => createMacroBrick({ name: "!!!" })).toThrow(RegistryError);
  });
});

/**
 * @brickplan/registry — MacroBrick construction.
 *
 * A MacroBrick may be declared without an id; it is then derived from
 * its name ("Rental Portfolio" → "rental-portfolio").
 */

import type { MacroBrick } from "@brickplan/types";
import { RegistryError } from "./types.js";

export interface MacroBrickInput {
  readonly id?: string | undefined;
  readonly name: string;
  readonly members?: readonly string[] | undefined;
  readonly tags?: readonly string[] | undefined;
}

export function slugifyName(name: string): string {
  return name
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function createMacroBrick(input: MacroBrickInput): MacroBrick {
  let id = input.id ?? "";
  if (id === "") {
    id = slugifyName(input.name);
    if (id === "") {
      throw new RegistryError(
        "INVALID_ID",
        `MacroBrick name "${input.name}" cannot be turned into an id`,
      );
    }
  }

  return {
    id,
    name: input.name,
    members: [...(input.members ?? [])],
    tags: [...(input.tags ?? [])],
  };
}

/**
 * @brickplan/ledger — Deterministic entry ids.
 *
 * id = sha256(canonicalize({ instrumentId, period, params, links, sequence }))[0..16]
 *
 * Canonical JSON (RFC 8785) sorts keys, so parameter and link order never
 * changes the id. Re-simulating an unchanged scenario reproduces the
 * same ids, and the journal rejects a second post of any of them.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { formatPeriod, toPeriod } from "@brickplan/types";
import type { InstrumentLinks, Params } from "@brickplan/types";
import type { EntryIdInput } from "./types.js";

export const ENTRY_ID_LENGTH = 16;

function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Links with absent fields removed, so `{ nominal: undefined }` and `{}`
 * hash the same.
 */
function compactLinks(links: InstrumentLinks | undefined): Record<string, Record<string, string | number>> {
  const out: Record<string, Record<string, string | number>> = {};
  if (links?.principal !== undefined) {
    const { fromProperty, remainingOf, nominal } = links.principal;
    const principal: Record<string, string | number> = {};
    if (fromProperty !== undefined) principal.fromProperty = fromProperty;
    if (remainingOf !== undefined) principal.remainingOf = remainingOf;
    if (nominal !== undefined) principal.nominal = nominal;
    out.principal = principal;
  }
  if (links?.start !== undefined) {
    const start: Record<string, string | number> = { onEndOf: links.start.onEndOf };
    if (links.start.offsetMonths !== undefined) start.offsetMonths = links.start.offsetMonths;
    out.start = start;
  }
  return out;
}

export function generateEntryId(input: EntryIdInput): string {
  const params: Params = input.params ?? {};
  const canonical = canonicalize({
    instrumentId: input.instrumentId,
    period: formatPeriod(toPeriod(input.period)),
    params,
    links: compactLinks(input.links),
    sequence: input.sequence,
  });
  return sha256(canonical).slice(0, ENTRY_ID_LENGTH);
}

import type { RankedEntry } from "./types.ts";

function decksLabel(entry: RankedEntry): string {
  return entry.result.status === "ok" ? String(entry.result.decks) : "?";
}

/**
 * Console report: a heading, a summary line, then one row per entry.
 * Failed lookups show as "?" and carry their error when `includeErrors` is set.
 */
export function formatReport(
  entries: readonly RankedEntry[],
  bottomK: number,
  includeErrors: boolean,
): string[] {
  const lines = ["=== Least-popular commanders on EDHREC (as-commander) ==="];

  const last = entries[entries.length - 1];
  if (!last) {
    lines.push("No commanders matched.");
    return lines;
  }

  const cutoff = last.result.status === "ok" ? last.result.decks : 0;
  lines.push(`(Bottom ${bottomK}; cutoff ≈ ${cutoff} decks; filters active)`, "");

  const rankWidth = String(last.rank).length;
  for (const entry of entries) {
    const { card, result } = entry;
    let line =
      `${String(entry.rank).padStart(rankWidth)}. ${decksLabel(entry).padStart(6)}  ` +
      `${card.name} [${card.setCode.toUpperCase()}]  ${result.url}`;
    if (includeErrors && result.status === "error") {
      line += `  ERROR: ${result.error}`;
    }
    lines.push(line);
  }

  return lines;
}

import { writeFile } from "node:fs/promises";
import type { RankedEntry } from "./types.ts";

export const CSV_HEADER = [
  "rank",
  "name",
  "decks",
  "set",
  "color_identity",
  "released_at",
  "edhrec_url",
  "error",
] as const;

/**
 * Quote a field when it holds a comma, quote, or line break.
 * Embedded quotes are doubled (e.g. "Ezuri, Renegade Leader").
 */
export function escapeField(value: string): string {
  if (!/[",\r\n]/.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

function formatLine(fields: readonly string[]): string {
  return fields.map(escapeField).join(",");
}

export function entryToFields({ rank, card, result }: RankedEntry): string[] {
  return [
    String(rank),
    card.name,
    result.status === "ok" ? String(result.decks) : "?",
    card.setCode,
    card.colorIdentity.join(""),
    card.releasedAt,
    result.url,
    result.status === "error" ? result.error : "",
  ];
}

/**
 * Render ranked entries as CSV with a header row. Lines end in LF and the
 * file ends with a newline.
 */
export function formatResultsCSV(entries: readonly RankedEntry[]): string {
  const lines = [formatLine(CSV_HEADER), ...entries.map((entry) => formatLine(entryToFields(entry)))];
  return lines.join("\n") + "\n";
}

export async function writeResultsCSV(path: string, entries: readonly RankedEntry[]): Promise<void> {
  await writeFile(path, formatResultsCSV(entries), "utf-8");
}

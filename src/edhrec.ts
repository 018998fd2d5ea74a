import type { CardRecord, DeckCount } from "./types.ts";

const USER_AGENT = "commander-deepcuts/1.0.0";
const REQUEST_TIMEOUT_MS = 30_000;

const DECKS_RE = /(\d[\d,]*)\s+decks/i;

/** Link to a card's EDHREC page when Scryfall doesn't provide one. */
export function edhrecRouteUrl(name: string): string {
  return `https://edhrec.com/route/?cc=${encodeURIComponent(name).replace(/%20/g, "+")}`;
}

/**
 * Pull the as-commander deck count out of an EDHREC commander page,
 * e.g. "1,234 decks" -> 1234. Returns null when the page has no count.
 */
export function extractDeckCount(html: string): number | null {
  const match = DECKS_RE.exec(html);
  if (!match?.[1]) return null;
  return parseInt(match[1].replace(/,/g, ""), 10);
}

/**
 * Fetch a card's EDHREC page and read its deck count.
 * Throws on any network error, non-2xx status, or a page without a count.
 */
export async function fetchDeckCount(card: CardRecord): Promise<DeckCount> {
  const response = await fetch(card.edhrecUrl, {
    headers: { "User-Agent": USER_AGENT },
    redirect: "follow",
    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
  });

  if (!response.ok) {
    throw new Error(`EDHREC error: ${response.status}`);
  }

  const url = response.url || card.edhrecUrl;
  const decks = extractDeckCount(await response.text());
  if (decks === null) {
    throw new Error(`No deck count found at ${url}`);
  }

  return { decks, url };
}

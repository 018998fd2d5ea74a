import { setTimeout as sleep } from "node:timers/promises";
import { edhrecRouteUrl } from "./edhrec.ts";
import { detectAbilityTags, isTimeLordDoctor } from "./filters.ts";
import type { CardRecord } from "./types.ts";

const SCRYFALL_API = "https://api.scryfall.com";
const USER_AGENT = "commander-deepcuts/1.0.0";
const MIN_REQUEST_INTERVAL_MS = 100;
const RETRY_DELAY_MS = 1000;

export const COMMANDER_QUERY = "t:legendary type:creature legal:commander game:paper";

// Module-level throttle state
let lastRequestTime = 0;

function requestInit(): RequestInit {
  return {
    headers: {
      "User-Agent": USER_AGENT,
      Accept: "application/json",
    },
  };
}

/**
 * Claim the next request slot, at least `minWaitMs` from now and
 * MIN_REQUEST_INTERVAL_MS after the last claimed slot, then wait for it.
 * The slot is taken before sleeping so concurrent callers queue up behind it.
 */
async function waitForSlot(minWaitMs = 0): Promise<void> {
  const now = Date.now();
  const startAt = Math.max(now + minWaitMs, lastRequestTime + MIN_REQUEST_INTERVAL_MS);
  lastRequestTime = startAt;
  if (startAt > now) {
    await sleep(startAt - now);
  }
}

/**
 * Fetch a URL with rate limiting and proper headers per Scryfall's usage policy.
 * Retries once on 429 (rate limit) after a 1-second backoff.
 */
async function throttledFetch(url: string): Promise<Response> {
  await waitForSlot();
  const response = await fetch(url, requestInit());

  // Retry once on rate limit
  if (response.status === 429) {
    await waitForSlot(RETRY_DELAY_MS);
    return fetch(url, requestInit());
  }

  return response;
}

/**
 * Parse a Scryfall error response into a readable message.
 */
async function handleScryfallError(response: Response): Promise<never> {
  let message = `Scryfall API error: ${response.status}`;
  try {
    const body: unknown = await response.json();
    if (isRecord(body) && typeof body.details === "string" && body.details) {
      message = `Scryfall: ${body.details}`;
    }
  } catch {
    // Body wasn't JSON; keep the status code message
  }
  throw new Error(message);
}

// -- Response conversion --

type RawCard = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(raw: RawCard, key: string): string {
  const value = raw[key];
  return typeof value === "string" ? value : "";
}

function strings(raw: RawCard, key: string): string[] {
  const value = raw[key];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

/**
 * Rules text for a card. Double-faced cards keep theirs on each face, so the
 * faces are joined.
 */
function oracleTextOf(raw: RawCard): string {
  if (typeof raw.oracle_text === "string") return raw.oracle_text;
  const faces = raw.card_faces;
  if (!Array.isArray(faces)) return "";
  return faces
    .filter(isRecord)
    .map((face) => str(face, "oracle_text"))
    .filter((text) => text.length > 0)
    .join("\n");
}

/**
 * Convert a raw Scryfall card JSON object into a CardRecord. Exported for testing.
 */
export function toCardRecord(raw: RawCard): CardRecord {
  const name = str(raw, "name");
  const typeLine = str(raw, "type_line");
  const setName = str(raw, "set_name");
  const oracleText = oracleTextOf(raw);
  const keywords = strings(raw, "keywords");
  const related: RawCard = isRecord(raw.related_uris) ? raw.related_uris : {};
  const printsSearchUri = str(raw, "prints_search_uri");

  return {
    id: str(raw, "id"),
    oracleId: str(raw, "oracle_id"),
    name,
    typeLine,
    oracleText,
    colorIdentity: strings(raw, "color_identity"),
    rarity: str(raw, "rarity"),
    keywords,
    abilityTags: detectAbilityTags(oracleText, keywords),
    setCode: str(raw, "set"),
    setName,
    setType: str(raw, "set_type"),
    releasedAt: str(raw, "released_at"),
    isTimeLordDoctor: isTimeLordDoctor(typeLine, setName),
    edhrecUrl: str(related, "edhrec") || edhrecRouteUrl(name),
    printsSearchUri: printsSearchUri || undefined,
  };
}

export function isCommanderFace(card: CardRecord): boolean {
  return card.typeLine.includes("Legendary") && card.typeLine.includes("Creature");
}

/**
 * Keep one printing per card (the first seen, which becomes the
 * representative printing) and drop anything that isn't a legendary creature.
 */
export function collapseByOracle(cards: readonly CardRecord[]): CardRecord[] {
  const byOracle = new Map<string, CardRecord>();
  for (const card of cards) {
    if (!isCommanderFace(card)) continue;
    const key = card.oracleId || card.id;
    if (!byOracle.has(key)) byOracle.set(key, card);
  }
  return [...byOracle.values()];
}

// -- API functions --

type ScryfallList = {
  data: RawCard[];
  hasMore: boolean;
  nextPage?: string;
};

async function fetchList(url: string): Promise<ScryfallList> {
  const response = await throttledFetch(url);

  if (!response.ok) {
    await handleScryfallError(response);
  }

  const body: unknown = await response.json();
  if (!isRecord(body) || !Array.isArray(body.data)) {
    throw new Error(`Scryfall: unexpected response from ${url}`);
  }

  const nextPage = typeof body.next_page === "string" ? body.next_page : undefined;
  return {
    data: body.data.filter(isRecord),
    hasMore: body.has_more === true && nextPage !== undefined,
    nextPage,
  };
}

/**
 * Page through a Scryfall search, following `next_page` until the last page.
 */
export async function fetchAllScryfallPages(firstUrl: string): Promise<RawCard[]> {
  const cards: RawCard[] = [];
  let url: string | undefined = firstUrl;

  while (url) {
    const page: ScryfallList = await fetchList(url);
    cards.push(...page.data);
    url = page.hasMore ? page.nextPage : undefined;
  }

  return cards;
}

/**
 * Every commander-eligible card, one representative printing each, sorted by name.
 * Throws if any page of the search fails.
 */
export async function fetchCommanderPool(query = COMMANDER_QUERY): Promise<CardRecord[]> {
  const params = new URLSearchParams({
    q: query,
    unique: "cards",
    order: "name",
    dir: "asc",
    format: "json",
  });

  const raw = await fetchAllScryfallPages(`${SCRYFALL_API}/cards/search?${params}`);
  return collapseByOracle(raw.map(toCardRecord));
}

/**
 * Set codes of every printing of a card, for strict PTK detection.
 * Falls back to the card's own set when Scryfall gave no printings link.
 */
export async function fetchPrintingSets(card: CardRecord): Promise<string[]> {
  if (!card.printsSearchUri) return [card.setCode];
  const printings = await fetchAllScryfallPages(card.printsSearchUri);
  return printings.map((printing) => str(printing, "set"));
}

import { runPool, type PoolOptions } from "./pool.ts";
import type { CardPopularity, CardRecord, DeckCount, PopularityResult } from "./types.ts";

export type PopularityLookup = (card: CardRecord) => Promise<DeckCount>;

export type FetchOptions = PoolOptions & {
  /** Called after each completed lookup with the number done so far. */
  onProgress?: (done: number, total: number) => void;
};

const PROGRESS_INTERVAL = 50;

export function logProgress(done: number, total: number): void {
  if (done % PROGRESS_INTERVAL === 0 || done === total) {
    console.error(`[deepcuts] ...processed ${done}/${total}`);
  }
}

/**
 * Look up the deck count of every card, one request per card.
 *
 * Returns one entry per input card at the same index. A lookup that throws
 * becomes an `error` result for that card alone; nothing is retried and the
 * other lookups carry on.
 */
export async function fetchPopularity(
  cards: readonly CardRecord[],
  lookup: PopularityLookup,
  options: FetchOptions,
): Promise<CardPopularity[]> {
  let done = 0;

  return runPool(
    cards,
    async (card): Promise<CardPopularity> => {
      let result: PopularityResult;
      try {
        const { decks, url } = await lookup(card);
        result = { status: "ok", decks, url };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[deepcuts] Failed to fetch deck count for ${card.name}: ${message}`);
        result = { status: "error", error: message, url: card.edhrecUrl };
      }

      done++;
      options.onProgress?.(done, cards.length);
      return { card, result };
    },
    options,
  );
}

import { applyFilters, describeRejections } from "./filters.ts";
import { fetchPopularity, logProgress, type PopularityLookup } from "./fetcher.ts";
import { rankResults } from "./rank.ts";
import type { CardRecord, Config, RankedEntry } from "./types.ts";

export type PipelineSources = {
  fetchCommanderPool: () => Promise<CardRecord[]>;
  fetchPrintingSets: (card: CardRecord) => Promise<string[]>;
  lookupDeckCount: PopularityLookup;
};

/**
 * Pool -> filters -> deck counts -> ranking. A failure to load the commander
 * pool propagates; per-card lookup failures never do.
 */
export async function findLeastPlayed(
  config: Config,
  sources: PipelineSources,
  now = new Date(),
): Promise<RankedEntry[]> {
  console.error("[deepcuts] Fetching commander pool from Scryfall...");
  const pool = await sources.fetchCommanderPool();
  console.error(`[deepcuts] ${pool.length} commanders in the pool`);

  const { recentDays, includeRecent } = config.filters;
  if (!includeRecent && recentDays > 0) {
    const cutoff = new Date(now.getTime() - recentDays * 24 * 60 * 60 * 1000);
    console.error(
      `[deepcuts] Excluding commanders released after ${cutoff.toISOString().slice(0, 10)} (last ${recentDays} days)`,
    );
  }

  const { admitted, rejected } = await applyFilters(pool, config.filters, {
    now,
    fetchPrintingSets: sources.fetchPrintingSets,
    concurrency: config.concurrency,
    delayMs: config.delayMs,
  });
  console.error(
    `[deepcuts] After filters, ${admitted.length} commanders remain (excluded ${describeRejections(rejected)})`,
  );

  const results = await fetchPopularity(admitted, sources.lookupDeckCount, {
    concurrency: config.concurrency,
    delayMs: config.delayMs,
    onProgress: logProgress,
  });

  return rankResults(results, config);
}

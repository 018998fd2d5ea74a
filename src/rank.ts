import type { CardPopularity, RankedEntry } from "./types.ts";

export type RankOptions = {
  bottomK: number;
  onlyPositive: boolean;
  includeErrors: boolean;
};

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Failed lookups sort below every real count, including 0. */
function sortKey({ result }: CardPopularity): number {
  return result.status === "ok" ? result.decks : -1;
}

/**
 * The `bottomK` least-played commanders, ascending by deck count.
 *
 * Ties go to the lexicographically smaller name (then the smaller card id),
 * so the output doesn't depend on the order results came in.
 */
export function rankResults(
  entries: readonly CardPopularity[],
  { bottomK, onlyPositive, includeErrors }: RankOptions,
): RankedEntry[] {
  const kept = entries.filter(({ result }) => {
    if (result.status === "error") return includeErrors;
    return !(onlyPositive && result.decks === 0);
  });

  kept.sort(
    (a, b) =>
      sortKey(a) - sortKey(b) ||
      compareNames(a.card.name, b.card.name) ||
      compareNames(a.card.id, b.card.id),
  );

  return kept.slice(0, Math.max(0, bottomK)).map((entry, i) => ({ ...entry, rank: i + 1 }));
}

export type AbilityTag = "partner" | "background" | "companion" | "doctors-companion";

/** One commander-eligible card, taken from its representative printing. */
export type CardRecord = {
  id: string;
  oracleId: string;
  name: string;
  typeLine: string;
  oracleText: string;
  colorIdentity: string[];
  rarity: string;
  keywords: string[];
  abilityTags: AbilityTag[];
  setCode: string;
  setName: string;
  setType: string;
  releasedAt: string;
  isTimeLordDoctor: boolean;
  edhrecUrl: string;
  printsSearchUri?: string;
};

/** Include-toggles and thresholds for the eligibility filter. All exclusions are on by default. */
export type FilterConfig = {
  includePartners: boolean;
  includeBackgrounds: boolean;
  includeCompanions: boolean;
  includeDoctorsCompanions: boolean;
  includeFunnySets: boolean;
  includeVanilla: boolean;
  includePtk: boolean;
  ptkStrict: boolean;
  includeDoctors: boolean;
  includeRecent: boolean;
  recentDays: number;
};

export type RejectionReason =
  | "partner"
  | "background"
  | "companion"
  | "doctors-companion"
  | "funny-set"
  | "vanilla"
  | "ptk"
  | "doctor"
  | "recent";

/** What a successful EDHREC lookup yields. */
export type DeckCount = {
  decks: number;
  url: string;
};

/** Deck count for one card, or a failure marker. A failure is never reported as 0 decks. */
export type PopularityResult =
  | { status: "ok"; decks: number; url: string }
  | { status: "error"; error: string; url: string };

export type CardPopularity = {
  card: CardRecord;
  result: PopularityResult;
};

export type RankedEntry = CardPopularity & {
  rank: number;
};

export type Config = {
  filters: FilterConfig;
  bottomK: number;
  concurrency: number;
  delayMs: number;
  csvPath?: string;
  onlyPositive: boolean;
  includeErrors: boolean;
};

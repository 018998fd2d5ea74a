import { runPool } from "./pool.ts";
import type {
  AbilityTag,
  CardRecord,
  FilterConfig,
  RejectionReason,
} from "./types.ts";

export const DEFAULT_FILTERS: FilterConfig = {
  includePartners: false,
  includeBackgrounds: false,
  includeCompanions: false,
  includeDoctorsCompanions: false,
  includeFunnySets: false,
  includeVanilla: false,
  includePtk: false,
  ptkStrict: false,
  includeDoctors: false,
  includeRecent: false,
  recentDays: 90,
};

const DAY_MS = 24 * 60 * 60 * 1000;

// -- Ability detection --

const KEYWORD_TAGS = new Map<string, AbilityTag>([
  ["partner", "partner"],
  ["partner with", "partner"],
  ["friends forever", "partner"],
  ["choose a background", "background"],
  ["companion", "companion"],
  ["doctor's companion", "doctors-companion"],
]);

const PARTNER_RE = /\bpartner\b|\bfriends forever\b/;
const BACKGROUND_RE = /\bchoose a background\b/;
// A Companion ability is its own line: "Companion — Each creature card..."
const COMPANION_RE = /^companion\b/m;
const DOCTORS_COMPANION_RE = /\bdoctor['’]s companion\b/;

/**
 * Work out which commander-pairing abilities a card has, from Scryfall's
 * keyword list and from its rules text.
 */
export function detectAbilityTags(oracleText: string, keywords: readonly string[]): AbilityTag[] {
  const tags = new Set<AbilityTag>();

  for (const keyword of keywords) {
    const tag = KEYWORD_TAGS.get(keyword.toLowerCase().replace("’", "'"));
    if (tag) tags.add(tag);
  }

  const text = oracleText.toLowerCase();
  if (PARTNER_RE.test(text)) tags.add("partner");
  if (BACKGROUND_RE.test(text)) tags.add("background");
  if (COMPANION_RE.test(text)) tags.add("companion");
  if (DOCTORS_COMPANION_RE.test(text)) tags.add("doctors-companion");

  return [...tags];
}

// -- Predicates --

export function isFunnySet(card: CardRecord): boolean {
  return card.setType === "funny";
}

export function isVanilla(card: CardRecord): boolean {
  return card.oracleText.trim().length === 0;
}

/** The Doctors themselves: Time Lords from any Doctor Who set or promo. */
export function isTimeLordDoctor(typeLine: string, setName: string): boolean {
  return (
    setName.toLowerCase().includes("doctor who") &&
    typeLine.toLowerCase().includes("time lord")
  );
}

/** Fast PTK check: only looks at the representative printing. */
export function looksLikePtk(card: Pick<CardRecord, "setCode" | "setName">): boolean {
  return (
    card.setCode.toLowerCase() === "ptk" ||
    card.setName.toLowerCase().includes("portal three kingdoms")
  );
}

/**
 * Whether the representative printing came out fewer than `days` whole UTC
 * days before `now`. Released exactly `days` days ago is not recent; a
 * release date in the future is. `days <= 0` turns the check off.
 */
export function isRecent(releasedAt: string, days: number, now: Date): boolean {
  if (days <= 0) return false;

  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(releasedAt);
  if (!match) return false;
  const [, year, month, day] = match.map(Number);
  if (year === undefined || month === undefined || day === undefined) return false;

  const released = Date.UTC(year, month - 1, day);
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());

  return Math.round((today - released) / DAY_MS) < days;
}

/**
 * The first active exclusion that matches the card, or null when the card is
 * admitted. PTK is judged on the representative printing here; strict PTK
 * scanning happens in applyFilters.
 */
export function rejectionReason(
  card: CardRecord,
  cfg: FilterConfig,
  now: Date,
): RejectionReason | null {
  const tags = card.abilityTags;

  if (!cfg.includePartners && tags.includes("partner")) return "partner";
  if (!cfg.includeBackgrounds && tags.includes("background")) return "background";
  if (!cfg.includeCompanions && tags.includes("companion")) return "companion";
  if (!cfg.includeDoctorsCompanions && tags.includes("doctors-companion")) {
    return "doctors-companion";
  }
  if (!cfg.includeFunnySets && isFunnySet(card)) return "funny-set";
  if (!cfg.includeVanilla && isVanilla(card)) return "vanilla";
  if (!cfg.includePtk && looksLikePtk(card)) return "ptk";
  if (!cfg.includeDoctors && card.isTimeLordDoctor) return "doctor";
  if (!cfg.includeRecent && isRecent(card.releasedAt, cfg.recentDays, now)) return "recent";

  return null;
}

export function admit(card: CardRecord, cfg: FilterConfig, now: Date): boolean {
  return rejectionReason(card, cfg, now) === null;
}

// -- Whole-pool filtering --

export type FilterOutcome = {
  admitted: CardRecord[];
  rejected: Partial<Record<RejectionReason, number>>;
};

export type ApplyFiltersOptions = {
  now: Date;
  /** Lists every printing's set code; needed for strict PTK detection. */
  fetchPrintingSets?: (card: CardRecord) => Promise<string[]>;
  /** Sizes the printings scan pool: max(2, floor(concurrency / 2)) workers. */
  concurrency?: number;
  /** Per-worker pause between printings scans. */
  delayMs?: number;
};

/**
 * Filter the commander pool, keeping input order.
 *
 * With strict PTK detection on, printings are only scanned for cards that
 * every other check admits. If a scan fails, that card falls back to the
 * fast check.
 */
export async function applyFilters(
  cards: readonly CardRecord[],
  cfg: FilterConfig,
  options: ApplyFiltersOptions,
): Promise<FilterOutcome> {
  const rejected: FilterOutcome["rejected"] = {};
  const reject = (reason: RejectionReason) => {
    rejected[reason] = (rejected[reason] ?? 0) + 1;
  };

  const prelim: CardRecord[] = [];
  for (const card of cards) {
    const reason = rejectionReason(card, cfg, options.now);
    if (reason) {
      reject(reason);
    } else {
      prelim.push(card);
    }
  }

  const fetchPrintingSets = options.fetchPrintingSets;
  if (cfg.includePtk || !cfg.ptkStrict || !fetchPrintingSets) {
    return { admitted: prelim, rejected };
  }

  const hasPtkPrinting = await runPool(
    prelim,
    async (card) => {
      try {
        const sets = await fetchPrintingSets(card);
        return sets.some((set) => set.toLowerCase() === "ptk");
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(
          `[deepcuts] Could not list printings of ${card.name} (${message}); using fast PTK check`,
        );
        return looksLikePtk(card);
      }
    },
    {
      concurrency: Math.max(2, Math.floor((options.concurrency ?? 8) / 2)),
      delayMs: options.delayMs ?? 0,
    },
  );

  const admitted: CardRecord[] = [];
  prelim.forEach((card, i) => {
    if (hasPtkPrinting[i]) {
      reject("ptk");
    } else {
      admitted.push(card);
    }
  });

  return { admitted, rejected };
}

export function describeRejections(rejected: FilterOutcome["rejected"]): string {
  const parts = Object.entries(rejected).map(([reason, count]) => `${reason}: ${count}`);
  return parts.length > 0 ? parts.join(", ") : "none";
}

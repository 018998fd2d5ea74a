import { parseArgs } from "util";
import { z } from "zod";
import type { Config } from "./types.ts";

export const DEFAULT_CONCURRENCY = 8;
export const DEFAULT_DELAY_SEC = 0.15;
export const DEFAULT_BOTTOM_K = 20;
export const DEFAULT_RECENT_DAYS = 90;

export const USAGE = `Usage: commander-deepcuts [options]

Find the least-played commanders on EDHREC.

Output / performance:
  --bottom-k N                   How many least-popular commanders to keep (default ${DEFAULT_BOTTOM_K})
  --concurrency N                Concurrent EDHREC requests (default ${DEFAULT_CONCURRENCY})
  --delay SECONDS                Per-worker delay between requests (default ${DEFAULT_DELAY_SEC})
  --csv PATH                     Also write the results to a CSV file
  --only-positive                Exclude commanders with 0 decks
  --include-errors               Show entries that failed to fetch (as "?")

Filters (these categories are excluded unless included):
  --include-partners             Partner / Partner with / Friends forever
  --include-backgrounds          "Choose a Background"
  --include-companions           The Companion ability
  --include-doctors-companions   The "Doctor's companion" mechanic
  --include-funny-sets           Sets with set type "funny" (Un-sets, playtest cards)
  --include-vanilla              No rules text
  --include-ptk                  Portal Three Kingdoms
  --ptk-strict                   Detect PTK by scanning every printing (slower)
  --include-doctors              The Doctors themselves (Time Lords)
  --include-recent               Commanders printed in the last --recent-days days
  --recent-days N                Window for the recent exclusion (default ${DEFAULT_RECENT_DAYS}; 0 disables it)

  -h, --help                     Show this message`;

/** Invalid flags or values. Raised before any network activity. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Flag values arrive as strings; an empty one would otherwise coerce to 0. */
function numberText(name: string) {
  return z.string().trim().min(1, `--${name} needs a value`);
}

function intOption(name: string, min: number, fallback: number) {
  return numberText(name)
    .pipe(
      z.coerce
        .number({ invalid_type_error: `--${name} must be a number` })
        .int(`--${name} must be a whole number`)
        .min(min, `--${name} must be at least ${min}`),
    )
    .default(String(fallback));
}

const CliOptionsSchema = z.object({
  "bottom-k": intOption("bottom-k", 0, DEFAULT_BOTTOM_K),
  concurrency: intOption("concurrency", 1, DEFAULT_CONCURRENCY),
  delay: numberText("delay")
    .pipe(
      z.coerce
        .number({ invalid_type_error: "--delay must be a number" })
        .finite("--delay must be a finite number")
        .min(0, "--delay must be at least 0"),
    )
    .default(String(DEFAULT_DELAY_SEC)),
  "recent-days": intOption("recent-days", 0, DEFAULT_RECENT_DAYS),
  csv: z.string().min(1, "--csv needs a file path").optional(),
  "only-positive": z.boolean().default(false),
  "include-errors": z.boolean().default(false),
  "include-partners": z.boolean().default(false),
  "include-backgrounds": z.boolean().default(false),
  "include-companions": z.boolean().default(false),
  "include-doctors-companions": z.boolean().default(false),
  "include-funny-sets": z.boolean().default(false),
  "include-vanilla": z.boolean().default(false),
  "include-ptk": z.boolean().default(false),
  "ptk-strict": z.boolean().default(false),
  "include-doctors": z.boolean().default(false),
  "include-recent": z.boolean().default(false),
});

export type CliOptions = z.output<typeof CliOptionsSchema>;

function readArgs(args: string[]) {
  return parseArgs({
    args,
    options: {
      help: { type: "boolean", short: "h" },
      "bottom-k": { type: "string" },
      concurrency: { type: "string" },
      delay: { type: "string" },
      "recent-days": { type: "string" },
      csv: { type: "string" },
      "only-positive": { type: "boolean" },
      "include-errors": { type: "boolean" },
      "include-partners": { type: "boolean" },
      "include-backgrounds": { type: "boolean" },
      "include-companions": { type: "boolean" },
      "include-doctors-companions": { type: "boolean" },
      "include-funny-sets": { type: "boolean" },
      "include-vanilla": { type: "boolean" },
      "include-ptk": { type: "boolean" },
      "ptk-strict": { type: "boolean" },
      "include-doctors": { type: "boolean" },
      "include-recent": { type: "boolean" },
    },
    strict: true,
    allowPositionals: false,
  });
}

/**
 * Parse and validate command-line arguments (without the node/script prefix).
 * Returns null when help was requested. Throws ConfigError on bad input.
 */
export function parseConfig(args: string[]): Config | null {
  let parsedArgs: ReturnType<typeof readArgs>;
  try {
    parsedArgs = readArgs(args);
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }

  const { help, ...values } = parsedArgs.values;
  if (help) return null;

  const parsed = CliOptionsSchema.safeParse(values);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => issue.message).join("\n"));
  }

  return toConfig(parsed.data);
}

export function toConfig(options: CliOptions): Config {
  return {
    filters: {
      includePartners: options["include-partners"],
      includeBackgrounds: options["include-backgrounds"],
      includeCompanions: options["include-companions"],
      includeDoctorsCompanions: options["include-doctors-companions"],
      includeFunnySets: options["include-funny-sets"],
      includeVanilla: options["include-vanilla"],
      includePtk: options["include-ptk"],
      ptkStrict: options["ptk-strict"],
      includeDoctors: options["include-doctors"],
      includeRecent: options["include-recent"],
      recentDays: options["recent-days"],
    },
    bottomK: options["bottom-k"],
    concurrency: options.concurrency,
    delayMs: Math.round(options.delay * 1000),
    csvPath: options.csv,
    onlyPositive: options["only-positive"],
    includeErrors: options["include-errors"],
  };
}

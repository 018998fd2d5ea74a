import { ConfigError, USAGE, parseConfig } from "./src/config.ts";
import { writeResultsCSV } from "./src/csv.ts";
import { fetchDeckCount } from "./src/edhrec.ts";
import { findLeastPlayed } from "./src/pipeline.ts";
import { formatReport } from "./src/report.ts";
import { fetchCommanderPool, fetchPrintingSets } from "./src/scryfall.ts";
import type { Config } from "./src/types.ts";

const EXIT_SETUP_FAILURE = 1;
const EXIT_CONFIG_FAILURE = 2;

function loadConfig(): Config | null {
  try {
    return parseConfig(process.argv.slice(2));
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[deepcuts] ${err.message}\n\n${USAGE}`);
      process.exit(EXIT_CONFIG_FAILURE);
    }
    throw err;
  }
}

async function main() {
  const config = loadConfig();
  if (!config) {
    console.log(USAGE);
    return;
  }

  const ranked = await findLeastPlayed(config, {
    fetchCommanderPool: () => fetchCommanderPool(),
    fetchPrintingSets,
    lookupDeckCount: fetchDeckCount,
  });

  console.log("");
  for (const line of formatReport(ranked, config.bottomK, config.includeErrors)) {
    console.log(line);
  }

  if (config.csvPath) {
    await writeResultsCSV(config.csvPath, ranked);
    console.error(`[deepcuts] Saved CSV to ${config.csvPath}`);
  }
}

main().catch((err) => {
  console.error("[deepcuts] Fatal error:", err instanceof Error ? err.message : err);
  process.exit(EXIT_SETUP_FAILURE);
});

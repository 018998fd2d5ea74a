import type { CardRecord } from "./types.ts";

/** Build a CardRecord with sensible defaults. Override any field as needed. */
export function makeCard(overrides: Partial<CardRecord> = {}): CardRecord {
  const name = overrides.name ?? "Gorgon Recluse";
  const slug = name.toLowerCase().replace(/[^a-z0-9]+/g, "-");
  return {
    id: `id-${slug}`,
    oracleId: `oracle-${slug}`,
    name,
    typeLine: "Legendary Creature — Gorgon",
    oracleText: "Deathtouch",
    colorIdentity: ["B"],
    rarity: "rare",
    keywords: ["Deathtouch"],
    abilityTags: [],
    setCode: "tst",
    setName: "Test Expansion",
    setType: "expansion",
    releasedAt: "2015-06-01",
    isTimeLordDoctor: false,
    edhrecUrl: `https://edhrec.com/commanders/${slug}`,
    ...overrides,
  };
}

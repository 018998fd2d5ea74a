import { test, expect, describe } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { escapeField, formatResultsCSV, writeResultsCSV } from "./csv.ts";
import { makeCard } from "./fixtures.ts";
import type { RankedEntry } from "./types.ts";

const HEADER = "rank,name,decks,set,color_identity,released_at,edhrec_url,error";

const EZURI: RankedEntry = {
  rank: 1,
  card: makeCard({
    name: "Ezuri, Renegade Leader",
    setCode: "som",
    colorIdentity: ["G"],
    releasedAt: "2010-10-01",
  }),
  result: { status: "ok", decks: 12, url: "https://edhrec.com/commanders/ezuri-renegade-leader" },
};

const BROKEN: RankedEntry = {
  rank: 2,
  card: makeCard({ name: "Jhoira", setCode: "dom", colorIdentity: ["U", "R"], releasedAt: "2018-04-27" }),
  result: { status: "error", error: 'HTTP 404 for "jhoira"', url: "https://edhrec.com/route/?cc=Jhoira" },
};

describe("escapeField", () => {
  test("leaves plain values alone", () => {
    expect(escapeField("Sol Ring")).toBe("Sol Ring");
  });

  test("quotes values with commas", () => {
    expect(escapeField("Ezuri, Renegade Leader")).toBe('"Ezuri, Renegade Leader"');
  });

  test("doubles embedded quotes", () => {
    expect(escapeField('Card with "quotes"')).toBe('"Card with ""quotes"""');
  });

  test("quotes values with line breaks", () => {
    expect(escapeField("two\nlines")).toBe('"two\nlines"');
    expect(escapeField("cr\rhere")).toBe('"cr\rhere"');
  });
});

describe("formatResultsCSV", () => {
  test("writes a header row for an empty report", () => {
    expect(formatResultsCSV([])).toBe(`${HEADER}\n`);
  });

  test("writes one row per entry", () => {
    expect(formatResultsCSV([EZURI])).toBe(
      `${HEADER}\n1,"Ezuri, Renegade Leader",12,som,G,2010-10-01,https://edhrec.com/commanders/ezuri-renegade-leader,\n`,
    );
  });

  test("writes failures as ? with their error", () => {
    const lines = formatResultsCSV([EZURI, BROKEN]).split("\n");
    expect(lines[2]).toBe(
      '2,Jhoira,?,dom,UR,2018-04-27,https://edhrec.com/route/?cc=Jhoira,"HTTP 404 for ""jhoira"""',
    );
  });
});

describe("writeResultsCSV", () => {
  test("writes the report to disk", async () => {
    const dir = await mkdtemp(join(tmpdir(), "deepcuts-"));
    try {
      const path = join(dir, "out.csv");
      await writeResultsCSV(path, [EZURI]);
      expect(await readFile(path, "utf-8")).toBe(formatResultsCSV([EZURI]));
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

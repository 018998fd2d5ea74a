import { test, expect, describe } from "vitest";
import { ConfigError, parseConfig } from "./config.ts";

function parseError(args: string[]): string {
  try {
    parseConfig(args);
  } catch (err) {
    if (err instanceof ConfigError) return err.message;
    throw err;
  }
  throw new Error("expected a ConfigError");
}

describe("parseConfig", () => {
  test("uses defaults with no arguments", () => {
    expect(parseConfig([])).toEqual({
      filters: {
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
      },
      bottomK: 20,
      concurrency: 8,
      delayMs: 150,
      csvPath: undefined,
      onlyPositive: false,
      includeErrors: false,
    });
  });

  test("reads every include flag", () => {
    const config = parseConfig([
      "--include-partners",
      "--include-backgrounds",
      "--include-companions",
      "--include-doctors-companions",
      "--include-funny-sets",
      "--include-vanilla",
      "--include-ptk",
      "--ptk-strict",
      "--include-doctors",
      "--include-recent",
    ]);
    expect(config?.filters).toEqual({
      includePartners: true,
      includeBackgrounds: true,
      includeCompanions: true,
      includeDoctorsCompanions: true,
      includeFunnySets: true,
      includeVanilla: true,
      includePtk: true,
      ptkStrict: true,
      includeDoctors: true,
      includeRecent: true,
      recentDays: 90,
    });
  });

  test("reads numeric and output options", () => {
    const config = parseConfig([
      "--bottom-k",
      "50",
      "--concurrency=4",
      "--delay",
      "0.5",
      "--recent-days",
      "0",
      "--csv",
      "out.csv",
      "--only-positive",
      "--include-errors",
    ]);
    expect(config).toMatchObject({
      bottomK: 50,
      concurrency: 4,
      delayMs: 500,
      csvPath: "out.csv",
      onlyPositive: true,
      includeErrors: true,
      filters: { recentDays: 0 },
    });
  });

  test("returns null for --help", () => {
    expect(parseConfig(["--help"])).toBeNull();
    expect(parseConfig(["-h"])).toBeNull();
  });

  test("rejects a negative bottom-k", () => {
    expect(parseError(["--bottom-k=-1"])).toBe("--bottom-k must be at least 0");
  });

  test("rejects a concurrency below 1", () => {
    expect(parseError(["--concurrency", "0"])).toBe("--concurrency must be at least 1");
  });

  test("rejects fractional counts", () => {
    expect(parseError(["--bottom-k", "2.5"])).toBe("--bottom-k must be a whole number");
  });

  test("rejects a delay that isn't a number", () => {
    expect(parseError(["--delay", "soon"])).toBe("--delay must be a number");
  });

  test("rejects a negative delay", () => {
    expect(parseError(["--delay=-0.1"])).toBe("--delay must be at least 0");
  });

  test("rejects empty numeric values instead of reading them as 0", () => {
    expect(parseError(["--bottom-k", ""])).toBe("--bottom-k needs a value");
    expect(parseError(["--delay="])).toBe("--delay needs a value");
    expect(parseError(["--concurrency", "  "])).toBe("--concurrency needs a value");
  });

  test("reports every problem at once", () => {
    expect(parseError(["--bottom-k=-1", "--recent-days=-5"])).toBe(
      "--bottom-k must be at least 0\n--recent-days must be at least 0",
    );
  });

  test("rejects unknown flags", () => {
    expect(() => parseConfig(["--include-everything"])).toThrow(ConfigError);
  });

  test("rejects positional arguments", () => {
    expect(() => parseConfig(["Atraxa"])).toThrow(ConfigError);
  });
});

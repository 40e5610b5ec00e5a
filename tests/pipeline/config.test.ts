import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { ConfigError } from "../../shared/errors";
import {
  DEFAULT_CONFIG_FILE,
  buildSettings,
  loadEngineConfig,
  parseEngineConfig,
  seasonSlug,
  trackingStart,
} from "../../scripts/pipeline/config";

const season = {
  name: "Winter 2026",
  season: "WINTER",
  year: 2026,
  startDate: "2026-01-01T00:00:00Z",
  endDate: "2026-03-31T23:59:59Z",
};

describe("parseEngineConfig", () => {
  it("fills defaults", () => {
    const config = parseEngineConfig({ seasons: [season] });
    expect(config.fuzzyThreshold).toBe(85);
    expect(config.seasonBonus).toBe(10);
    expect(config.postAiringWeeks).toBe(4);
    expect(config.counterPolicy).toEqual({ mode: "clamp", resetDropRatio: 0.5 });
    expect(config.nonEpisodicFormats).toEqual(["MOVIE", "MUSIC", "SPECIAL"]);
    expect(config.diagnostics).toEqual({ topRankCutoff: 30, spikeRatio: 2 });
  });

  it("normalizes override keys and lowercases correction keys", () => {
    const config = parseEngineConfig({
      seasons: [season],
      titleOverrides: { "Kaguya-sama wa Kokurasetai": 11 },
      episodeRanges: { "ONE PIECE": [{ minEpisode: 1, maxEpisode: 9999, showId: 21 }] },
      titleCorrections: { " Oshi No ": "Oshi no Ko" },
    });
    expect(config.titleOverrides).toEqual(new Map([["kaguyasama wa kokurasetai", 11]]));
    expect([...config.episodeRanges.keys()]).toEqual(["one piece"]);
    expect(config.titleCorrections).toEqual(new Map([["oshi no", "Oshi no Ko"]]));
  });

  it("keeps title tables free of inherited keys", () => {
    const config = parseEngineConfig({ seasons: [season] });
    expect(config.titleOverrides.get("constructor")).toBeUndefined();
    expect(config.episodeRanges.get("constructor")).toBeUndefined();
    expect(config.titleCorrections.get("constructor")).toBeUndefined();
  });

  it("freezes the result", () => {
    const config = parseEngineConfig({ seasons: [season] });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.seasons[0])).toBe(true);
    expect(Object.isFrozen(config.counterPolicy)).toBe(true);
  });

  it("rejects invalid values with the offending path", () => {
    expect(() => parseEngineConfig({ seasons: [season], fuzzyThreshold: 150 })).toThrow(ConfigError);
    expect(() => parseEngineConfig({ seasons: [] })).toThrow(/seasons/);
    expect(() =>
      parseEngineConfig({ seasons: [{ ...season, startDate: "2026-04-01", endDate: "2026-01-01" }] }),
    ).toThrow(/startDate must not be after endDate/);
    expect(() =>
      parseEngineConfig({
        seasons: [season],
        episodeRanges: { "x y z": [{ minEpisode: 10, maxEpisode: 2, showId: 1 }] },
      }),
    ).toThrow(/minEpisode must not exceed maxEpisode/);
  });
});

describe("season helpers", () => {
  const parsed = parseEngineConfig({ seasons: [season, { ...season, name: "Winter 2026 (late)", trackingStart: "2026-01-10" }] });

  it("slugs season names", () => {
    expect(seasonSlug(parsed.seasons[0])).toBe("winter-2026");
    expect(seasonSlug(parsed.seasons[1])).toBe("winter-2026-late");
  });

  it("tracks from the start date unless told otherwise", () => {
    expect(trackingStart(parsed.seasons[0]).toISOString()).toBe("2026-01-01T00:00:00.000Z");
    expect(trackingStart(parsed.seasons[1]).toISOString()).toBe("2026-01-10T00:00:00.000Z");
  });
});

describe("buildSettings", () => {
  it("accepts partial settings without seasons", () => {
    expect(buildSettings({ fuzzyThreshold: 90 }).fuzzyThreshold).toBe(90);
  });
});

describe("loadEngineConfig", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads the bundled config", () => {
    const config = loadEngineConfig(DEFAULT_CONFIG_FILE);
    expect(config.seasons.map((s) => s.name)).toEqual(["Fall 2025", "Winter 2026", "Spring 2026", "Summer 2026"]);
    expect(config.titleOverrides.get("oshi no ko")).toBe(182587);
  });

  it("reports unreadable and malformed files as config errors", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "engine-config-"));
    dirs.push(dir);
    const broken = path.join(dir, "engine.json");
    fs.writeFileSync(broken, "{ not json");

    expect(() => loadEngineConfig(path.join(dir, "missing.json"))).toThrow(ConfigError);
    expect(() => loadEngineConfig(broken)).toThrow(/not valid JSON/);
  });
});

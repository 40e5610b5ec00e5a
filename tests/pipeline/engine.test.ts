import { describe, expect, it } from "vitest";
import { buildDiagnostics, flaggedShows } from "../../scripts/pipeline/diagnostics";
import { runEngine } from "../../scripts/pipeline/engine";
import { makeTorrent } from "../fixtures/builders";
import { inputStats, scenario } from "../fixtures/scenario";

describe("runEngine", () => {
  const result = runEngine(scenario());

  it("filters, matches and counts every torrent once", () => {
    expect(result.accepted.map((t) => t.id)).toEqual(["a1", "a2", "b1", "x1"]);
    expect(result.rejectedCounts).toEqual({
      parse_failed: 0,
      missing_episode: 0,
      episode_list: 0,
      batch_marker: 1,
      remake: 0,
      before_window: 1,
    });
    expect(result.matches.map((m) => [m.torrentId, m.showId])).toEqual([
      ["a1", 100],
      ["a2", 100],
      ["b1", 200],
    ]);
    expect(result.unmatched.map((u) => [u.torrentId, u.reason])).toEqual([["x1", "below_threshold"]]);
    expect(result.methodCounts).toEqual({ episode_range: 0, manual_override: 0, season_aware_fuzzy: 0, fuzzy: 3 });
    expect(result.anomalies).toEqual({ decrease: 1, reset: 0 });
  });

  it("excludes non-episodic catalog entries", () => {
    expect(result.index.excluded).toEqual([{ showId: 300, title: "Gamma Film", reason: "non_episodic_format" }]);
  });

  it("builds daily series across releases", () => {
    expect(result.series.map((r) => [r.showId, r.day, r.downloadsDaily, r.downloadsCumulative, r.daysSinceFirstRelease])).toEqual([
      [100, "2025-10-06", 150, 150, 0],
      [100, "2025-10-07", 60, 210, 1],
      [200, "2025-10-07", 0, 0, 0],
      [200, "2025-10-08", 30, 30, 1],
      [200, "2025-10-14", 70, 100, 7],
    ]);
  });

  it("ranks weekly totals", () => {
    expect(result.rankings.map((r) => [r.isoWeek, r.showId, r.downloads, r.rank, r.rankChange, r.downloadsChangePct])).toEqual([
      ["2025-W41", 100, 210, 1, null, null],
      ["2025-W41", 200, 30, 2, null, null],
      ["2025-W42", 200, 70, 1, 1, 133.3],
    ]);
  });

  it("summarizes the season", () => {
    expect(result.summary.map((s) => [s.showId, s.totalDownloads, s.latestRank, s.endurance, s.latecomers])).toEqual([
      [100, 210, 1, null, 0],
      [200, 100, 1, null, 0],
    ]);
  });

  it("treats titles that collide with object keys as ordinary titles", () => {
    const input = scenario();
    const odd = runEngine({
      ...input,
      torrents: [
        ...input.torrents,
        makeTorrent({ id: "c1", parsedTitle: "Constructor" }),
        makeTorrent({ id: "c2", parsedTitle: "__proto__" }),
      ],
    });
    expect(odd.unmatched.map((u) => [u.torrentId, u.reason])).toEqual([
      ["c1", "below_threshold"],
      ["c2", "below_threshold"],
      ["x1", "below_threshold"],
    ]);
    expect(odd.rankings).toEqual(result.rankings);
  });

  it("does not depend on input order", () => {
    const input = scenario();
    const shuffled = runEngine({
      ...input,
      torrents: [...input.torrents].reverse(),
      snapshots: [...input.snapshots].reverse(),
    });
    expect(shuffled.series).toEqual(result.series);
    expect(shuffled.rankings).toEqual(result.rankings);
    expect(shuffled.matches).toEqual(result.matches);
  });
});

describe("buildDiagnostics", () => {
  const report = buildDiagnostics(runEngine(scenario()), inputStats);

  it("estimates downloads lost to unmatched torrents", () => {
    expect(report.unmatched).toHaveLength(1);
    expect(report.unmatched[0]).toMatchObject({
      torrentId: "x1",
      rawTitle: "[G3] Unknown Thing - 03 [1080p].mkv",
      title: "Unknown Thing",
      episode: 3,
      reason: "below_threshold",
      lostDownloads: 40,
    });
  });

  it("summarizes counts", () => {
    expect(report.season).toBe("fall-2025");
    expect(report.filter.accepted).toBe(4);
    expect(report.matching).toEqual({
      matched: 3,
      unmatched: 1,
      methods: { episode_range: 0, manual_override: 0, season_aware_fuzzy: 0, fuzzy: 3 },
    });
  });

  it("breaks flagged shows down by torrent and week", () => {
    expect(report.contributions).toEqual([
      {
        showId: 100,
        title: "Alpha Quest, Reborn",
        flagged: ["top_rank"],
        weeks: [
          {
            week: "2025-W41",
            downloads: 210,
            torrents: [
              {
                torrentId: "a1",
                rawTitle: "[G1] Alpha Quest Reborn - 01 [1080p].mkv",
                episode: 1,
                method: "fuzzy",
                score: 100,
                downloads: 160,
              },
              {
                torrentId: "a2",
                rawTitle: "[G2] Alpha Quest Reborn - 01 [720p].mkv",
                episode: 1,
                method: "fuzzy",
                score: 100,
                downloads: 50,
              },
            ],
          },
        ],
      },
      {
        showId: 200,
        title: "Beta Story",
        flagged: ["top_rank", "spike"],
        weeks: [
          {
            week: "2025-W41",
            downloads: 30,
            torrents: [
              { torrentId: "b1", rawTitle: "[G1] Beta Story - 01 [1080p].mkv", episode: 1, method: "fuzzy", score: 100, downloads: 30 },
            ],
          },
          {
            week: "2025-W42",
            downloads: 70,
            torrents: [
              { torrentId: "b1", rawTitle: "[G1] Beta Story - 01 [1080p].mkv", episode: 1, method: "fuzzy", score: 100, downloads: 70 },
            ],
          },
        ],
      },
    ]);
  });

  it("flags only top-ranked or spiking shows", () => {
    const flags = flaggedShows(runEngine(scenario()).rankings, 1, 2);
    expect([...flags.entries()]).toEqual([
      [100, ["top_rank"]],
      [200, ["top_rank", "spike"]],
    ]);
    expect([...flaggedShows(runEngine(scenario()).rankings, 1, 3).entries()]).toEqual([
      [100, ["top_rank"]],
      [200, ["top_rank"]],
    ]);
  });
});

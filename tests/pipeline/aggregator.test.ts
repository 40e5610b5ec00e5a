import { describe, expect, it } from "vitest";
import { aggregate } from "../../scripts/pipeline/aggregator";
import { deltasByTorrent } from "../../scripts/pipeline/delta-calculator";
import type { Match, Torrent } from "../../scripts/pipeline/types";
import { makeTorrent, snap } from "../fixtures/builders";

function matchFor(torrentId: string, showId: number, episode: number): Match {
  return { torrentId, showId, episode, method: "fuzzy", score: 100, matchedTitle: "sample show" };
}

function byId(torrents: Torrent[]): Map<string, Torrent> {
  return new Map(torrents.map((t) => [t.id, t]));
}

describe("aggregate", () => {
  it("sums same-day increases from two releases of one episode", () => {
    const torrents = byId([
      makeTorrent({ id: "r1", publishedAt: new Date("2025-10-06T09:00:00Z") }),
      makeTorrent({ id: "r2", publishedAt: new Date("2025-10-06T10:00:00Z") }),
    ]);
    const increments = deltasByTorrent([
      snap("r1", "2025-10-06T09:00:00Z", 0),
      snap("r1", "2025-10-06T20:00:00Z", 100),
      snap("r2", "2025-10-06T10:00:00Z", 0),
      snap("r2", "2025-10-06T21:00:00Z", 50),
    ]);

    const series = aggregate([matchFor("r1", 1, 1), matchFor("r2", 1, 1)], torrents, increments);

    expect(series).toEqual([
      { showId: 1, episode: 1, day: "2025-10-06", downloadsDaily: 150, downloadsCumulative: 150, daysSinceFirstRelease: 0 },
    ]);
  });

  it("keeps a running cumulative total and counts days from the earliest release", () => {
    const torrents = byId([
      makeTorrent({ id: "late", publishedAt: new Date("2025-10-07T03:00:00Z") }),
      makeTorrent({ id: "early", publishedAt: new Date("2025-10-06T23:00:00Z") }),
    ]);
    const increments = deltasByTorrent([
      snap("early", "2025-10-06T23:00:00Z", 100),
      snap("early", "2025-10-06T23:30:00Z", 80),
      snap("early", "2025-10-08T12:00:00Z", 130),
      snap("late", "2025-10-07T03:00:00Z", 0),
      snap("late", "2025-10-07T12:00:00Z", 20),
    ]);

    const series = aggregate([matchFor("late", 2, 3), matchFor("early", 2, 3)], torrents, increments);

    expect(series.map((r) => [r.day, r.downloadsDaily, r.downloadsCumulative, r.daysSinceFirstRelease])).toEqual([
      ["2025-10-06", 0, 0, 0],
      ["2025-10-07", 20, 20, 1],
      ["2025-10-08", 50, 70, 2],
    ]);
    const dailySum = series.reduce((sum, r) => sum + r.downloadsDaily, 0);
    expect(dailySum).toBe(series[series.length - 1].downloadsCumulative);
  });

  it("drops days observed before the episode's first release", () => {
    const torrents = byId([makeTorrent({ id: "skewed", publishedAt: new Date("2025-10-06T12:00:00Z") })]);
    const increments = deltasByTorrent([
      snap("skewed", "2025-10-05T12:00:00Z", 0),
      snap("skewed", "2025-10-05T18:00:00Z", 40),
      snap("skewed", "2025-10-06T18:00:00Z", 55),
    ]);

    const series = aggregate([matchFor("skewed", 1, 1)], torrents, increments);

    expect(series).toEqual([
      { showId: 1, episode: 1, day: "2025-10-06", downloadsDaily: 15, downloadsCumulative: 15, daysSinceFirstRelease: 0 },
    ]);
  });

  it("orders output by show, episode and day", () => {
    const torrents = byId([
      makeTorrent({ id: "x", publishedAt: new Date("2025-10-06T00:00:00Z") }),
      makeTorrent({ id: "y", publishedAt: new Date("2025-10-06T00:00:00Z") }),
      makeTorrent({ id: "z", publishedAt: new Date("2025-10-06T00:00:00Z") }),
    ]);
    const increments = deltasByTorrent([
      snap("x", "2025-10-06T00:00:00Z", 0),
      snap("x", "2025-10-06T12:00:00Z", 5),
      snap("y", "2025-10-06T00:00:00Z", 0),
      snap("y", "2025-10-06T12:00:00Z", 7),
      snap("z", "2025-10-06T00:00:00Z", 0),
      snap("z", "2025-10-06T12:00:00Z", 9),
    ]);

    const series = aggregate(
      [matchFor("x", 2, 1), matchFor("y", 1, 2), matchFor("z", 1, 1)],
      torrents,
      increments,
    );

    expect(series.map((r) => [r.showId, r.episode, r.downloadsDaily])).toEqual([
      [1, 1, 9],
      [1, 2, 7],
      [2, 1, 5],
    ]);
  });

  it("emits nothing for matches without snapshots", () => {
    const torrents = byId([makeTorrent({ id: "quiet" })]);
    expect(aggregate([matchFor("quiet", 1, 1)], torrents, new Map())).toEqual([]);
  });
});

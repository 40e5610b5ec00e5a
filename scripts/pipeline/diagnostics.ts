import { groupKey, releaseDays } from "./aggregator";
import type { ExcludedShow } from "./catalog-index";
import { seasonSlug } from "./config";
import { totalIncrement } from "./delta-calculator";
import type { EngineResult } from "./engine";
import { isoWeek, utcDay } from "./iso-week";
import type { CounterAnomaly, MatchMethod, RejectReason, UnmatchedReason, WeekRanking } from "./types";

/** Row-level counts from the input source, reported but not fatal. */
export interface InputStats {
  torrents: number;
  snapshots: number;
  invalidTorrentRows: number;
  invalidSnapshotRows: number;
}

export type ShowFlag = "top_rank" | "spike";

const SHOW_FLAGS: readonly ShowFlag[] = ["top_rank", "spike"];

export interface UnmatchedReport {
  torrentId: string;
  rawTitle: string;
  title: string;
  episode: number;
  reason: UnmatchedReason;
  score: number | null;
  bestCandidate: number | null;
  bestCandidateTitle: string | null;
  lostDownloads: number;
}

export interface TorrentContribution {
  torrentId: string;
  rawTitle: string;
  episode: number;
  method: MatchMethod;
  score: number;
  downloads: number;
}

export interface ShowContributions {
  showId: number;
  title: string;
  flagged: ShowFlag[];
  weeks: Array<{ week: string; downloads: number; torrents: TorrentContribution[] }>;
}

export interface DiagnosticsReport {
  season: string;
  inputs: InputStats;
  filter: { accepted: number; rejected: Record<RejectReason, number> };
  matching: { matched: number; unmatched: number; methods: Record<MatchMethod, number> };
  counterAnomalies: Record<CounterAnomaly, number>;
  excludedShows: ExcludedShow[];
  unmatched: UnmatchedReport[];
  contributions: ShowContributions[];
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Shows worth a closer look: anything that reached the top of a week, or
 * whose weekly downloads jumped by more than the spike ratio.
 */
export function flaggedShows(
  rankings: readonly WeekRanking[],
  topRankCutoff: number,
  spikeRatio: number,
): Map<number, ShowFlag[]> {
  const flags = new Map<number, Set<ShowFlag>>();
  const add = (showId: number, flag: ShowFlag) => {
    const set = flags.get(showId) ?? new Set<ShowFlag>();
    set.add(flag);
    flags.set(showId, set);
  };

  const spikePct = (spikeRatio - 1) * 100;
  for (const entry of rankings) {
    if (entry.rank <= topRankCutoff) add(entry.showId, "top_rank");
    if (entry.downloadsChangePct !== null && entry.downloadsChangePct > spikePct) add(entry.showId, "spike");
  }

  const result = new Map<number, ShowFlag[]>();
  for (const showId of [...flags.keys()].sort((a, b) => a - b)) {
    const set = flags.get(showId) ?? new Set<ShowFlag>();
    result.set(showId, SHOW_FLAGS.filter((f) => set.has(f)));
  }
  return result;
}

function buildUnmatched(result: EngineResult): UnmatchedReport[] {
  const accepted = new Map(result.accepted.map((t) => [t.id, t]));
  const reports: UnmatchedReport[] = [];

  for (const miss of result.unmatched) {
    const torrent = accepted.get(miss.torrentId);
    if (!torrent) continue;
    reports.push({
      torrentId: miss.torrentId,
      rawTitle: torrent.rawTitle,
      title: miss.title,
      episode: torrent.episode,
      reason: miss.reason,
      score: miss.score,
      bestCandidate: miss.bestCandidate,
      bestCandidateTitle: miss.bestCandidate !== null && result.index.has(miss.bestCandidate)
        ? result.index.title(miss.bestCandidate)
        : null,
      lostDownloads: totalIncrement(result.increments.get(miss.torrentId) ?? []),
    });
  }

  return reports.sort((a, b) => b.lostDownloads - a.lostDownloads || compareIds(a.torrentId, b.torrentId));
}

function buildContributions(result: EngineResult, topRankCutoff: number, spikeRatio: number): ShowContributions[] {
  const flagged = flaggedShows(result.rankings, topRankCutoff, spikeRatio);
  if (flagged.size === 0) return [];

  // Only weeks that survived the post-airing cutoff are reported.
  const rankedWeeks = new Map<number, Map<string, number>>();
  for (const entry of result.rankings) {
    if (!flagged.has(entry.showId)) continue;
    const weeks = rankedWeeks.get(entry.showId) ?? new Map<string, number>();
    weeks.set(entry.isoWeek, entry.downloads);
    rankedWeeks.set(entry.showId, weeks);
  }

  const released = releaseDays(result.matches, result.torrents);
  const perShow = new Map<number, Map<string, TorrentContribution[]>>();
  for (const match of result.matches) {
    const weeks = rankedWeeks.get(match.showId);
    const torrent = result.torrents.get(match.torrentId);
    if (!weeks || !torrent) continue;

    const releaseDay = released.get(groupKey(match.showId, match.episode)) ?? "";
    const byWeek = new Map<string, number>();
    for (const inc of result.increments.get(match.torrentId) ?? []) {
      const day = utcDay(inc.observedAt);
      if (day < releaseDay) continue;
      const week = isoWeek(day);
      if (weeks.has(week)) byWeek.set(week, (byWeek.get(week) ?? 0) + inc.increment);
    }

    const showWeeks = perShow.get(match.showId) ?? new Map<string, TorrentContribution[]>();
    for (const [week, downloads] of byWeek) {
      if (downloads === 0) continue;
      const list = showWeeks.get(week) ?? [];
      list.push({
        torrentId: match.torrentId,
        rawTitle: torrent.rawTitle,
        episode: match.episode,
        method: match.method,
        score: match.score,
        downloads,
      });
      showWeeks.set(week, list);
    }
    perShow.set(match.showId, showWeeks);
  }

  const reports: ShowContributions[] = [];
  for (const [showId, flags] of flagged) {
    const weeks = rankedWeeks.get(showId) ?? new Map<string, number>();
    const torrents = perShow.get(showId) ?? new Map<string, TorrentContribution[]>();
    reports.push({
      showId,
      title: result.index.title(showId),
      flagged: flags,
      weeks: [...weeks.keys()].sort().map((week) => ({
        week,
        downloads: weeks.get(week) ?? 0,
        torrents: (torrents.get(week) ?? []).sort(
          (a, b) => b.downloads - a.downloads || compareIds(a.torrentId, b.torrentId),
        ),
      })),
    });
  }
  return reports;
}

export function buildDiagnostics(result: EngineResult, inputs: InputStats): DiagnosticsReport {
  const { topRankCutoff, spikeRatio } = result.settings.diagnostics;
  return {
    season: seasonSlug(result.season),
    inputs,
    filter: { accepted: result.accepted.length, rejected: result.rejectedCounts },
    matching: {
      matched: result.matches.length,
      unmatched: result.unmatched.length,
      methods: result.methodCounts,
    },
    counterAnomalies: result.anomalies,
    excludedShows: [...result.index.excluded],
    unmatched: buildUnmatched(result),
    contributions: buildContributions(result, topRankCutoff, spikeRatio),
  };
}

import { aggregate } from "./aggregator";
import type { CatalogIndex } from "./catalog-index";
import { trackingStart, type EngineSettings, type SeasonConfig } from "./config";
import { countAnomalies, deltasByTorrent } from "./delta-calculator";
import { filterTorrents, type AcceptedTorrent, type RejectedTorrent } from "./episode-filter";
import { MatchEngine, type MatchStrategy } from "./match-engine";
import { downloadPercentiles, episodeTotals, summarizeSeason } from "./season-summary";
import type {
  CounterAnomaly, DownloadPercentiles, EpisodeSeries, EpisodeTotal, Increment, Match, MatchMethod,
  RejectReason, ShowSummary, Snapshot, Torrent, Unmatched, WeekRanking,
} from "./types";
import { rank } from "./weekly-ranker";

export interface EngineInput {
  season: SeasonConfig;
  settings: EngineSettings;
  index: CatalogIndex;
  torrents: readonly Torrent[];
  /** Snapshots of (at least) every accepted torrent. Order does not matter. */
  snapshots: readonly Snapshot[];
  strategies?: readonly MatchStrategy[];
}

export interface EngineResult {
  season: SeasonConfig;
  settings: EngineSettings;
  index: CatalogIndex;
  torrents: ReadonlyMap<string, Torrent>;
  accepted: readonly AcceptedTorrent[];
  rejected: readonly RejectedTorrent[];
  rejectedCounts: Record<RejectReason, number>;
  matches: readonly Match[];
  unmatched: readonly Unmatched[];
  methodCounts: Record<MatchMethod, number>;
  increments: ReadonlyMap<string, readonly Increment[]>;
  anomalies: Record<CounterAnomaly, number>;
  series: readonly EpisodeSeries[];
  rankings: readonly WeekRanking[];
  summary: readonly ShowSummary[];
  percentiles: DownloadPercentiles;
  episodeTotals: readonly EpisodeTotal[];
}

function countRejections(rejected: readonly RejectedTorrent[]): Record<RejectReason, number> {
  const counts: Record<RejectReason, number> = {
    parse_failed: 0,
    missing_episode: 0,
    episode_list: 0,
    batch_marker: 0,
    remake: 0,
    before_window: 0,
  };
  for (const r of rejected) counts[r.reason]++;
  return counts;
}

/**
 * Full recomputation for one season. Pure: no I/O, no clock, no shared state,
 * so identical input always produces identical output.
 */
export function runEngine(input: EngineInput): EngineResult {
  const { season, settings, index } = input;

  const torrents = new Map<string, Torrent>();
  for (const torrent of [...input.torrents].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))) {
    if (!torrents.has(torrent.id)) torrents.set(torrent.id, torrent);
  }

  const { accepted, rejected } = filterTorrents([...torrents.values()], { trackingStart: trackingStart(season) });

  const matcher = new MatchEngine(index, settings, input.strategies);
  const { matches, unmatched, methodCounts } = matcher.matchAll(accepted);

  const acceptedIds = new Set(accepted.map((t) => t.id));
  const increments = deltasByTorrent(
    input.snapshots.filter((s) => acceptedIds.has(s.torrentId)),
    settings.counterPolicy,
  );

  const series = aggregate(matches, torrents, increments);
  const rankings = rank(series, index, settings);
  const summary = summarizeSeason(series, rankings);

  return {
    season,
    settings,
    index,
    torrents,
    accepted,
    rejected,
    rejectedCounts: countRejections(rejected),
    matches,
    unmatched,
    methodCounts,
    increments,
    anomalies: countAnomalies(increments),
    series,
    rankings,
    summary,
    percentiles: downloadPercentiles(series, rankings),
    episodeTotals: episodeTotals(series, season),
  };
}

import type { ShowCatalogEntry, Snapshot, Torrent } from "../../shared/schema";

export type { ShowCatalogEntry, Snapshot, Torrent };

export type MatchMethod = "episode_range" | "manual_override" | "season_aware_fuzzy" | "fuzzy";

export interface Match {
  torrentId: string;
  showId: number;
  episode: number;
  method: MatchMethod;
  score: number;
  matchedTitle: string;
}

export type UnmatchedReason = "uninformative_title" | "below_threshold" | "override_target_missing";

export interface Unmatched {
  torrentId: string;
  reason: UnmatchedReason;
  title: string;
  score: number | null;
  bestCandidate: number | null;
}

export type MatchOutcome =
  | { kind: "matched"; match: Match }
  | { kind: "unmatched"; unmatched: Unmatched };

export type RejectReason =
  | "parse_failed"
  | "missing_episode"
  | "episode_list"
  | "batch_marker"
  | "remake"
  | "before_window";

export type CounterAnomaly = "decrease" | "reset";

export interface Increment {
  torrentId: string;
  observedAt: Date;
  increment: number;
  anomaly: CounterAnomaly | null;
}

export interface EpisodeSeries {
  showId: number;
  episode: number;
  day: string;
  downloadsDaily: number;
  downloadsCumulative: number;
  daysSinceFirstRelease: number;
}

export interface WeekRanking {
  isoWeek: string;
  weekStart: string;
  showId: number;
  downloads: number;
  rank: number;
  /** previous rank minus current rank; positive means the show climbed. */
  rankChange: number | null;
  isNew: boolean;
  downloadsChangePct: number | null;
}

export interface ShowSummary {
  showId: number;
  totalDownloads: number;
  episodesTracked: number;
  latestRank: number | null;
  episodeOneDownloads: number;
  endurance: number | null;
  latecomers: number | null;
}

export interface Quartiles {
  p25: number[];
  p50: number[];
  p75: number[];
}

/** Spread of downloads across shows, per ranked week and per episode number. */
export interface DownloadPercentiles {
  weekly: { weeks: string[] } & Quartiles;
  episodes: { episodes: number[] } & Quartiles;
}

export interface EpisodeTotal {
  showId: number;
  episode: number;
  downloads: number;
}

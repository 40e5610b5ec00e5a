import type { SeasonConfig } from "./config";
import { utcDay } from "./iso-week";
import type { DownloadPercentiles, EpisodeSeries, EpisodeTotal, Quartiles, ShowSummary, WeekRanking } from "./types";

const EARLY_WINDOW_DAYS = 7;
const ENDURANCE_LAST_ORDINAL = 14;

interface EpisodeStats {
  total: number;
  early: number;
  maxDays: number;
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Per-show totals for the season page. Endurance compares later episodes
 * (2..14, with at least a week of data) to episode 1; latecomers is the share
 * of episode 1 downloads that arrived after its first week.
 */
export function summarizeSeason(series: readonly EpisodeSeries[], rankings: readonly WeekRanking[]): ShowSummary[] {
  const totals = new Map<number, number>();
  const latest = new Map<number, WeekRanking>();
  for (const entry of rankings) {
    totals.set(entry.showId, (totals.get(entry.showId) ?? 0) + entry.downloads);
    const seen = latest.get(entry.showId);
    if (!seen || entry.isoWeek > seen.isoWeek) latest.set(entry.showId, entry);
  }

  const episodes = new Map<number, Map<number, EpisodeStats>>();
  for (const row of series) {
    if (!totals.has(row.showId)) continue;
    let byEpisode = episodes.get(row.showId);
    if (!byEpisode) {
      byEpisode = new Map();
      episodes.set(row.showId, byEpisode);
    }
    const stats = byEpisode.get(row.episode) ?? { total: 0, early: 0, maxDays: 0 };
    stats.total += row.downloadsDaily;
    if (row.daysSinceFirstRelease <= EARLY_WINDOW_DAYS) stats.early += row.downloadsDaily;
    stats.maxDays = Math.max(stats.maxDays, row.daysSinceFirstRelease);
    byEpisode.set(row.episode, stats);
  }

  const summaries: ShowSummary[] = [];
  for (const [showId, totalDownloads] of totals) {
    const byEpisode = episodes.get(showId) ?? new Map<number, EpisodeStats>();
    const numbers = [...byEpisode.keys()].sort((a, b) => a - b);

    let episodeOneDownloads = 0;
    let endurance: number | null = null;
    let latecomers: number | null = null;

    if (numbers.length > 0) {
      const first = numbers[0];
      const firstStats = byEpisode.get(first);
      if (firstStats) {
        episodeOneDownloads = firstStats.total;
        if (firstStats.total > 0) {
          latecomers = round3((firstStats.total - firstStats.early) / firstStats.total);
        }
      }

      const later = numbers
        .filter((ep) => {
          const ordinal = ep - first + 1;
          const stats = byEpisode.get(ep);
          return ordinal >= 2 && ordinal <= ENDURANCE_LAST_ORDINAL && stats !== undefined && stats.maxDays >= EARLY_WINDOW_DAYS;
        })
        .map((ep) => byEpisode.get(ep)?.total ?? 0);

      if (later.length > 0 && episodeOneDownloads > 0) {
        const mean = later.reduce((sum, n) => sum + n, 0) / later.length;
        endurance = round3(mean / episodeOneDownloads);
      }
    }

    summaries.push({
      showId,
      totalDownloads,
      episodesTracked: numbers.length,
      latestRank: latest.get(showId)?.rank ?? null,
      episodeOneDownloads,
      endurance,
      latecomers,
    });
  }

  return summaries.sort((a, b) => b.totalDownloads - a.totalDownloads || a.showId - b.showId);
}

/** Nearest-rank quantile of ascending values. */
export function quantile(sorted: readonly number[], q: number): number {
  return sorted[Math.round(q * (sorted.length - 1))];
}

function quartiles<K>(groups: Map<K, number[]>, keys: readonly K[]): Quartiles {
  const result: Quartiles = { p25: [], p50: [], p75: [] };
  for (const key of keys) {
    const values = [...(groups.get(key) ?? [])].sort((a, b) => a - b);
    result.p25.push(quantile(values, 0.25));
    result.p50.push(quantile(values, 0.5));
    result.p75.push(quantile(values, 0.75));
  }
  return result;
}

function push<K>(groups: Map<K, number[]>, key: K, value: number): void {
  const list = groups.get(key);
  if (list) list.push(value);
  else groups.set(key, [value]);
}

/**
 * Where a show sits against the rest of the season: quartiles of weekly
 * totals per ranked week, and of per-episode totals per episode number over
 * the ranked shows.
 */
export function downloadPercentiles(series: readonly EpisodeSeries[], rankings: readonly WeekRanking[]): DownloadPercentiles {
  const byWeek = new Map<string, number[]>();
  for (const entry of rankings) push(byWeek, entry.isoWeek, entry.downloads);

  const ranked = new Set(rankings.map((r) => r.showId));
  const episodeTotals = new Map<string, { episode: number; total: number }>();
  for (const row of series) {
    if (!ranked.has(row.showId)) continue;
    const key = `${row.showId}:${row.episode}`;
    const seen = episodeTotals.get(key);
    if (seen) seen.total += row.downloadsDaily;
    else episodeTotals.set(key, { episode: row.episode, total: row.downloadsDaily });
  }
  const byEpisode = new Map<number, number[]>();
  for (const { episode, total } of episodeTotals.values()) push(byEpisode, episode, total);

  const weeks = [...byWeek.keys()].sort();
  const episodes = [...byEpisode.keys()].sort((a, b) => a - b);
  return {
    weekly: { weeks, ...quartiles(byWeek, weeks) },
    episodes: { episodes, ...quartiles(byEpisode, episodes) },
  };
}

/** Downloads per (show, episode) on days inside the season's own date range. */
export function episodeTotals(series: readonly EpisodeSeries[], season: SeasonConfig): EpisodeTotal[] {
  const first = utcDay(season.startDate);
  const last = utcDay(season.endDate);
  const totals = new Map<string, EpisodeTotal>();
  for (const row of series) {
    if (row.day < first || row.day > last) continue;
    const key = `${row.showId}:${row.episode}`;
    const seen = totals.get(key);
    if (seen) seen.downloads += row.downloadsDaily;
    else totals.set(key, { showId: row.showId, episode: row.episode, downloads: row.downloadsDaily });
  }
  return [...totals.values()].sort((a, b) => a.showId - b.showId || a.episode - b.episode);
}

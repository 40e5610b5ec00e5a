import type { CatalogIndex } from "./catalog-index";
import type { EngineSettings } from "./config";
import type { EpisodeSeries, WeekRanking } from "./types";
import { addDays, isoWeek, isoWeekStart, previousIsoWeek, utcDay, weekMonday } from "./iso-week";

const FINISHED_STATUSES = new Set(["FINISHED", "CANCELLED"]);

export function isFinished(status: string): boolean {
  return FINISHED_STATUSES.has(status.toUpperCase());
}

/**
 * Monday of the last week a finished show is still ranked: the week of its
 * final air date plus the post-airing buffer. Null means no cutoff applies.
 */
export function cutoffWeekStart(index: CatalogIndex, showId: number, postAiringWeeks: number): string | null {
  const show = index.get(showId);
  if (!show || !show.lastAirDate || !isFinished(show.entry.status)) return null;
  return addDays(weekMonday(utcDay(show.lastAirDate)), postAiringWeeks * 7);
}

function percentChange(current: number, previous: number): number {
  return Math.round(((current - previous) / previous) * 1000) / 10;
}

/**
 * Sum each show's daily downloads into ISO weeks and rank shows within each
 * week. Ties go to the lower show id, so ranks are always 1..N.
 */
export function rank(series: readonly EpisodeSeries[], index: CatalogIndex, settings: EngineSettings): WeekRanking[] {
  const weekly = new Map<string, Map<number, number>>();
  const cutoffs = new Map<number, string | null>();

  for (const row of series) {
    let cutoff = cutoffs.get(row.showId);
    if (cutoff === undefined) {
      cutoff = cutoffWeekStart(index, row.showId, settings.postAiringWeeks);
      cutoffs.set(row.showId, cutoff);
    }

    const week = isoWeek(row.day);
    if (cutoff !== null && isoWeekStart(week) > cutoff) continue;

    let shows = weekly.get(week);
    if (!shows) {
      shows = new Map();
      weekly.set(week, shows);
    }
    shows.set(row.showId, (shows.get(row.showId) ?? 0) + row.downloadsDaily);
  }

  const rankings: WeekRanking[] = [];
  const byWeek = new Map<string, Map<number, WeekRanking>>();

  for (const week of [...weekly.keys()].sort()) {
    const shows = weekly.get(week) ?? new Map<number, number>();
    const ordered = [...shows.entries()].sort((a, b) => b[1] - a[1] || a[0] - b[0]);
    const previous = byWeek.get(previousIsoWeek(week));
    const current = new Map<number, WeekRanking>();

    ordered.forEach(([showId, downloads], i) => {
      const position = i + 1;
      const prior = previous?.get(showId);
      const entry: WeekRanking = {
        isoWeek: week,
        weekStart: isoWeekStart(week),
        showId,
        downloads,
        rank: position,
        rankChange: prior ? prior.rank - position : null,
        isNew: !prior,
        downloadsChangePct: prior && prior.downloads > 0 ? percentChange(downloads, prior.downloads) : null,
      };
      current.set(showId, entry);
      rankings.push(entry);
    });

    byWeek.set(week, current);
  }

  return rankings;
}

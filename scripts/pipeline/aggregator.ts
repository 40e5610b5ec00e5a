import type { EpisodeSeries, Increment, Match, Torrent } from "./types";
import { daysBetween, utcDay } from "./iso-week";

interface EpisodeGroup {
  showId: number;
  episode: number;
  daily: Map<string, number>;
}

export function groupKey(showId: number, episode: number): string {
  return `${showId}:${episode}`;
}

/** UTC day each (show, episode) was first released, keyed by `groupKey`. */
export function releaseDays(matches: readonly Match[], torrents: ReadonlyMap<string, Torrent>): Map<string, string> {
  const days = new Map<string, string>();
  for (const match of matches) {
    const torrent = torrents.get(match.torrentId);
    if (!torrent) continue;
    const key = groupKey(match.showId, match.episode);
    const day = utcDay(torrent.publishedAt);
    const seen = days.get(key);
    if (seen === undefined || day < seen) days.set(key, day);
  }
  return days;
}

/**
 * Fold matched increments into one row per (show, episode, UTC day).
 * Every release of the same episode lands in the same group, so subtitle
 * groups and resolutions add up. Day 0 is the day the episode's first
 * matched torrent was published; increments observed on earlier days are
 * dropped.
 */
export function aggregate(
  matches: readonly Match[],
  torrents: ReadonlyMap<string, Torrent>,
  increments: ReadonlyMap<string, readonly Increment[]>,
): EpisodeSeries[] {
  const groups = new Map<string, EpisodeGroup>();
  const released = releaseDays(matches, torrents);

  for (const match of matches) {
    if (!torrents.has(match.torrentId)) continue;

    const key = groupKey(match.showId, match.episode);
    let group = groups.get(key);
    if (!group) {
      group = { showId: match.showId, episode: match.episode, daily: new Map() };
      groups.set(key, group);
    }

    for (const inc of increments.get(match.torrentId) ?? []) {
      const day = utcDay(inc.observedAt);
      group.daily.set(day, (group.daily.get(day) ?? 0) + inc.increment);
    }
  }

  const sortedGroups = [...groups.values()].sort((a, b) => a.showId - b.showId || a.episode - b.episode);
  const series: EpisodeSeries[] = [];

  for (const group of sortedGroups) {
    const releaseDay = released.get(groupKey(group.showId, group.episode)) ?? "";
    let cumulative = 0;
    for (const day of [...group.daily.keys()].sort()) {
      if (day < releaseDay) continue;
      const downloadsDaily = group.daily.get(day) ?? 0;
      cumulative += downloadsDaily;
      series.push({
        showId: group.showId,
        episode: group.episode,
        day,
        downloadsDaily,
        downloadsCumulative: cumulative,
        daysSinceFirstRelease: daysBetween(releaseDay, day),
      });
    }
  }

  return series;
}

import type { RejectReason, Torrent } from "./types";

export interface FilterOptions {
  trackingStart: Date;
}

/** A torrent that can be attributed to exactly one episode. */
export interface AcceptedTorrent extends Torrent {
  episode: number;
}

export interface RejectedTorrent {
  torrent: Torrent;
  reason: RejectReason;
}

// Season packs that slipped through the parser with a single episode number
const BATCH_MARKERS: RegExp[] = [
  /\bbatch\b/i,
  /\bcomplete\s+(?:series|season|collection|batch)\b/i,
  /[[(]\s*complete\s*[\])]/i,
  /\b(?:full|whole)\s+(?:season|series)\b/i,
  /\bseason\s*pack\b/i,
  /[[(]\s*\d{1,4}\s*[-~]\s*\d{1,4}\s*[\])]/,
  /\b\d{1,4}\s*~\s*\d{1,4}\b/,
];

export function hasBatchMarker(rawTitle: string): boolean {
  return BATCH_MARKERS.some((rx) => rx.test(rawTitle));
}

export function rejectionReason(torrent: Torrent, options: FilterOptions): RejectReason | null {
  if (torrent.parseStatus === "parse_failed") return "parse_failed";
  if (torrent.isRemake) return "remake";
  if (torrent.publishedAt < options.trackingStart) return "before_window";

  const episode = torrent.parsedEpisode;
  if (episode === null) return "missing_episode";
  if (Array.isArray(episode)) return "episode_list";
  if (!Number.isFinite(episode) || episode < 0) return "missing_episode";

  if (hasBatchMarker(torrent.rawTitle)) return "batch_marker";
  return null;
}

export function accept(torrent: Torrent, options: FilterOptions): boolean {
  return rejectionReason(torrent, options) === null;
}

export function filterTorrents(
  torrents: readonly Torrent[],
  options: FilterOptions,
): { accepted: AcceptedTorrent[]; rejected: RejectedTorrent[] } {
  const accepted: AcceptedTorrent[] = [];
  const rejected: RejectedTorrent[] = [];

  for (const torrent of torrents) {
    const reason = rejectionReason(torrent, options);
    const episode = torrent.parsedEpisode;
    if (reason === null && typeof episode === "number") {
      accepted.push({ ...torrent, episode });
    } else {
      rejected.push({ torrent, reason: reason ?? "missing_episode" });
    }
  }

  return { accepted, rejected };
}

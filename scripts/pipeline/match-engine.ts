import { token_sort_ratio } from "fuzzball";
import type { CatalogIndex, IndexedShow } from "./catalog-index";
import type { EngineSettings } from "./config";
import type { AcceptedTorrent } from "./episode-filter";
import type { Match, MatchMethod, MatchOutcome, Unmatched } from "./types";
import { applyTitleCorrection, isInformative, normalize, subtitlePrefix } from "./title-normalizer";

export interface MatchInput {
  torrent: AcceptedTorrent;
  /** Parsed title after corrections, before normalization. */
  title: string;
  key: string;
}

/** One link of the priority chain. Returns null to let the next link try. */
export type MatchStrategy = (input: MatchInput, index: CatalogIndex, settings: EngineSettings) => Match | null;

export interface Candidate {
  show: IndexedShow;
  variant: string;
  score: number;
  seasonBonus: boolean;
}

/**
 * Word-order-insensitive similarity on 0..100: words of both keys sorted,
 * then insertions and deletions scaled by the combined length.
 */
export function tokenSortScore(a: string, b: string): number {
  return token_sort_ratio(a, b);
}

function airDistance(candidate: Candidate, input: MatchInput, index: CatalogIndex): number {
  const aired = index.airDateFor(candidate.show.entry.showId, input.torrent.episode);
  return aired ? Math.abs(aired.getTime() - input.torrent.publishedAt.getTime()) : Number.POSITIVE_INFINITY;
}

/**
 * Equal scores are common when two seasons share a title. Prefer the entry
 * that encodes the torrent's season, then the one airing closest to the
 * release, then the lowest id.
 */
function better(a: Candidate, b: Candidate, input: MatchInput, index: CatalogIndex): boolean {
  if (a.score !== b.score) return a.score > b.score;
  if (a.seasonBonus !== b.seasonBonus) return a.seasonBonus;
  const da = airDistance(a, input, index);
  const db = airDistance(b, input, index);
  if (da !== db) return da < db;
  return a.show.entry.showId < b.show.entry.showId;
}

export function bestCandidate(
  key: string,
  input: MatchInput,
  index: CatalogIndex,
  settings: EngineSettings,
  season: number | null,
): Candidate | null {
  let best: Candidate | null = null;
  // Parsers split "Show S2" into title "Show" and season 2; score the recombined form too.
  const seasonKey = season !== null ? `${key} season ${season}` : null;

  for (const show of index.shows) {
    const bonus = season !== null && show.seasons.has(season);
    for (const variant of show.variants) {
      const raw = seasonKey
        ? Math.max(tokenSortScore(key, variant), tokenSortScore(seasonKey, variant))
        : tokenSortScore(key, variant);
      const candidate: Candidate = {
        show,
        variant,
        score: raw + (bonus ? settings.seasonBonus : 0),
        seasonBonus: bonus,
      };
      if (!best || better(candidate, best, input, index)) best = candidate;
    }
  }

  return best;
}

function toMatch(input: MatchInput, showId: number, method: MatchMethod, score: number, matchedTitle: string): Match {
  return {
    torrentId: input.torrent.id,
    showId,
    episode: input.torrent.episode,
    method,
    score,
    matchedTitle,
  };
}

export const episodeRangeStrategy: MatchStrategy = (input, index, settings) => {
  const ranges = settings.episodeRanges.get(input.key);
  if (!ranges) return null;
  const episode = input.torrent.episode;
  for (const range of ranges) {
    if (episode >= range.minEpisode && episode <= range.maxEpisode && index.has(range.showId)) {
      return toMatch(input, range.showId, "episode_range", 100, index.title(range.showId));
    }
  }
  return null;
};

export const manualOverrideStrategy: MatchStrategy = (input, index, settings) => {
  const showId = settings.titleOverrides.get(input.key);
  if (showId === undefined || !index.has(showId)) return null;
  return toMatch(input, showId, "manual_override", 100, index.title(showId));
};

export const seasonAwareFuzzyStrategy: MatchStrategy = (input, index, settings) => {
  const season = input.torrent.parsedSeason;
  if (season === null || !isInformative(input.key)) return null;
  const best = bestCandidate(input.key, input, index, settings, season);
  // Without the bonus this is an ordinary fuzzy hit; let the fallback label it.
  if (!best || !best.seasonBonus || best.score < settings.fuzzyThreshold) return null;
  return toMatch(input, best.show.entry.showId, "season_aware_fuzzy", best.score, best.variant);
};

export const fuzzyStrategy: MatchStrategy = (input, index, settings) => {
  if (!isInformative(input.key)) return null;
  const best = bestCandidate(input.key, input, index, settings, null);
  if (!best || best.score < settings.fuzzyThreshold) return null;
  return toMatch(input, best.show.entry.showId, "fuzzy", best.score, best.variant);
};

/**
 * Long romanized subtitles ("Title - Some Very Long Subtitle") sink the score;
 * retry overrides and fuzzy matching on the part before the dash.
 */
export const subtitlePrefixStrategy: MatchStrategy = (input, index, settings) => {
  const prefix = subtitlePrefix(input.title);
  if (!prefix) return null;
  const key = normalize(prefix);
  if (key === input.key || key.length < 4 || !isInformative(key)) return null;

  const narrowed: MatchInput = { ...input, title: prefix, key };
  return manualOverrideStrategy(narrowed, index, settings) ?? fuzzyStrategy(narrowed, index, settings);
};

export const DEFAULT_STRATEGIES: readonly MatchStrategy[] = [
  episodeRangeStrategy,
  manualOverrideStrategy,
  seasonAwareFuzzyStrategy,
  fuzzyStrategy,
  subtitlePrefixStrategy,
];

export interface MatchBatch {
  matches: Match[];
  unmatched: Unmatched[];
  methodCounts: Record<MatchMethod, number>;
}

export class MatchEngine {
  constructor(
    private readonly index: CatalogIndex,
    private readonly settings: EngineSettings,
    private readonly strategies: readonly MatchStrategy[] = DEFAULT_STRATEGIES,
  ) {}

  prepare(torrent: AcceptedTorrent): MatchInput {
    const title = applyTitleCorrection(torrent.parsedTitle ?? "", this.settings.titleCorrections);
    return { torrent, title, key: normalize(title) };
  }

  match(torrent: AcceptedTorrent): MatchOutcome {
    const input = this.prepare(torrent);

    for (const strategy of this.strategies) {
      const match = strategy(input, this.index, this.settings);
      if (match) return { kind: "matched", match };
    }

    return { kind: "unmatched", unmatched: this.explain(input) };
  }

  matchAll(torrents: readonly AcceptedTorrent[]): MatchBatch {
    const matches: Match[] = [];
    const unmatched: Unmatched[] = [];
    const methodCounts: Record<MatchMethod, number> = {
      episode_range: 0,
      manual_override: 0,
      season_aware_fuzzy: 0,
      fuzzy: 0,
    };

    for (const torrent of torrents) {
      const outcome = this.match(torrent);
      if (outcome.kind === "matched") {
        matches.push(outcome.match);
        methodCounts[outcome.match.method]++;
      } else {
        unmatched.push(outcome.unmatched);
      }
    }

    return { matches, unmatched, methodCounts };
  }

  private explain(input: MatchInput): Unmatched {
    const pinned = this.pinnedShow(input);
    if (pinned !== null) {
      return {
        torrentId: input.torrent.id,
        reason: "override_target_missing",
        title: input.title,
        score: null,
        bestCandidate: pinned,
      };
    }

    if (!isInformative(input.key)) {
      return {
        torrentId: input.torrent.id,
        reason: "uninformative_title",
        title: input.title,
        score: null,
        bestCandidate: null,
      };
    }

    const best = bestCandidate(input.key, input, this.index, this.settings, null);
    return {
      torrentId: input.torrent.id,
      reason: "below_threshold",
      title: input.title,
      score: best ? best.score : null,
      bestCandidate: best ? best.show.entry.showId : null,
    };
  }

  /** A configured override or range whose show is not in this season's catalog. */
  private pinnedShow(input: MatchInput): number | null {
    const override = this.settings.titleOverrides.get(input.key);
    if (override !== undefined && !this.index.has(override)) return override;
    for (const range of this.settings.episodeRanges.get(input.key) ?? []) {
      const episode = input.torrent.episode;
      if (episode >= range.minEpisode && episode <= range.maxEpisode && !this.index.has(range.showId)) {
        return range.showId;
      }
    }
    return null;
  }
}

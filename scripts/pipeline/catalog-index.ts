import type { ShowCatalogEntry } from "./types";
import { isInformative, normalize, seasonOrdinals } from "./title-normalizer";

export interface IndexedShow {
  entry: ShowCatalogEntry;
  /** Normalized, informative, de-duplicated titles and synonyms. */
  variants: readonly string[];
  /** Season numbers encoded in the show's own canonical titles. */
  seasons: ReadonlySet<number>;
  /** Latest scheduled air date, if the schedule has any. */
  lastAirDate: Date | null;
}

export interface ExcludedShow {
  showId: number;
  title: string;
  reason: "non_episodic_format" | "duplicate_id";
}

/**
 * Read-only view of one season's catalog. Built once per run and shared by
 * every matcher without locking.
 */
export class CatalogIndex {
  readonly shows: readonly IndexedShow[];
  readonly excluded: readonly ExcludedShow[];
  private readonly byId: ReadonlyMap<number, IndexedShow>;

  constructor(entries: readonly ShowCatalogEntry[], nonEpisodicFormats: readonly string[] = []) {
    const blocked = new Set(nonEpisodicFormats.map((f) => f.toUpperCase()));
    const byId = new Map<number, IndexedShow>();
    const excluded: ExcludedShow[] = [];

    const sorted = [...entries].sort((a, b) => a.showId - b.showId);
    for (const entry of sorted) {
      if (byId.has(entry.showId)) {
        excluded.push({ showId: entry.showId, title: entry.titles[0], reason: "duplicate_id" });
        continue;
      }
      if (entry.format && blocked.has(entry.format.toUpperCase())) {
        excluded.push({ showId: entry.showId, title: entry.titles[0], reason: "non_episodic_format" });
        continue;
      }
      byId.set(entry.showId, indexShow(entry));
    }

    this.byId = byId;
    this.shows = Object.freeze([...byId.values()]);
    this.excluded = Object.freeze(excluded);
  }

  get(showId: number): IndexedShow | undefined {
    return this.byId.get(showId);
  }

  has(showId: number): boolean {
    return this.byId.has(showId);
  }

  get size(): number {
    return this.byId.size;
  }

  title(showId: number): string {
    return this.byId.get(showId)?.entry.titles[0] ?? "Unknown";
  }

  /** Air date of one episode, falling back to the show's start date. */
  airDateFor(showId: number, episode: number | null): Date | null {
    const show = this.byId.get(showId);
    if (!show) return null;
    if (episode !== null) {
      const aired = show.entry.airSchedule[String(episode)];
      if (aired) return aired;
    }
    return show.entry.startDate ? new Date(`${show.entry.startDate}T00:00:00Z`) : null;
  }
}

function indexShow(entry: ShowCatalogEntry): IndexedShow {
  const variants = new Set<string>();
  for (const title of [...entry.titles, ...entry.synonyms]) {
    const key = normalize(title);
    if (isInformative(key)) variants.add(key);
  }

  const seasons = new Set<number>();
  for (const title of entry.titles) {
    for (const n of seasonOrdinals(title)) seasons.add(n);
  }

  let lastAirDate: Date | null = null;
  for (const aired of Object.values(entry.airSchedule)) {
    if (!lastAirDate || aired > lastAirDate) lastAirDate = aired;
  }

  return {
    entry,
    variants: Object.freeze([...variants].sort()),
    seasons,
    lastAirDate,
  };
}

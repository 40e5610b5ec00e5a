import * as fs from "fs";
import { z } from "zod";
import { showCatalogEntrySchema, type ShowCatalogEntry } from "../../shared/schema";
import { CatalogFetchError, InputReadError, errorMessage } from "../../shared/errors";
import { DEFAULT_ANILIST_API_URL, type SeasonConfig } from "./config";
import { log, warn } from "./log";

const PER_PAGE = 50;
const MAX_ATTEMPTS = 3;
const BASE_BACKOFF_MS = 1000;
// AniList allows 90 requests a minute; one page a second stays well under it.
const PAGE_DELAY_MS = 1000;

const SEASON_QUERY = `
query ($season: MediaSeason!, $seasonYear: Int!, $page: Int!, $perPage: Int!) {
  Page(page: $page, perPage: $perPage) {
    pageInfo { hasNextPage currentPage }
    media(season: $season, seasonYear: $seasonYear, type: ANIME) {
      id
      title { romaji english native }
      synonyms
      episodes
      status
      format
      startDate { year month day }
      airingSchedule { nodes { episode airingAt } }
      coverImage { large medium color }
    }
  }
}`;

const mediaSchema = z.object({
  id: z.number(),
  title: z.object({
    romaji: z.string().nullish(),
    english: z.string().nullish(),
  }),
  synonyms: z.array(z.string()).nullish(),
  episodes: z.number().nullish(),
  status: z.string().nullish(),
  format: z.string().nullish(),
  startDate: z.object({
    year: z.number().nullish(),
    month: z.number().nullish(),
    day: z.number().nullish(),
  }).nullish(),
  airingSchedule: z.object({
    nodes: z.array(z.object({ episode: z.number(), airingAt: z.number() }).nullable()),
  }).nullish(),
  coverImage: z.object({
    large: z.string().nullish(),
    medium: z.string().nullish(),
    color: z.string().nullish(),
  }).nullish(),
});

const pageResponseSchema = z.object({
  data: z.object({
    Page: z.object({
      pageInfo: z.object({ hasNextPage: z.boolean() }),
      media: z.array(z.unknown()),
    }),
  }),
});

const graphQlErrorSchema = z.object({
  errors: z.array(z.object({ message: z.string() })).min(1),
});

export type AniListMedia = z.infer<typeof mediaSchema>;
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;
export type SleepFn = (ms: number) => Promise<void>;

export interface CatalogClientOptions {
  apiUrl?: string;
  fetch?: FetchFn;
  sleep?: SleepFn;
}

export interface CatalogLoadResult {
  entries: ShowCatalogEntry[];
  invalid: number;
}

const defaultSleep: SleepFn = (ms) => new Promise((r) => setTimeout(r, ms));

function formatDate(date: AniListMedia["startDate"]): string | null {
  if (!date?.year) return null;
  const month = String(date.month ?? 1).padStart(2, "0");
  const day = String(date.day ?? 1).padStart(2, "0");
  return `${date.year}-${month}-${day}`;
}

/** Map an AniList media record onto the catalog shape; validation happens after. */
export function toCatalogEntry(media: AniListMedia): unknown {
  const titles = [media.title.romaji, media.title.english]
    .filter((t): t is string => typeof t === "string" && t.trim().length > 0);

  const airSchedule: Record<string, Date> = {};
  for (const node of media.airingSchedule?.nodes ?? []) {
    if (node) airSchedule[String(node.episode)] = new Date(node.airingAt * 1000);
  }

  const cover = media.coverImage;
  return {
    showId: media.id,
    titles: [...new Set(titles)],
    synonyms: media.synonyms ?? [],
    totalEpisodes: media.episodes ?? null,
    airSchedule,
    status: media.status ?? "",
    format: media.format ?? null,
    startDate: formatDate(media.startDate),
    coverImage: cover ? { url: cover.large ?? cover.medium ?? null, color: cover.color ?? null } : null,
  };
}

function validateEntries(raw: readonly unknown[], source: string): CatalogLoadResult {
  const entries: ShowCatalogEntry[] = [];
  let invalid = 0;
  for (const item of raw) {
    const result = showCatalogEntrySchema.safeParse(item);
    if (result.success) {
      entries.push(result.data);
    } else {
      invalid++;
      const issue = result.error.issues[0];
      warn(`Skipping catalog entry from ${source}: ${issue.path.join(".")} ${issue.message}`, "catalog");
    }
  }
  return { entries, invalid };
}

export class CatalogClient {
  private readonly apiUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly sleep: SleepFn;

  constructor(options: CatalogClientOptions = {}) {
    this.apiUrl = options.apiUrl ?? process.env.ANILIST_API_URL ?? DEFAULT_ANILIST_API_URL;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  async fetchSeason(season: SeasonConfig): Promise<CatalogLoadResult> {
    const media: unknown[] = [];
    let page = 1;

    while (true) {
      log(`Fetching ${season.name} catalog, page ${page}...`, "catalog");
      const data = await this.requestPage({
        season: season.season,
        seasonYear: season.year,
        page,
        perPage: PER_PAGE,
      });
      media.push(...data.media);
      if (!data.pageInfo.hasNextPage) break;
      page++;
      await this.sleep(PAGE_DELAY_MS);
    }

    const mapped: unknown[] = [];
    let invalid = 0;
    for (const item of media) {
      const parsed = mediaSchema.safeParse(item);
      if (parsed.success) {
        mapped.push(toCatalogEntry(parsed.data));
      } else {
        invalid++;
        warn(`Skipping malformed media record on ${season.name}`, "catalog");
      }
    }

    const result = validateEntries(mapped, "AniList");
    log(`Fetched ${result.entries.length} shows for ${season.name}`, "catalog");
    return { entries: result.entries, invalid: invalid + result.invalid };
  }

  /**
   * POST one page. Transient failures (network, 5xx, 429, GraphQL errors) are
   * retried with 1s/2s/4s backoff; a 429 waits at least its Retry-After.
   */
  private async requestPage(variables: Record<string, string | number>) {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      let waitMs = BASE_BACKOFF_MS * 2 ** (attempt - 1);
      try {
        const response = await this.fetchFn(this.apiUrl, {
          method: "POST",
          headers: { "Content-Type": "application/json", Accept: "application/json" },
          body: JSON.stringify({ query: SEASON_QUERY, variables }),
        });

        if (!response.ok) {
          const retryAfter = parseInt(response.headers.get("retry-after") || "0", 10);
          if (response.status === 429 && retryAfter > 0) {
            waitMs = Math.max(waitMs, retryAfter * 1000);
          }
          throw new Error(`HTTP ${response.status}`);
        }

        const body: unknown = await response.json();
        const errors = graphQlErrorSchema.safeParse(body);
        if (errors.success) {
          throw new Error(`GraphQL error: ${errors.data.errors.map((e) => e.message).join("; ")}`);
        }
        const parsed = pageResponseSchema.safeParse(body);
        if (!parsed.success) {
          throw new Error("Unexpected response shape");
        }
        return parsed.data.data.Page;
      } catch (error: unknown) {
        lastError = error;
        if (attempt === MAX_ATTEMPTS) break;
        warn(`AniList request failed (attempt ${attempt}/${MAX_ATTEMPTS}): ${errorMessage(error)}. Retrying in ${waitMs / 1000}s...`, "catalog");
        await this.sleep(waitMs);
      }
    }

    throw new CatalogFetchError(
      `AniList request failed after ${MAX_ATTEMPTS} attempts: ${errorMessage(lastError)}`,
      MAX_ATTEMPTS,
      lastError,
    );
  }
}

/**
 * Read a catalog from a JSON file: either an array of entries or
 * `{ "shows": [...] }`. Bad entries are skipped; an unreadable file is fatal.
 */
export function loadCatalogFile(filePath: string): CatalogLoadResult {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new InputReadError(`Cannot read catalog file ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  const list = z.union([z.array(z.unknown()), z.object({ shows: z.array(z.unknown()) })]).safeParse(data);
  if (!list.success) {
    throw new InputReadError(`Catalog file ${filePath} must hold an array of shows`);
  }
  return validateEntries(Array.isArray(list.data) ? list.data : list.data.shows, filePath);
}

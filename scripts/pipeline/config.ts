import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { ConfigError, errorMessage } from "../../shared/errors";
import { normalize } from "./title-normalizer";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const ROOT_DIR = path.resolve(__dirname, "../..");
export const DEFAULT_CONFIG_FILE = path.join(ROOT_DIR, "config", "engine.json");
export const DEFAULT_OUTPUT_DIR = path.join(ROOT_DIR, "data", "output");
export const DEFAULT_ANILIST_API_URL = "https://graphql.anilist.co";

const seasonSchema = z.object({
  name: z.string().min(1),
  season: z.enum(["WINTER", "SPRING", "SUMMER", "FALL"]),
  year: z.number().int().min(1900),
  startDate: z.coerce.date(),
  endDate: z.coerce.date(),
  // Torrents published before this are ignored; defaults to startDate.
  trackingStart: z.coerce.date().optional(),
}).refine((s) => s.startDate <= s.endDate, { message: "startDate must not be after endDate" });

const episodeRangeSchema = z.object({
  minEpisode: z.number().min(0),
  maxEpisode: z.number().min(0),
  showId: z.number().int().positive(),
}).refine((r) => r.minEpisode <= r.maxEpisode, { message: "minEpisode must not exceed maxEpisode" });

const counterPolicySchema = z.object({
  mode: z.enum(["clamp", "reset_baseline"]).default("clamp"),
  // A drop to at most this fraction of the previous count is treated as a counter reset.
  resetDropRatio: z.number().gt(0).lt(1).default(0.5),
});

const settingsSchema = z.object({
  fuzzyThreshold: z.number().min(0).max(100).default(85),
  seasonBonus: z.number().min(0).default(10),
  postAiringWeeks: z.number().int().min(0).default(4),
  counterPolicy: counterPolicySchema.default({}),
  titleOverrides: z.record(z.string(), z.number().int().positive()).default({}),
  episodeRanges: z.record(z.string(), z.array(episodeRangeSchema)).default({}),
  titleCorrections: z.record(z.string(), z.string()).default({}),
  nonEpisodicFormats: z.array(z.string()).default(["MOVIE", "MUSIC", "SPECIAL"]),
  diagnostics: z.object({
    topRankCutoff: z.number().int().positive().default(30),
    spikeRatio: z.number().gt(1).default(2),
  }).default({}),
});

const engineConfigSchema = settingsSchema.extend({
  seasons: z.array(seasonSchema).min(1),
});

export type SeasonConfig = z.infer<typeof seasonSchema>;
export type CounterPolicy = z.infer<typeof counterPolicySchema>;
export type EpisodeRange = z.infer<typeof episodeRangeSchema>;

/** Title-keyed tables, looked up with titles taken from torrent data. */
export interface TitleTables {
  titleOverrides: ReadonlyMap<string, number>;
  episodeRanges: ReadonlyMap<string, readonly EpisodeRange[]>;
  titleCorrections: ReadonlyMap<string, string>;
}

type WithTables<T> = Omit<T, keyof TitleTables> & TitleTables;

export type EngineSettings = Readonly<WithTables<z.infer<typeof settingsSchema>>>;
export type EngineConfig = Readonly<WithTables<z.infer<typeof engineConfigSchema>>>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = value instanceof Map ? [...value.values()] : Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
  }
  return value;
}

function keyedBy<V>(table: Record<string, V>, key: (raw: string) => string): Map<string, V> {
  const result = new Map<string, V>();
  for (const [raw, value] of Object.entries(table)) {
    result.set(key(raw), value);
  }
  return result;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function prepare<T extends z.infer<typeof settingsSchema>>(parsed: T): WithTables<T> {
  // Override tables are looked up by normalized title, so normalize the keys once here.
  const { titleOverrides, episodeRanges, titleCorrections, ...rest } = parsed;
  return deepFreeze({
    ...rest,
    titleOverrides: keyedBy<number>(titleOverrides, normalize),
    episodeRanges: keyedBy<EpisodeRange[]>(episodeRanges, normalize),
    titleCorrections: keyedBy<string>(titleCorrections, (key) => key.toLowerCase().trim()),
  });
}

export function parseEngineConfig(raw: unknown): EngineConfig {
  const result = engineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid engine config: ${formatIssues(result.error)}`);
  }
  return prepare(result.data);
}

/**
 * Settings without seasons, filled with defaults. Mostly for tests and
 * programmatic use of the engine.
 */
export function buildSettings(overrides: z.input<typeof settingsSchema> = {}): EngineSettings {
  const result = settingsSchema.safeParse(overrides);
  if (!result.success) {
    throw new ConfigError(`Invalid engine settings: ${formatIssues(result.error)}`);
  }
  return prepare(result.data);
}

export function loadEngineConfig(filePath: string = process.env.ENGINE_CONFIG || DEFAULT_CONFIG_FILE): EngineConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read engine config ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Engine config ${filePath} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  return parseEngineConfig(data);
}

export function trackingStart(season: SeasonConfig): Date {
  return season.trackingStart ?? season.startDate;
}

export function seasonSlug(season: SeasonConfig): string {
  return season.name.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-|-$/g, "");
}

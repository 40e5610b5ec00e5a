import pLimit from "p-limit";
import { ConfigError } from "../../shared/errors";
import type { ITorrentStorage } from "../../server/storage";
import { CatalogIndex } from "./catalog-index";
import type { CatalogLoadResult } from "./catalog-client";
import { seasonSlug, trackingStart, type EngineConfig, type SeasonConfig } from "./config";
import { buildDiagnostics, type DiagnosticsReport } from "./diagnostics";
import { runEngine, type EngineResult } from "./engine";
import { exportSeasons } from "./exporter";
import { addDays, dayToDate, utcDay } from "./iso-week";
import { banner, log } from "./log";

export interface CliOptions {
  seasons: string[];
  inputDir?: string;
  catalogFile?: string;
  outputDir?: string;
  threshold?: number;
  concurrency: number;
  help: boolean;
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { seasons: [], concurrency: 2, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (arg === "--season" && args[i + 1]) {
      options.seasons.push(...args[++i].split(",").map((s) => s.trim()).filter(Boolean));
    } else if (arg === "--input-dir" && args[i + 1]) {
      options.inputDir = args[++i];
    } else if (arg === "--catalog-file" && args[i + 1]) {
      options.catalogFile = args[++i];
    } else if (arg === "--output" && args[i + 1]) {
      options.outputDir = args[++i];
    } else if (arg === "--threshold" && args[i + 1]) {
      const value = Number(args[++i]);
      if (!Number.isFinite(value) || value < 0 || value > 100) {
        throw new ConfigError(`--threshold must be a number between 0 and 100, got ${args[i]}`);
      }
      options.threshold = value;
    } else if (arg === "--concurrency" && args[i + 1]) {
      const value = parseInt(args[++i], 10);
      if (!Number.isInteger(value) || value < 1) {
        throw new ConfigError(`--concurrency must be a positive integer, got ${args[i]}`);
      }
      options.concurrency = value;
    } else {
      throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

/** Apply CLI overrides and the `--season` selection to the loaded config. */
export function applyOptions(config: EngineConfig, options: CliOptions): EngineConfig {
  let seasons = config.seasons;
  if (options.seasons.length > 0) {
    const wanted = new Set(options.seasons.map((s) => s.toLowerCase()));
    seasons = config.seasons.filter((s) => wanted.has(s.name.toLowerCase()) || wanted.has(seasonSlug(s)));
    if (seasons.length !== wanted.size) {
      const known = config.seasons.map((s) => seasonSlug(s)).join(", ");
      throw new ConfigError(`Unknown season in --season ${options.seasons.join(",")} (configured: ${known})`);
    }
  }

  if (options.threshold === undefined && seasons === config.seasons) return config;
  return Object.freeze({
    ...config,
    seasons,
    fuzzyThreshold: options.threshold ?? config.fuzzyThreshold,
  });
}

export interface PipelineDeps {
  storage: ITorrentStorage;
  loadCatalog: (season: SeasonConfig) => Promise<CatalogLoadResult>;
  outputDir: string;
}

export interface SeasonRun {
  result: EngineResult;
  diagnostics: DiagnosticsReport;
}

/**
 * Everything for one season up to, not including, writing artifacts.
 * Torrents are read from the tracking start through the end of the
 * post-airing window.
 */
export async function computeSeason(season: SeasonConfig, config: EngineConfig, deps: PipelineDeps): Promise<SeasonRun> {
  const source = seasonSlug(season);

  const catalog = await deps.loadCatalog(season);
  const index = new CatalogIndex(catalog.entries, config.nonEpisodicFormats);
  log(`Catalog: ${index.size} shows indexed, ${index.excluded.length} excluded, ${catalog.invalid} invalid`, source);

  const windowEnd = dayToDate(addDays(utcDay(season.endDate), config.postAiringWeeks * 7 + 1));
  const torrents = await deps.storage.getTorrents({ from: trackingStart(season), to: windowEnd });
  const snapshots = await deps.storage.getSnapshots(torrents.rows.map((t) => t.id));
  log(`Inputs: ${torrents.rows.length} torrents, ${snapshots.rows.length} snapshots`, source);

  const result = runEngine({
    season,
    settings: config,
    index,
    torrents: torrents.rows,
    snapshots: snapshots.rows,
  });

  log(
    `Matched ${result.matches.length}/${result.accepted.length} accepted torrents ` +
      `(${result.rejected.length} rejected, ${result.unmatched.length} unmatched)`,
    source,
  );
  log(`Ranked ${new Set(result.rankings.map((r) => r.showId)).size} shows over ${new Set(result.rankings.map((r) => r.isoWeek)).size} weeks`, source);

  const diagnostics = buildDiagnostics(result, {
    torrents: torrents.rows.length,
    snapshots: snapshots.rows.length,
    invalidTorrentRows: torrents.invalidRows,
    invalidSnapshotRows: snapshots.invalidRows,
  });

  return { result, diagnostics };
}

/**
 * Compute every season, then write them. Nothing is written unless every
 * season computed successfully, and a failed write leaves the previous
 * output in place for all of them.
 */
export async function runPipeline(config: EngineConfig, deps: PipelineDeps, concurrency = 2): Promise<string[]> {
  banner(`COMPUTE: ${config.seasons.map((s) => s.name).join(", ")}`);
  const limit = pLimit(concurrency);
  const runs = await Promise.all(config.seasons.map((season) => limit(() => computeSeason(season, config, deps))));

  banner("EXPORT");
  const written = exportSeasons(runs, deps.outputDir);
  for (const dir of written) {
    log(`Wrote ${dir}`, "export");
  }
  return written;
}

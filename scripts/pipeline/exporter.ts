import * as fs from "fs";
import * as path from "path";
import { ExportError, errorMessage } from "../../shared/errors";
import { seasonSlug } from "./config";
import type { DiagnosticsReport } from "./diagnostics";
import type { EngineResult } from "./engine";

export const ARTIFACTS = {
  series: "episode-series.csv",
  rankings: "rankings.json",
  summary: "season-summary.json",
  episodes: "episode-totals.json",
  diagnostics: "diagnostics.json",
} as const;

const SERIES_HEADERS = [
  "showId",
  "title",
  "episode",
  "day",
  "downloadsDaily",
  "downloadsCumulative",
  "daysSinceFirstRelease",
];

function escapeCsvField(value: unknown): string {
  const str = String(value ?? "");
  return str.includes(",") || str.includes('"') || str.includes("\n")
    ? `"${str.replace(/"/g, '""')}"` : str;
}

function toCsvRow(headers: string[], obj: Record<string, unknown>): string {
  return headers.map(h => escapeCsvField(obj[h])).join(",");
}

function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export function renderEpisodeSeries(result: EngineResult): string {
  const lines = [SERIES_HEADERS.join(",")];
  for (const row of result.series) {
    lines.push(toCsvRow(SERIES_HEADERS, { ...row, title: result.index.title(row.showId) }));
  }
  return `${lines.join("\n")}\n`;
}

export function renderRankings(result: EngineResult): string {
  const weeks: Array<{ week: string; startDate: string; rankings: unknown[] }> = [];
  for (const entry of result.rankings) {
    let week = weeks[weeks.length - 1];
    if (!week || week.week !== entry.isoWeek) {
      week = { week: entry.isoWeek, startDate: entry.weekStart, rankings: [] };
      weeks.push(week);
    }
    week.rankings.push({
      rank: entry.rank,
      showId: entry.showId,
      title: result.index.title(entry.showId),
      downloads: entry.downloads,
      rankChange: entry.rankChange,
      isNew: entry.isNew,
      downloadsChangePct: entry.downloadsChangePct,
    });
  }
  return toJson({ season: seasonSlug(result.season), weeks });
}

export function renderSummary(result: EngineResult): string {
  const shows = result.summary.map((s) => {
    const entry = result.index.get(s.showId)?.entry;
    return {
      showId: s.showId,
      title: result.index.title(s.showId),
      status: entry?.status ?? null,
      totalEpisodes: entry?.totalEpisodes ?? null,
      coverImage: entry?.coverImage ?? null,
      totalDownloads: s.totalDownloads,
      episodesTracked: s.episodesTracked,
      latestRank: s.latestRank,
      episodeOneDownloads: s.episodeOneDownloads,
      endurance: s.endurance,
      latecomers: s.latecomers,
    };
  });
  return toJson({ season: seasonSlug(result.season), shows, percentiles: result.percentiles });
}

export function renderEpisodeTotals(result: EngineResult): string {
  return toJson({ season: seasonSlug(result.season), episodes: result.episodeTotals });
}

export interface SeasonArtifacts {
  result: EngineResult;
  diagnostics: DiagnosticsReport;
}

interface SeasonPaths {
  target: string;
  staging: string;
  previous: string;
}

function pathsFor(result: EngineResult, outputDir: string): SeasonPaths {
  const target = path.join(outputDir, seasonSlug(result.season));
  return { target, staging: `${target}.staging`, previous: `${target}.previous` };
}

function stage(run: SeasonArtifacts, paths: SeasonPaths): void {
  const contents: Array<[string, string]> = [
    [ARTIFACTS.series, renderEpisodeSeries(run.result)],
    [ARTIFACTS.rankings, renderRankings(run.result)],
    [ARTIFACTS.summary, renderSummary(run.result)],
    [ARTIFACTS.episodes, renderEpisodeTotals(run.result)],
    [ARTIFACTS.diagnostics, toJson(run.diagnostics)],
  ];

  fs.rmSync(paths.staging, { recursive: true, force: true });
  fs.mkdirSync(paths.staging, { recursive: true });
  for (const [name, body] of contents) {
    fs.writeFileSync(path.join(paths.staging, name), body);
  }
}

function restore(paths: SeasonPaths, replaced: boolean): void {
  fs.rmSync(paths.target, { recursive: true, force: true });
  if (replaced) fs.renameSync(paths.previous, paths.target);
}

/**
 * Write each season's artifacts to `<outputDir>/<season>/`. Every season is
 * staged before any directory is replaced, and a failed replacement puts the
 * already swapped seasons back, so readers see the old sets or the new ones.
 */
export function exportSeasons(runs: readonly SeasonArtifacts[], outputDir: string): string[] {
  const seasons = runs.map((run) => ({ run, paths: pathsFor(run.result, outputDir) }));
  const swapped: Array<{ paths: SeasonPaths; replaced: boolean }> = [];
  let current = outputDir;

  try {
    for (const { run, paths } of seasons) {
      current = paths.target;
      stage(run, paths);
    }

    for (const { paths } of seasons) {
      current = paths.target;
      fs.rmSync(paths.previous, { recursive: true, force: true });
      const replaced = fs.existsSync(paths.target);
      if (replaced) fs.renameSync(paths.target, paths.previous);
      swapped.push({ paths, replaced });
      fs.renameSync(paths.staging, paths.target);
    }
  } catch (error) {
    for (const { paths, replaced } of swapped.reverse()) {
      restore(paths, replaced);
    }
    for (const { paths } of seasons) {
      if (fs.existsSync(paths.staging)) fs.rmSync(paths.staging, { recursive: true, force: true });
    }
    throw new ExportError(`Failed to write artifacts to ${current}: ${errorMessage(error)}`, { cause: error });
  }

  for (const { paths } of seasons) {
    fs.rmSync(paths.previous, { recursive: true, force: true });
  }
  return seasons.map(({ paths }) => paths.target);
}

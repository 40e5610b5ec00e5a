import "dotenv/config";
import { DatabaseStorage, JsonFileStorage, type ITorrentStorage } from "../../server/storage";
import { closeDb } from "../../server/db";
import { ConfigError, errorMessage } from "../../shared/errors";
import { CatalogClient, loadCatalogFile } from "./catalog-client";
import { DEFAULT_OUTPUT_DIR, loadEngineConfig, type SeasonConfig } from "./config";
import { applyOptions, parseArgs, runPipeline } from "./runner";

function printUsage() {
  console.log(`
EPISODE POPULARITY PIPELINE

Matches tracked torrents to a season's catalog, turns download counters
into per-episode daily series and ranks shows week by week.

USAGE:
  npx tsx scripts/pipeline/run-pipeline.ts [options]

OPTIONS:
  --season <name>        Only run these seasons (comma-separated names or slugs)
  --input-dir <dir>      Read torrents.json / snapshots.json instead of PostgreSQL
  --catalog-file <file>  Read the catalog from a JSON file instead of AniList
  --output <dir>         Output directory (default: PIPELINE_OUTPUT_DIR or data/output)
  --threshold <n>        Fuzzy match threshold, 0-100 (default from config)
  --concurrency <n>      Seasons computed in parallel (default: 2)
  -h, --help             Show this help

ENVIRONMENT:
  DATABASE_URL           PostgreSQL connection string (unless --input-dir)
  ANILIST_API_URL        Catalog GraphQL endpoint
  PIPELINE_OUTPUT_DIR    Default output directory
  ENGINE_CONFIG          Path to the engine config (default: config/engine.json)
`);
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    printUsage();
    return;
  }

  const config = applyOptions(loadEngineConfig(), options);

  let storage: ITorrentStorage;
  if (options.inputDir) {
    storage = new JsonFileStorage(options.inputDir);
  } else if (process.env.DATABASE_URL) {
    storage = new DatabaseStorage();
  } else {
    throw new ConfigError("Either --input-dir or DATABASE_URL is required");
  }

  const catalogFile = options.catalogFile;
  const client = new CatalogClient();
  const loadCatalog = catalogFile
    ? async () => loadCatalogFile(catalogFile)
    : (season: SeasonConfig) => client.fetchSeason(season);

  const outputDir = options.outputDir || process.env.PIPELINE_OUTPUT_DIR || DEFAULT_OUTPUT_DIR;

  const pipelineStart = Date.now();
  try {
    const written = await runPipeline(config, { storage, loadCatalog, outputDir }, options.concurrency);
    const totalElapsed = ((Date.now() - pipelineStart) / 1000).toFixed(1);

    console.log(`\n${"=".repeat(60)}`);
    console.log("PIPELINE COMPLETE");
    console.log(`${"=".repeat(60)}`);
    console.log(`Total time: ${totalElapsed}s\n`);
    for (const dir of written) {
      console.log(`  [OK] ${dir}`);
    }
    console.log("");
  } finally {
    await closeDb();
  }
}

main().catch((error: unknown) => {
  console.error(`Pipeline error: ${errorMessage(error)}`);
  process.exit(1);
});

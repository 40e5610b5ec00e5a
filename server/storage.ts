import fs from "fs/promises";
import path from "path";
import {
  torrents, torrentSnapshots,
  insertTorrentSchema, insertTorrentSnapshotSchema,
  toParseStatus,
  type Torrent, type Snapshot, type InsertTorrent, type InsertTorrentSnapshot,
} from "@shared/schema";
import { InputReadError, errorMessage } from "@shared/errors";
import { getDb } from "./db";
import { and, asc, gte, inArray, lte, type SQL } from "drizzle-orm";

export interface PublishRange {
  from?: Date;
  to?: Date;
}

export interface LoadResult<T> {
  rows: T[];
  /** Rows that failed validation and were skipped. */
  invalidRows: number;
}

export interface ITorrentStorage {
  getTorrents(range: PublishRange): Promise<LoadResult<Torrent>>;
  /** Snapshots for the given torrents, ordered by torrent id then observation time. */
  getSnapshots(torrentIds: string[]): Promise<LoadResult<Snapshot>>;
}

const SNAPSHOT_QUERY_CHUNK = 1000;

function inRange(publishedAt: Date, range: PublishRange): boolean {
  if (range.from && publishedAt < range.from) return false;
  if (range.to && publishedAt > range.to) return false;
  return true;
}

function compareSnapshots(a: Snapshot, b: Snapshot): number {
  if (a.torrentId !== b.torrentId) return a.torrentId < b.torrentId ? -1 : 1;
  return a.observedAt.getTime() - b.observedAt.getTime();
}

function toTorrent(row: InsertTorrent): Torrent {
  return {
    id: row.id,
    rawTitle: row.rawTitle,
    publishedAt: row.publishedAt,
    parsedTitle: row.parsedTitle ?? null,
    parsedEpisode: row.parsedEpisode ?? null,
    parsedSeason: row.parsedSeason ?? null,
    parseStatus: toParseStatus(row.parseStatus),
    isRemake: row.isRemake ?? false,
  };
}

function toSnapshot(row: InsertTorrentSnapshot): Snapshot {
  return {
    torrentId: row.torrentId,
    observedAt: row.observedAt,
    downloads: row.downloads,
  };
}

export class DatabaseStorage implements ITorrentStorage {
  async getTorrents(range: PublishRange): Promise<LoadResult<Torrent>> {
    const conditions: SQL[] = [];
    if (range.from) conditions.push(gte(torrents.publishedAt, range.from));
    if (range.to) conditions.push(lte(torrents.publishedAt, range.to));

    let rows;
    try {
      rows = await getDb()
        .select()
        .from(torrents)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(asc(torrents.id));
    } catch (error) {
      throw new InputReadError(`Failed to read torrents: ${errorMessage(error)}`, { cause: error });
    }

    const result: Torrent[] = [];
    let invalidRows = 0;
    for (const row of rows) {
      const parsed = insertTorrentSchema.safeParse(row);
      if (parsed.success) {
        result.push(toTorrent(parsed.data));
      } else {
        invalidRows++;
      }
    }
    return { rows: result, invalidRows };
  }

  async getSnapshots(torrentIds: string[]): Promise<LoadResult<Snapshot>> {
    const result: Snapshot[] = [];
    let invalidRows = 0;

    for (let i = 0; i < torrentIds.length; i += SNAPSHOT_QUERY_CHUNK) {
      const chunk = torrentIds.slice(i, i + SNAPSHOT_QUERY_CHUNK);
      let rows;
      try {
        rows = await getDb()
          .select({
            torrentId: torrentSnapshots.torrentId,
            observedAt: torrentSnapshots.observedAt,
            downloads: torrentSnapshots.downloads,
          })
          .from(torrentSnapshots)
          .where(inArray(torrentSnapshots.torrentId, chunk))
          .orderBy(asc(torrentSnapshots.torrentId), asc(torrentSnapshots.observedAt));
      } catch (error) {
        throw new InputReadError(`Failed to read snapshots: ${errorMessage(error)}`, { cause: error });
      }

      for (const row of rows) {
        const parsed = insertTorrentSnapshotSchema.safeParse(row);
        if (parsed.success) {
          result.push(toSnapshot(parsed.data));
        } else {
          invalidRows++;
        }
      }
    }

    result.sort(compareSnapshots);
    return { rows: result, invalidRows };
  }
}

/**
 * Reads `torrents.json` and `snapshots.json` (arrays of rows shaped like the
 * database tables) from a directory. Handy for offline runs and fixtures.
 */
export class JsonFileStorage implements ITorrentStorage {
  constructor(private readonly dir: string) {}

  private async readArray(fileName: string): Promise<unknown[]> {
    const filePath = path.join(this.dir, fileName);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      throw new InputReadError(`Cannot read ${filePath}: ${errorMessage(error)}`, { cause: error });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new InputReadError(`Invalid JSON in ${filePath}: ${errorMessage(error)}`, { cause: error });
    }

    if (!Array.isArray(data)) {
      throw new InputReadError(`${filePath} must contain a JSON array`);
    }
    return data;
  }

  async getTorrents(range: PublishRange): Promise<LoadResult<Torrent>> {
    const data = await this.readArray("torrents.json");
    const rows: Torrent[] = [];
    let invalidRows = 0;

    for (const item of data) {
      const parsed = insertTorrentSchema.safeParse(item);
      if (!parsed.success) {
        invalidRows++;
        continue;
      }
      const torrent = toTorrent(parsed.data);
      if (inRange(torrent.publishedAt, range)) rows.push(torrent);
    }

    rows.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return { rows, invalidRows };
  }

  async getSnapshots(torrentIds: string[]): Promise<LoadResult<Snapshot>> {
    const data = await this.readArray("snapshots.json");
    const wanted = new Set(torrentIds);
    const rows: Snapshot[] = [];
    let invalidRows = 0;

    for (const item of data) {
      const parsed = insertTorrentSnapshotSchema.safeParse(item);
      if (!parsed.success) {
        invalidRows++;
        continue;
      }
      if (wanted.has(parsed.data.torrentId)) rows.push(toSnapshot(parsed.data));
    }

    rows.sort(compareSnapshots);
    return { rows, invalidRows };
  }
}

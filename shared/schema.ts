import { pgTable, text, integer, timestamp, boolean, jsonb, index, primaryKey } from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export type ParsedEpisode = number | number[] | null;

export const torrents = pgTable("torrents", {
  id: text("id").primaryKey(),
  rawTitle: text("raw_title").notNull(),
  publishedAt: timestamp("published_at", { withTimezone: true, mode: "date" }).notNull(),
  parsedTitle: text("parsed_title"),
  parsedEpisode: jsonb("parsed_episode").$type<ParsedEpisode>(),
  parsedSeason: integer("parsed_season"),
  parseStatus: text("parse_status").notNull().default("ok"),
  isRemake: boolean("is_remake").notNull().default(false),
  releaseGroup: text("release_group"),
  resolution: text("resolution"),
}, (table) => [
  index("idx_torrents_published_at").on(table.publishedAt),
  index("idx_torrents_parse_status").on(table.parseStatus),
]);

export const torrentSnapshots = pgTable("torrent_snapshots", {
  torrentId: text("torrent_id").notNull().references(() => torrents.id),
  observedAt: timestamp("observed_at", { withTimezone: true, mode: "date" }).notNull(),
  downloads: integer("downloads").notNull(),
  seeders: integer("seeders"),
  leechers: integer("leechers"),
}, (table) => [
  primaryKey({ columns: [table.torrentId, table.observedAt] }),
  index("idx_torrent_snapshots_observed_at").on(table.observedAt),
]);

export const torrentsRelations = relations(torrents, ({ many }) => ({
  snapshots: many(torrentSnapshots),
}));

export const torrentSnapshotsRelations = relations(torrentSnapshots, ({ one }) => ({
  torrent: one(torrents, { fields: [torrentSnapshots.torrentId], references: [torrents.id] }),
}));

const parsedEpisodeSchema = z.union([z.number(), z.array(z.number()), z.null()]);

// Rows read from JSON exports carry ISO strings where the database hands back Dates.
export const insertTorrentSchema = createInsertSchema(torrents, {
  id: z.string().min(1),
  publishedAt: z.coerce.date(),
  parsedEpisode: parsedEpisodeSchema.optional(),
  parseStatus: z.enum(["ok", "parse_failed"]).optional(),
});

export const insertTorrentSnapshotSchema = createInsertSchema(torrentSnapshots, {
  torrentId: z.string().min(1),
  observedAt: z.coerce.date(),
  downloads: z.number().int().nonnegative(),
});

export type TorrentRow = typeof torrents.$inferSelect;
export type InsertTorrent = z.infer<typeof insertTorrentSchema>;
export type TorrentSnapshotRow = typeof torrentSnapshots.$inferSelect;
export type InsertTorrentSnapshot = z.infer<typeof insertTorrentSnapshotSchema>;

// Catalog entries as the engine consumes them, independent of the provider's wire shape.
export const showCatalogEntrySchema = z.object({
  showId: z.number().int().positive(),
  titles: z.array(z.string().min(1)).min(1),
  synonyms: z.array(z.string()).default([]),
  totalEpisodes: z.number().int().positive().nullable().default(null),
  airSchedule: z.record(z.string(), z.coerce.date()).default({}),
  status: z.string().min(1),
  format: z.string().nullable().default(null),
  startDate: z.string().nullable().default(null),
  coverImage: z.object({
    url: z.string().nullable(),
    color: z.string().nullable(),
  }).nullable().default(null),
});

export type ShowCatalogEntry = z.infer<typeof showCatalogEntrySchema>;

export type ParseStatus = "ok" | "parse_failed";

export interface Torrent {
  id: string;
  rawTitle: string;
  publishedAt: Date;
  parsedTitle: string | null;
  parsedEpisode: ParsedEpisode;
  parsedSeason: number | null;
  parseStatus: ParseStatus;
  isRemake: boolean;
}

export interface Snapshot {
  torrentId: string;
  observedAt: Date;
  downloads: number;
}

export function toParseStatus(value: string | null | undefined): ParseStatus {
  return value === "parse_failed" ? "parse_failed" : "ok";
}

import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";

let pool: pg.Pool | null = null;
let instance: NodePgDatabase<typeof schema> | null = null;

/**
 * Lazily connect so runs that read JSON inputs never need DATABASE_URL.
 */
export function getDb(): NodePgDatabase<typeof schema> {
  if (instance) return instance;

  if (!process.env.DATABASE_URL) {
    throw new Error("DATABASE_URL must be set to read torrents from PostgreSQL");
  }

  pool = new pg.Pool({ connectionString: process.env.DATABASE_URL });
  instance = drizzle(pool, { schema });
  return instance;
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    instance = null;
  }
}

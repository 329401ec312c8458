import { readFile } from "fs/promises";
import pg from "pg";
import type { Pool } from "pg";
import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import type { PgDatabase } from "drizzle-orm/pg-core";
import * as schema from "./schema.js";

export type KeyturnDatabase = NodePgDatabase<typeof schema>;

/** The pooled database or a transaction opened on it. */
export type KeyturnExecutor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

export interface DatabaseOptions {
  connectionString: string;
  /** Pool size (default: 10) */
  max?: number;
}

export interface DatabaseHandle {
  db: KeyturnDatabase;
  pool: Pool;
  /** Round-trip check for readiness probes. */
  ping(): Promise<void>;
  close(): Promise<void>;
}

export function createDatabase(options: DatabaseOptions): DatabaseHandle {
  const pool = new pg.Pool({ connectionString: options.connectionString, max: options.max ?? 10 });
  const db = drizzle(pool, { schema });

  return {
    db,
    pool,
    async ping() {
      await pool.query("SELECT 1");
    },
    async close() {
      await pool.end();
    },
  };
}

export const SCHEMA_SQL_URL = new URL("../sql/schema.sql", import.meta.url);

/**
 * Create the tables and indexes if they do not exist yet.
 */
export async function applySchema(pool: Pick<Pool, "query">): Promise<void> {
  const sql = await readFile(SCHEMA_SQL_URL, "utf8");
  await pool.query(sql);
}

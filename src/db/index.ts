import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import { ConfigError } from "../core/errors.js";
import * as schema from "./schema.js";

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

let handle: { pool: pg.Pool; db: Database } | null = null;

export function getDb(): Database {
  if (!handle) {
    const connectionString = process.env.DATABASE_URL;
    if (!connectionString) throw new ConfigError("DATABASE_URL is not set");

    const pool = new Pool({ connectionString });
    handle = { pool, db: drizzle(pool, { schema }) };
  }
  return handle.db;
}

export async function closeDb(): Promise<void> {
  if (handle) {
    const { pool } = handle;
    handle = null;
    await pool.end();
  }
}

export { schema };

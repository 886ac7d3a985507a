import { sql } from "drizzle-orm";
import { getDb } from "./index.js";

// One-time provisioning. Every statement is create-if-absent, so running it
// on each start is harmless.
const STATEMENTS = [
  sql`CREATE TABLE IF NOT EXISTS feeds (
    id text PRIMARY KEY,
    user_id text NOT NULL,
    pledge_id bigint,
    created_at bigint NOT NULL,
    expires_at bigint NOT NULL,
    item_id text NOT NULL,
    provider varchar(20) NOT NULL,
    source_type varchar(20) NOT NULL,
    source_url text NOT NULL,
    title text NOT NULL,
    item_url text NOT NULL,
    description text NOT NULL DEFAULT '',
    cover_art text NOT NULL DEFAULT '',
    author text NOT NULL DEFAULT '',
    pub_date timestamptz,
    updated_at timestamptz NOT NULL,
    quality varchar(10) NOT NULL,
    page_size integer NOT NULL,
    episodes jsonb NOT NULL
  )`,
  sql`ALTER TABLE feeds ADD COLUMN IF NOT EXISTS pledge_id bigint`,
  sql`CREATE INDEX IF NOT EXISTS feeds_user_created_idx ON feeds (user_id, created_at)`,
  sql`CREATE INDEX IF NOT EXISTS feeds_expires_at_idx ON feeds (expires_at)`,
  sql`CREATE TABLE IF NOT EXISTS pledges (
    id bigint PRIMARY KEY,
    user_id text NOT NULL,
    expires_at bigint NOT NULL,
    tier varchar(50) NOT NULL
  )`,
  sql`CREATE INDEX IF NOT EXISTS pledges_expires_at_idx ON pledges (expires_at)`,
];

export async function ensureSchema(): Promise<void> {
  const db = getDb();
  for (const statement of STATEMENTS) {
    await db.execute(statement);
  }
}

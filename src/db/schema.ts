import {
  pgTable,
  text,
  varchar,
  bigint,
  integer,
  timestamp,
  jsonb,
  index,
} from "drizzle-orm/pg-core";
import type { Item, Provider, Quality, SourceType } from "../core/types.js";

export const FEEDS_TABLE = "feeds";
export const PLEDGES_TABLE = "pledges";
export const FEED_USER_INDEX = "feeds_user_created_idx";
export const FEED_EXPIRY_INDEX = "feeds_expires_at_idx";
export const PLEDGE_EXPIRY_INDEX = "pledges_expires_at_idx";

// Name of the TTL attribute on both tables (epoch seconds).
export const TTL_ATTRIBUTE = "expires_at";

// ── Feeds ────────────────────────────────────────────────────────

export const feeds = pgTable(
  FEEDS_TABLE,
  {
    id: text("id").primaryKey(),
    userId: text("user_id").notNull(),
    pledgeId: bigint("pledge_id", { mode: "number" }),
    createdAt: bigint("created_at", { mode: "number" }).notNull(),
    expiresAt: bigint(TTL_ATTRIBUTE, { mode: "number" }).notNull(),
    itemId: text("item_id").notNull(),
    provider: varchar("provider", { length: 20 }).notNull().$type<Provider>(),
    sourceType: varchar("source_type", { length: 20 }).notNull().$type<SourceType>(),
    sourceUrl: text("source_url").notNull(),
    title: text("title").notNull(),
    itemUrl: text("item_url").notNull(),
    description: text("description").notNull().default(""),
    coverArt: text("cover_art").notNull().default(""),
    author: text("author").notNull().default(""),
    pubDate: timestamp("pub_date", { withTimezone: true }),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
    quality: varchar("quality", { length: 10 }).notNull().$type<Quality>(),
    pageSize: integer("page_size").notNull(),
    episodes: jsonb("episodes").notNull().$type<Item[]>(),
  },
  (t) => [
    index(FEED_USER_INDEX).on(t.userId, t.createdAt),
    index(FEED_EXPIRY_INDEX).on(t.expiresAt),
  ],
);

// ── Pledges ──────────────────────────────────────────────────────

export const pledges = pgTable(
  PLEDGES_TABLE,
  {
    id: bigint("id", { mode: "number" }).primaryKey(),
    userId: text("user_id").notNull(),
    expiresAt: bigint(TTL_ATTRIBUTE, { mode: "number" }).notNull(),
    tier: varchar("tier", { length: 50 }).notNull(),
  },
  (t) => [index(PLEDGE_EXPIRY_INDEX).on(t.expiresAt)],
);

import { asc, eq, lte } from "drizzle-orm";
import { Feed } from "../core/types.js";
import { getDb, schema } from "../db/index.js";

export interface FeedStore {
  put(feed: Feed): Promise<void>;
  get(id: string): Promise<Feed | null>;
  delete(id: string): Promise<void>;
  /** Feed ids of a user, oldest first. May lag a very recent write. */
  listForUser(userId: string): Promise<string[]>;
  /** Removes feeds whose TTL attribute is at or before `now` (epoch seconds). */
  purgeExpired(now: number): Promise<number>;
}

export class PgFeedStore implements FeedStore {
  async put(feed: Feed): Promise<void> {
    const db = getDb();
    const row = feedToRow(feed);
    await db
      .insert(schema.feeds)
      .values(row)
      .onConflictDoUpdate({ target: schema.feeds.id, set: row });
  }

  async get(id: string): Promise<Feed | null> {
    const db = getDb();
    const [row] = await db
      .select()
      .from(schema.feeds)
      .where(eq(schema.feeds.id, id))
      .limit(1);
    return row ? rowToFeed(row) : null;
  }

  async delete(id: string): Promise<void> {
    const db = getDb();
    await db.delete(schema.feeds).where(eq(schema.feeds.id, id));
  }

  async listForUser(userId: string): Promise<string[]> {
    const db = getDb();
    // Served from feeds_user_created_idx; only key columns are read.
    const rows = await db
      .select({ id: schema.feeds.id })
      .from(schema.feeds)
      .where(eq(schema.feeds.userId, userId))
      .orderBy(asc(schema.feeds.createdAt));
    return rows.map((r) => r.id);
  }

  async purgeExpired(now: number): Promise<number> {
    const db = getDb();
    const deleted = await db
      .delete(schema.feeds)
      .where(lte(schema.feeds.expiresAt, now))
      .returning({ id: schema.feeds.id });
    return deleted.length;
  }
}

function feedToRow(feed: Feed): typeof schema.feeds.$inferInsert {
  return {
    id: feed.id,
    userId: feed.userId,
    pledgeId: feed.pledgeId,
    createdAt: feed.createdAt,
    expiresAt: feed.expiresAt,
    itemId: feed.itemId,
    provider: feed.provider,
    sourceType: feed.sourceType,
    sourceUrl: feed.sourceUrl,
    title: feed.title,
    itemUrl: feed.itemUrl,
    description: feed.description,
    coverArt: feed.coverArt,
    author: feed.author,
    pubDate: feed.pubDate ? new Date(feed.pubDate) : null,
    updatedAt: new Date(feed.updatedAt),
    quality: feed.quality,
    pageSize: feed.pageSize,
    episodes: feed.episodes,
  };
}

function rowToFeed(row: typeof schema.feeds.$inferSelect): Feed {
  return {
    id: row.id,
    itemId: row.itemId,
    provider: row.provider,
    sourceType: row.sourceType,
    sourceUrl: row.sourceUrl,
    title: row.title,
    itemUrl: row.itemUrl,
    description: row.description,
    coverArt: row.coverArt,
    author: row.author,
    pubDate: row.pubDate?.toISOString() ?? "",
    updatedAt: row.updatedAt.toISOString(),
    quality: row.quality,
    pageSize: row.pageSize,
    episodes: row.episodes,
    userId: row.userId,
    pledgeId: row.pledgeId,
    createdAt: row.createdAt,
    expiresAt: row.expiresAt,
  };
}

// ── In-memory store (local mode and tests) ───────────────────────

export class InMemoryFeedStore implements FeedStore {
  private feeds = new Map<string, Feed>();

  async put(feed: Feed): Promise<void> {
    this.feeds.set(feed.id, structuredClone(feed));
  }

  async get(id: string): Promise<Feed | null> {
    const feed = this.feeds.get(id);
    return feed ? structuredClone(feed) : null;
  }

  async delete(id: string): Promise<void> {
    this.feeds.delete(id);
  }

  async listForUser(userId: string): Promise<string[]> {
    return [...this.feeds.values()]
      .filter((f) => f.userId === userId)
      .sort((a, b) => a.createdAt - b.createdAt || a.id.localeCompare(b.id))
      .map((f) => f.id);
  }

  async purgeExpired(now: number): Promise<number> {
    let purged = 0;
    for (const [id, feed] of this.feeds) {
      if (feed.expiresAt <= now) {
        this.feeds.delete(id);
        purged++;
      }
    }
    return purged;
  }
}

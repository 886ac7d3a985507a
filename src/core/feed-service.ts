import { createHash } from "node:crypto";
import { feedConfigSchema } from "../config.js";
import { FeedStore } from "../stores/feed-store.js";
import { PledgeStore } from "../stores/pledge-store.js";
import { nowSeconds } from "../stores/ttl-sweeper.js";
import { ConfigError, NotFoundError } from "./errors.js";
import { FeedBuilder } from "./feed-builder.js";
import { Feed, FeedConfig, Pledge, Quality } from "./types.js";

const DAY_SECONDS = 24 * 60 * 60;

export function feedId(userId: string, url: string): string {
  return createHash("sha256").update(`${userId}\n${url}`).digest("base64url").slice(0, 16);
}

export interface FeedServiceOptions {
  ttlDays?: number;
  freePageSize?: number;
}

export interface CreateFeedParams {
  url: string;
  quality?: Quality;
  pageSize?: number;
  pledgeId?: number;
}

export class FeedService {
  private ttlSeconds: number;
  private freePageSize: number;

  constructor(
    private builder: FeedBuilder,
    private feeds: FeedStore,
    private pledges: PledgeStore,
    options: FeedServiceOptions = {},
  ) {
    this.ttlSeconds = Math.round((options.ttlDays ?? 90) * DAY_SECONDS);
    this.freePageSize = options.freePageSize ?? 50;
  }

  // ── Assembly ─────────────────────────────────────────────────

  async createFeed(userId: string, params: CreateFeedParams): Promise<Feed> {
    const parsed = feedConfigSchema.safeParse(params);
    if (!parsed.success) {
      throw new ConfigError(`Invalid feed config: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }

    const pledgeId = params.pledgeId ?? null;
    const entitled = await this.isEntitled(userId, pledgeId);
    const config = entitled ? parsed.data : this.freeTier(parsed.data);
    return this.assemble(feedId(userId, config.url), userId, pledgeId, config);
  }

  // Entitlement is checked again: a pledge that lapsed since the last build
  // drops the feed to the free tier.
  async refreshFeed(id: string): Promise<Feed> {
    const existing = await this.feeds.get(id);
    if (!existing) throw new NotFoundError(`Feed not found: ${id}`);

    const stored: FeedConfig = {
      url: existing.sourceUrl,
      quality: existing.quality,
      pageSize: existing.pageSize,
    };
    const entitled = await this.isEntitled(existing.userId, existing.pledgeId);
    const config = entitled ? stored : this.freeTier(stored);
    return this.assemble(id, existing.userId, existing.pledgeId, config);
  }

  // Re-assembly replaces the whole record; only ownership and creation time carry over.
  private async assemble(id: string, userId: string, pledgeId: number | null, config: FeedConfig): Promise<Feed> {
    const assembled = await this.builder.build(config);
    const existing = await this.feeds.get(id);
    const now = nowSeconds();

    const feed: Feed = {
      ...assembled,
      id,
      userId,
      pledgeId,
      createdAt: existing?.createdAt ?? now,
      expiresAt: now + this.ttlSeconds,
    };
    await this.feeds.put(feed);
    return feed;
  }

  // ── Reads and deletes ────────────────────────────────────────

  async getFeed(id: string): Promise<Feed | null> {
    return this.feeds.get(id);
  }

  async listFeeds(userId: string): Promise<string[]> {
    return this.feeds.listForUser(userId);
  }

  async deleteFeed(id: string): Promise<void> {
    const existing = await this.feeds.get(id);
    if (!existing) throw new NotFoundError(`Feed not found: ${id}`);
    await this.feeds.delete(id);
  }

  async getPledge(id: number): Promise<Pledge | null> {
    return this.pledges.get(id);
  }

  // ── Entitlement ──────────────────────────────────────────────

  private async isEntitled(userId: string, pledgeId: number | null): Promise<boolean> {
    if (pledgeId === null) return false;
    const pledge = await this.pledges.get(pledgeId);
    return pledge !== null && pledge.userId === userId && pledge.expiresAt > nowSeconds();
  }

  private freeTier(config: FeedConfig): FeedConfig {
    return { ...config, quality: "low", pageSize: Math.min(config.pageSize, this.freePageSize) };
  }

  async downgradeUser(userId: string): Promise<number> {
    let changed = 0;
    for (const id of await this.feeds.listForUser(userId)) {
      const feed = await this.feeds.get(id);
      if (!feed) continue;
      if (feed.quality === "low" && feed.pageSize <= this.freePageSize) continue;

      await this.feeds.put({ ...feed, quality: "low", pageSize: Math.min(feed.pageSize, this.freePageSize) });
      changed++;
    }
    return changed;
  }

  async sweepLapsedPledges(now = nowSeconds()): Promise<number> {
    const lapsed = await this.pledges.listLapsed(now);
    const users = new Set(lapsed.map((p) => p.userId));
    let changed = 0;
    for (const userId of users) {
      changed += await this.downgradeUser(userId);
    }
    return changed;
  }
}

import { AppConfig } from "./config.js";
import { AdapterRegistry } from "./core/adapter-registry.js";
import { FeedBuilder } from "./core/feed-builder.js";
import { FeedService } from "./core/feed-service.js";
import { VimeoAdapter } from "./adapters/vimeo.js";
import { ensureSchema } from "./db/bootstrap.js";
import { closeDb } from "./db/index.js";
import { FeedStore, InMemoryFeedStore, PgFeedStore } from "./stores/feed-store.js";
import { InMemoryPledgeStore, PgPledgeStore, PledgeStore } from "./stores/pledge-store.js";
import { TtlSweeper } from "./stores/ttl-sweeper.js";

export interface Services {
  feedService: FeedService;
  sweeper: TtlSweeper;
  close(): Promise<void>;
}

export async function createServices(config: AppConfig): Promise<Services> {
  const adapters = new AdapterRegistry();
  adapters.register(new VimeoAdapter(config.vimeoToken));

  // ── Stores: PostgreSQL when configured, in-memory otherwise ───

  let feeds: FeedStore;
  let pledges: PledgeStore;
  if (config.databaseUrl) {
    await ensureSchema();
    feeds = new PgFeedStore();
    pledges = new PgPledgeStore();
  } else {
    console.error("DATABASE_URL not set; using in-memory stores");
    feeds = new InMemoryFeedStore();
    pledges = new InMemoryPledgeStore();
  }

  const feedService = new FeedService(new FeedBuilder(adapters), feeds, pledges, {
    ttlDays: config.feedTtlDays,
    freePageSize: config.freePageSize,
  });
  const sweeper = new TtlSweeper({ feeds, pledges });

  return {
    feedService,
    sweeper,
    async close() {
      await closeDb();
    },
  };
}

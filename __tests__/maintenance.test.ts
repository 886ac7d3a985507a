import { ConfigError } from "../src/core/errors.js";
import { AdapterRegistry } from "../src/core/adapter-registry.js";
import { FeedBuilder } from "../src/core/feed-builder.js";
import { FeedService } from "../src/core/feed-service.js";
import { MaintenanceReport, MaintenanceScheduler, runMaintenance } from "../src/maintenance.js";
import { InMemoryFeedStore } from "../src/stores/feed-store.js";
import { InMemoryPledgeStore } from "../src/stores/pledge-store.js";
import { TtlSweeper, nowSeconds } from "../src/stores/ttl-sweeper.js";
import { StubAdapter, makeFeed, makeHeader, makePage } from "./helpers/fixtures.js";

const REPORT: MaintenanceReport = { refreshed: 1, failed: 0, downgraded: 2, purged: { feeds: 3, pledges: 0 } };

describe("runMaintenance", () => {
  let errorSpy: jest.SpyInstance;
  let feeds: InMemoryFeedStore;
  let pledges: InMemoryPledgeStore;
  let service: FeedService;
  let sweeper: TtlSweeper;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const registry = new AdapterRegistry();
    registry.register(new StubAdapter(makeHeader(), [makePage(1, 2, false)]));
    feeds = new InMemoryFeedStore();
    pledges = new InMemoryPledgeStore();
    service = new FeedService(new FeedBuilder(registry), feeds, pledges);
    sweeper = new TtlSweeper({ feeds, pledges });
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it("refreshes sources, downgrades lapsed users, then purges expired records", async () => {
    await pledges.put({ id: 7, userId: "lapsed", expiresAt: 1500, tier: "gold" });
    await feeds.put(makeFeed({ id: "kept", userId: "lapsed", quality: "high" }));
    await feeds.put(makeFeed({ id: "old", userId: "someone", expiresAt: 10 }));

    const report = await runMaintenance(
      service,
      sweeper,
      [
        { userId: "u1", url: "https://vimeo.com/channels/staffpicks", quality: "low", pageSize: 10 },
        { userId: "u1", url: "https://www.youtube.com/watch?v=abc", quality: "low", pageSize: 10 },
      ],
      2000,
    );

    expect(report).toEqual({ refreshed: 1, failed: 1, downgraded: 1, purged: { feeds: 1, pledges: 1 } });
    expect((await feeds.get("kept"))?.quality).toBe("low");
    expect(await feeds.get("old")).toBeNull();
    expect(await service.listFeeds("u1")).toHaveLength(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("downgrades a lapsed user before the pledge is purged", async () => {
    await pledges.put({ id: 7, userId: "member", expiresAt: nowSeconds() + 60, tier: "gold" });
    const feed = await service.createFeed("member", {
      url: "https://vimeo.com/channels/staffpicks",
      quality: "high",
      pageSize: 80,
      pledgeId: 7,
    });
    const later = nowSeconds() + 120;

    const first = await runMaintenance(service, sweeper, [], later);
    const second = await runMaintenance(service, sweeper, [], later);

    expect(first).toEqual({ refreshed: 0, failed: 0, downgraded: 1, purged: { feeds: 0, pledges: 1 } });
    expect(second).toEqual({ refreshed: 0, failed: 0, downgraded: 0, purged: { feeds: 0, pledges: 0 } });
    expect(await pledges.get(7)).toBeNull();
    expect(await feeds.get(feed.id)).toMatchObject({ quality: "low", pageSize: 50 });
  });
});

describe("MaintenanceScheduler", () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it("runs the job and logs its report", async () => {
    const scheduler = new MaintenanceScheduler(async () => REPORT);

    expect(await scheduler.tick()).toEqual(REPORT);
    expect(errorSpy).toHaveBeenCalledWith(
      "Maintenance done: 1 refreshed, 0 failed, 2 downgraded, purged feeds=3, pledges=0",
    );
  });

  it("skips a tick while the previous one is still running", async () => {
    let finish: (report: MaintenanceReport) => void = () => undefined;
    const job = jest.fn(
      () =>
        new Promise<MaintenanceReport>((resolve) => {
          finish = resolve;
        }),
    );
    const scheduler = new MaintenanceScheduler(job);

    const first = scheduler.tick();
    expect(await scheduler.tick()).toBeNull();
    finish(REPORT);

    expect(await first).toEqual(REPORT);
    expect(job).toHaveBeenCalledTimes(1);
  });

  it("logs a failed run and keeps going", async () => {
    const failure = new Error("database unavailable");
    const job = jest.fn<Promise<MaintenanceReport>, []>().mockRejectedValueOnce(failure).mockResolvedValueOnce(REPORT);
    const scheduler = new MaintenanceScheduler(job);

    expect(await scheduler.tick()).toBeNull();
    expect(errorSpy).toHaveBeenCalledWith("Maintenance failed:", failure);
    expect(await scheduler.tick()).toEqual(REPORT);
  });

  it("refuses an invalid schedule", () => {
    const scheduler = new MaintenanceScheduler(async () => REPORT);

    expect(() => scheduler.start("every now and then")).toThrow(ConfigError);
  });
});

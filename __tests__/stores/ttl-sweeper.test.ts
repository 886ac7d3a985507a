import { InMemoryFeedStore } from "../../src/stores/feed-store.js";
import { InMemoryPledgeStore } from "../../src/stores/pledge-store.js";
import { TtlSweeper } from "../../src/stores/ttl-sweeper.js";
import { makeFeed } from "../helpers/fixtures.js";

describe("TtlSweeper", () => {
  it("purges every target and reports counts per target", async () => {
    const feeds = new InMemoryFeedStore();
    const pledges = new InMemoryPledgeStore();
    await feeds.put(makeFeed({ id: "a", expiresAt: 100 }));
    await feeds.put(makeFeed({ id: "b", expiresAt: 200 }));
    await feeds.put(makeFeed({ id: "c", expiresAt: 900 }));
    await pledges.put({ id: 1, userId: "user-1", expiresAt: 150, tier: "gold" });

    const sweeper = new TtlSweeper({ feeds, pledges });

    expect(await sweeper.runOnce(500)).toEqual({ feeds: 2, pledges: 1 });
    expect(await sweeper.runOnce(500)).toEqual({ feeds: 0, pledges: 0 });
    expect(await feeds.listForUser("user-1")).toEqual(["c"]);
  });
});

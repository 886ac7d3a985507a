import { renderFeed, renderFeedList, renderPledge } from "../../src/mcp/render.js";
import { makeFeed } from "../helpers/fixtures.js";

describe("render", () => {
  it("renders a feed with its episodes", () => {
    const feed = makeFeed({
      author: "Curation Team",
      expiresAt: 0,
      episodes: [
        {
          id: "1",
          title: "Long one",
          description: "",
          duration: 3725,
          size: 1,
          pubDate: "",
          thumbnail: "",
          videoUrl: "https://vimeo.com/1",
        },
      ],
    });

    expect(renderFeed(feed)).toBe(
      "Staff Picks (id: feed-1)\n" +
        '  Source: vimeo channel "staffpicks" — https://vimeo.com/channels/staffpicks\n' +
        "  Author: Curation Team | Quality: high | Page size: 50\n" +
        "  Updated: 2024-01-01T00:00:00.000Z | Expires: 1970-01-01T00:00:00.000Z\n" +
        "  Episodes: 1\n" +
        "  [1] Long one (1:02:05)\n" +
        "      https://vimeo.com/1",
    );
  });

  it("notes episodes beyond the limit", () => {
    const episode = {
      id: "1",
      title: "Short",
      description: "",
      duration: 65,
      size: 1,
      pubDate: "",
      thumbnail: "",
      videoUrl: "https://vimeo.com/1",
    };
    const text = renderFeed(makeFeed({ episodes: [episode, episode, episode] }), 2);

    expect(text.endsWith("  [2] Short (1:05)\n      https://vimeo.com/1\n  … 1 more")).toBe(true);
  });

  it("renders feed lists", () => {
    expect(renderFeedList("u1", [])).toBe('No feeds for user "u1".');
    expect(renderFeedList("u1", ["a", "b"])).toBe("1. a\n2. b");
  });

  it("renders a pledge", () => {
    expect(renderPledge({ id: 42, userId: "u1", expiresAt: 0, tier: "gold" })).toBe(
      "Pledge 42 (user: u1, tier: gold)\n  Expires: 1970-01-01T00:00:00.000Z",
    );
  });
});

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { errorMessage } from "../core/errors.js";
import { FeedService } from "../core/feed-service.js";
import { renderFeed, renderFeedList, renderPledge } from "./render.js";

function text(value: string) {
  return { content: [{ type: "text" as const, text: value }] };
}

function failure(err: unknown) {
  return text(`Error: ${errorMessage(err)}`);
}

export function registerTools(server: McpServer, feedService: FeedService): void {
  // ── build_feed ────────────────────────────────────────────────

  server.tool(
    "build_feed",
    "Assemble a podcast feed from a Vimeo channel, group or user link and store it. Re-running for the same user and link overwrites the stored feed.",
    {
      user_id: z.string().min(1).describe("Owner of the feed"),
      url: z.string().min(1).describe("Vimeo link, e.g. https://vimeo.com/channels/staffpicks"),
      quality: z.enum(["low", "high"]).optional().describe("Artwork and media quality (default high, needs an active pledge)"),
      page_size: z.number().int().min(1).optional().describe("Episode cutoff (default 50)"),
      pledge_id: z.number().int().optional().describe("Pledge granting elevated quality"),
    },
    async (params) => {
      try {
        const feed = await feedService.createFeed(params.user_id, {
          url: params.url,
          quality: params.quality,
          pageSize: params.page_size,
          pledgeId: params.pledge_id,
        });
        return text(renderFeed(feed));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── get_feed ──────────────────────────────────────────────────

  server.tool(
    "get_feed",
    "Show a stored feed and its latest episodes.",
    {
      feed_id: z.string().describe("Feed id returned by build_feed"),
      max_episodes: z.number().int().min(1).max(100).optional().describe("Episodes to list (default 10)"),
    },
    async (params) => {
      try {
        const feed = await feedService.getFeed(params.feed_id);
        if (!feed) return text(`Feed not found: ${params.feed_id}`);
        return text(renderFeed(feed, params.max_episodes));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── list_feeds ────────────────────────────────────────────────

  server.tool(
    "list_feeds",
    "List a user's feed ids, oldest first.",
    {
      user_id: z.string().min(1).describe("Owner of the feeds"),
    },
    async (params) => {
      try {
        const ids = await feedService.listFeeds(params.user_id);
        return text(renderFeedList(params.user_id, ids));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── refresh_feed ──────────────────────────────────────────────

  server.tool(
    "refresh_feed",
    "Re-assemble a stored feed from its source, replacing the stored copy.",
    {
      feed_id: z.string().describe("ID of the feed to refresh"),
    },
    async (params) => {
      try {
        const feed = await feedService.refreshFeed(params.feed_id);
        return text(renderFeed(feed));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── delete_feed ───────────────────────────────────────────────

  server.tool(
    "delete_feed",
    "Remove a stored feed.",
    {
      feed_id: z.string().describe("ID of the feed to delete"),
    },
    async (params) => {
      try {
        await feedService.deleteFeed(params.feed_id);
        return text(`Deleted feed "${params.feed_id}".`);
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── get_pledge ────────────────────────────────────────────────

  server.tool(
    "get_pledge",
    "Look up a pledge by its numeric id.",
    {
      pledge_id: z.number().int().describe("Pledge id"),
    },
    async (params) => {
      try {
        const pledge = await feedService.getPledge(params.pledge_id);
        return text(pledge ? renderPledge(pledge) : `Pledge not found: ${params.pledge_id}`);
      } catch (err) {
        return failure(err);
      }
    },
  );
}

import { Feed, Pledge } from "../core/types.js";

function formatDuration(seconds: number): string {
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  const mm = String(m).padStart(2, "0");
  const ss = String(s).padStart(2, "0");
  return h > 0 ? `${h}:${mm}:${ss}` : `${m}:${ss}`;
}

function formatEpoch(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

export function renderFeed(feed: Feed, maxEpisodes = 10): string {
  const header =
    `${feed.title} (id: ${feed.id})\n` +
    `  Source: ${feed.provider} ${feed.sourceType} "${feed.itemId}" — ${feed.itemUrl}\n` +
    `  Author: ${feed.author || "unknown"} | Quality: ${feed.quality} | Page size: ${feed.pageSize}\n` +
    `  Updated: ${feed.updatedAt} | Expires: ${formatEpoch(feed.expiresAt)}\n` +
    `  Episodes: ${feed.episodes.length}`;

  if (feed.episodes.length === 0) return header;

  const shown = feed.episodes.slice(0, maxEpisodes).map(
    (ep, i) => `  [${i + 1}] ${ep.title} (${formatDuration(ep.duration)})\n      ${ep.videoUrl}`,
  );
  const more = feed.episodes.length > maxEpisodes ? `\n  … ${feed.episodes.length - maxEpisodes} more` : "";
  return `${header}\n${shown.join("\n")}${more}`;
}

export function renderFeedList(userId: string, ids: string[]): string {
  if (ids.length === 0) return `No feeds for user "${userId}".`;
  return ids.map((id, i) => `${i + 1}. ${id}`).join("\n");
}

export function renderPledge(pledge: Pledge): string {
  return `Pledge ${pledge.id} (user: ${pledge.userId}, tier: ${pledge.tier})\n  Expires: ${formatEpoch(pledge.expiresAt)}`;
}

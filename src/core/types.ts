// ── Feed entity ───────────────────────────────────────────────────

export type SourceType = "channel" | "group" | "user";
export type Quality = "low" | "high";
export type Provider = "vimeo";

export const SOURCE_TYPES: readonly SourceType[] = ["channel", "group", "user"];

export interface Item {
  id: string;
  title: string;
  description: string;
  duration: number;
  size: number;
  pubDate: string;
  thumbnail: string;
  videoUrl: string;
}

export interface Feed {
  id: string;
  itemId: string;
  provider: Provider;
  sourceType: SourceType;
  sourceUrl: string;
  title: string;
  itemUrl: string;
  description: string;
  coverArt: string;
  author: string;
  pubDate: string;
  updatedAt: string;
  quality: Quality;
  pageSize: number;
  episodes: Item[];

  // Store attributes (epoch seconds)
  userId: string;
  /** Pledge the feed was requested under; re-checked on every refresh. */
  pledgeId: number | null;
  createdAt: number;
  expiresAt: number;
}

export interface FeedConfig {
  url: string;
  quality: Quality;
  pageSize: number;
}

// ── Pledge entity ─────────────────────────────────────────────────

export interface Pledge {
  id: number;
  userId: string;
  expiresAt: number;
  tier: string;
}

// ── Link classification ───────────────────────────────────────────

export type LinkType = SourceType | "video";

export interface LinkInfo {
  provider: Provider;
  linkType: LinkType;
  itemId: string;
}

// ── Platform adapter contract ─────────────────────────────────────

export interface ImageSize {
  link: string;
  width: number;
  height: number;
}

export interface SourceHeader {
  title: string;
  link: string;
  description: string;
  pictures: ImageSize[];
  author: string;
  createdAt: string;
}

export interface Video {
  id: string;
  title: string;
  description: string;
  link: string;
  duration: number;
  width: number;
  height: number;
  createdAt: string;
  pictures: ImageSize[];
}

export interface VideoPage {
  videos: Video[];
  nextPage: string | null;
}

export interface PlatformAdapter {
  readonly provider: Provider;
  readonly pageSize: number;

  queryMetadata(sourceType: SourceType, id: string): Promise<SourceHeader>;
  listVideos(sourceType: SourceType, id: string, page: number, pageSize: number): Promise<VideoPage>;
}

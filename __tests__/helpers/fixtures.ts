import {
  Feed,
  ImageSize,
  PlatformAdapter,
  SourceHeader,
  SourceType,
  Video,
  VideoPage,
} from "../../src/core/types.js";

export const SMALL: ImageSize = { link: "https://i.vimeocdn.com/small.jpg", width: 100, height: 75 };
export const LARGE: ImageSize = { link: "https://i.vimeocdn.com/large.jpg", width: 1920, height: 1080 };

export function makeHeader(overrides: Partial<SourceHeader> = {}): SourceHeader {
  return {
    title: "Staff Picks",
    link: "https://vimeo.com/channels/staffpicks",
    description: "Hand-picked videos",
    pictures: [SMALL, LARGE],
    author: "Curation Team",
    createdAt: "2010-05-01T12:00:00+00:00",
    ...overrides,
  };
}

export function makeVideo(n: number, overrides: Partial<Video> = {}): Video {
  return {
    id: String(1000 + n),
    title: `Video ${n}`,
    description: `Description ${n}`,
    link: `https://vimeo.com/${1000 + n}`,
    duration: 60,
    width: 640,
    height: 360,
    createdAt: "2024-01-01T00:00:00+00:00",
    pictures: [SMALL, LARGE],
    ...overrides,
  };
}

export function makePage(from: number, count: number, hasNext: boolean): VideoPage {
  const videos = Array.from({ length: count }, (_, i) => makeVideo(from + i));
  return { videos, nextPage: hasNext ? `/next?page=${from + count}` : null };
}

interface VideoCall {
  sourceType: SourceType;
  id: string;
  page: number;
  pageSize: number;
}

/** Scripted adapter: pages[n - 1] answers page n; an Error entry is thrown. */
export class StubAdapter implements PlatformAdapter {
  readonly provider = "vimeo";
  readonly metadataCalls: Array<{ sourceType: SourceType; id: string }> = [];
  readonly videoCalls: VideoCall[] = [];

  constructor(
    public header: SourceHeader | Error,
    public pages: Array<VideoPage | Error>,
    readonly pageSize = 50,
  ) {}

  async queryMetadata(sourceType: SourceType, id: string): Promise<SourceHeader> {
    this.metadataCalls.push({ sourceType, id });
    if (this.header instanceof Error) throw this.header;
    return this.header;
  }

  async listVideos(sourceType: SourceType, id: string, page: number, pageSize: number): Promise<VideoPage> {
    this.videoCalls.push({ sourceType, id, page, pageSize });
    const result = this.pages[page - 1];
    if (!result) throw new Error(`unexpected request for page ${page}`);
    if (result instanceof Error) throw result;
    return result;
  }
}

export function makeFeed(overrides: Partial<Feed> = {}): Feed {
  return {
    id: "feed-1",
    itemId: "staffpicks",
    provider: "vimeo",
    sourceType: "channel",
    sourceUrl: "https://vimeo.com/channels/staffpicks",
    title: "Staff Picks",
    itemUrl: "https://vimeo.com/channels/staffpicks",
    description: "",
    coverArt: "",
    author: "",
    pubDate: "2010-05-01T12:00:00.000Z",
    updatedAt: "2024-01-01T00:00:00.000Z",
    quality: "high",
    pageSize: 50,
    episodes: [],
    userId: "user-1",
    pledgeId: null,
    createdAt: 100,
    expiresAt: 9_999_999_999,
    ...overrides,
  };
}

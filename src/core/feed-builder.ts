import { AdapterRegistry } from "./adapter-registry.js";
import { NotFoundError, TransientError, UnsupportedError, errorMessage, withContext } from "./errors.js";
import { parseLink } from "./link.js";
import { approximateSize, selectImage } from "./media.js";
import {
  Feed,
  FeedConfig,
  Item,
  LinkType,
  PlatformAdapter,
  SOURCE_TYPES,
  SourceHeader,
  SourceType,
  VideoPage,
} from "./types.js";

/** A freshly assembled feed, before the store stamps ownership and expiry. */
export type AssembledFeed = Omit<Feed, "id" | "userId" | "pledgeId" | "createdAt" | "expiresAt">;

function isSourceType(linkType: LinkType): linkType is SourceType {
  return SOURCE_TYPES.some((t) => t === linkType);
}

export class FeedBuilder {
  constructor(private adapters: AdapterRegistry) {}

  async build(config: FeedConfig): Promise<AssembledFeed> {
    const link = parseLink(config.url);
    if (!isSourceType(link.linkType)) {
      throw new UnsupportedError(`unsupported feed type: ${link.linkType}`);
    }
    const sourceType = link.linkType;
    const adapter = this.adapters.get(link.provider);

    const header = await this.queryHeader(adapter, sourceType, link.itemId);
    const episodes = await this.queryEpisodes(adapter, sourceType, link.itemId, config);

    return {
      itemId: link.itemId,
      provider: link.provider,
      sourceType,
      sourceUrl: config.url,
      title: header.title,
      itemUrl: header.link,
      description: header.description,
      coverArt: selectImage(header.pictures, config.quality),
      author: header.author,
      pubDate: header.createdAt,
      updatedAt: new Date().toISOString(),
      quality: config.quality,
      pageSize: config.pageSize,
      episodes,
    };
  }

  private async queryHeader(adapter: PlatformAdapter, sourceType: SourceType, id: string): Promise<SourceHeader> {
    try {
      return await adapter.queryMetadata(sourceType, id);
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw new NotFoundError(`missing ${sourceType} with id "${id}"`, { cause: err });
      }
      throw withContext(err, `failed to query ${sourceType} with id "${id}"`);
    }
  }

  // The cutoff is checked only after a whole page has been appended, so one
  // full page is always taken even when pageSize is smaller than a page.
  private async queryEpisodes(
    adapter: PlatformAdapter,
    sourceType: SourceType,
    id: string,
    config: FeedConfig,
  ): Promise<Item[]> {
    const episodes: Item[] = [];
    let page = 1;

    for (;;) {
      let result: VideoPage;
      try {
        result = await adapter.listVideos(sourceType, id, page, adapter.pageSize);
      } catch (err) {
        const status = err instanceof TransientError ? err.status : err instanceof NotFoundError ? 404 : undefined;
        const code = err instanceof TransientError ? err.code : undefined;
        throw new TransientError(`failed to query videos (page ${page}): ${errorMessage(err)}`, {
          status,
          code,
          cause: err,
        });
      }

      for (const video of result.videos) {
        episodes.push({
          id: video.id,
          title: video.title,
          description: video.description,
          duration: video.duration,
          size: approximateSize(video.duration, video.width, video.height),
          pubDate: video.createdAt,
          thumbnail: selectImage(video.pictures, config.quality),
          videoUrl: video.link,
        });
      }

      if (episodes.length >= config.pageSize || !result.nextPage) {
        return episodes;
      }
      page++;
    }
  }
}

import { z } from "zod";
import { classify, TransientError, UpstreamResponse } from "../core/errors.js";
import {
  ImageSize,
  PlatformAdapter,
  SourceHeader,
  SourceType,
  Video,
  VideoPage,
} from "../core/types.js";

const API_BASE = "https://api.vimeo.com";
export const VIMEO_PAGE_SIZE = 50;

// ── Response shapes ───────────────────────────────────────────

const pictureSchema = z.object({
  link: z.string(),
  width: z.number(),
  height: z.number(),
});

const picturesSchema = z
  .object({ sizes: z.array(pictureSchema).default([]) })
  .nullish();

// Vimeo sends ISO 8601 with an offset; stored dates are normalized to UTC
// so every store returns the same text.
const timestampSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value).toISOString());

const collectionSchema = z.object({
  name: z.string(),
  link: z.string(),
  description: z.string().nullish(),
  pictures: picturesSchema,
  user: z.object({ name: z.string() }).nullish(),
  created_time: timestampSchema,
});

const userSchema = z.object({
  name: z.string(),
  link: z.string(),
  bio: z.string().nullish(),
  pictures: picturesSchema,
  created_time: timestampSchema,
});

const videoSchema = z.object({
  uri: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  link: z.string(),
  duration: z.number(),
  width: z.number(),
  height: z.number(),
  created_time: timestampSchema,
  pictures: picturesSchema,
});

const videoPageSchema = z.object({
  data: z.array(videoSchema),
  paging: z.object({ next: z.string().nullable() }).nullish(),
});

const errorBodySchema = z.object({
  error: z.string().optional(),
  developer_message: z.string().optional(),
  error_code: z.union([z.number(), z.string()]).optional(),
});

type Pictures = z.infer<typeof picturesSchema>;

function sizesOf(pictures: Pictures): ImageSize[] {
  return pictures?.sizes ?? [];
}

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown, what: string): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new TransientError(`unexpected ${what} response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}

// ── Per source type endpoints ─────────────────────────────────

const COLLECTION_PATHS: Record<SourceType, string> = {
  channel: "/channels",
  group: "/groups",
  user: "/users",
};

const HEADER_PARSERS: Record<SourceType, (body: unknown) => SourceHeader> = {
  channel: (body) => collectionHeader(parseBody(collectionSchema, body, "channel")),
  group: (body) => collectionHeader(parseBody(collectionSchema, body, "group")),
  user: (body) => {
    const user = parseBody(userSchema, body, "user");
    return {
      title: user.name,
      link: user.link,
      description: user.bio ?? "",
      pictures: sizesOf(user.pictures),
      author: user.name,
      createdAt: user.created_time,
    };
  },
};

function collectionHeader(c: z.infer<typeof collectionSchema>): SourceHeader {
  return {
    title: c.name,
    link: c.link,
    description: c.description ?? "",
    pictures: sizesOf(c.pictures),
    author: c.user?.name ?? "",
    createdAt: c.created_time,
  };
}

function normalizeVideo(v: z.infer<typeof videoSchema>): Video {
  const segments = v.uri.split("/").filter(Boolean);
  return {
    id: segments[segments.length - 1] ?? v.uri,
    title: v.name,
    description: v.description ?? "",
    link: v.link,
    duration: v.duration,
    width: v.width,
    height: v.height,
    createdAt: v.created_time,
    pictures: sizesOf(v.pictures),
  };
}

function describeError(raw: string): { message: string; code?: string } {
  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch {
    return { message: raw.slice(0, 200) };
  }
  const parsed = errorBodySchema.safeParse(body);
  if (!parsed.success) return { message: raw.slice(0, 200) };
  const { error, developer_message, error_code } = parsed.data;
  return {
    message: error ?? developer_message ?? "",
    code: error_code !== undefined ? String(error_code) : undefined,
  };
}

// ── Adapter ───────────────────────────────────────────────────

export class VimeoAdapter implements PlatformAdapter {
  readonly provider = "vimeo";
  readonly pageSize = VIMEO_PAGE_SIZE;

  constructor(private token: string) {}

  private async request(path: string, query: Record<string, string> = {}): Promise<unknown> {
    const url = new URL(path, API_BASE);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }

    let resp: Response;
    try {
      resp = await fetch(url, {
        headers: {
          Authorization: `bearer ${this.token}`,
          Accept: "application/vnd.vimeo.*+json;version=3.4",
        },
      });
    } catch (err) {
      throw classify(err);
    }

    if (!resp.ok) {
      const { message, code } = describeError(await resp.text());
      const response: UpstreamResponse = { status: resp.status, statusText: resp.statusText, code };
      throw classify(new Error(`Vimeo API ${resp.status}: ${message}`), response);
    }

    return resp.json();
  }

  async queryMetadata(sourceType: SourceType, id: string): Promise<SourceHeader> {
    const body = await this.request(`${COLLECTION_PATHS[sourceType]}/${encodeURIComponent(id)}`);
    return HEADER_PARSERS[sourceType](body);
  }

  async listVideos(sourceType: SourceType, id: string, page: number, pageSize: number): Promise<VideoPage> {
    const body = await this.request(`${COLLECTION_PATHS[sourceType]}/${encodeURIComponent(id)}/videos`, {
      page: String(page),
      per_page: String(pageSize),
    });
    const parsed = parseBody(videoPageSchema, body, "video list");
    return {
      videos: parsed.data.map(normalizeVideo),
      nextPage: parsed.paging?.next ?? null,
    };
  }
}

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "./core/errors.js";

export const feedConfigSchema = z.object({
  url: z.string().trim().min(1, "url is required"),
  quality: z.enum(["low", "high"]).default("high"),
  pageSize: z.number().int().positive().default(50),
});

export const feedSourceSchema = feedConfigSchema.extend({
  userId: z.string().min(1),
  pledgeId: z.number().int().optional(),
});

export type FeedSource = z.infer<typeof feedSourceSchema>;

const feedsFileSchema = z.object({
  feeds: z.array(feedSourceSchema),
});

export interface AppConfig {
  vimeoToken: string;
  databaseUrl?: string;
  feedTtlDays: number;
  freePageSize: number;
  maintenanceCron: string;
  feedsPath: string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

const envSchema = z.object({
  VIMEO_ACCESS_TOKEN: z.string().min(1, "VIMEO_ACCESS_TOKEN is required"),
  DATABASE_URL: z.string().min(1).optional(),
  FEED_TTL_DAYS: z.coerce.number().positive().default(90),
  FREE_PAGE_SIZE: z.coerce.number().int().positive().default(50),
  MAINTENANCE_CRON: z.string().default("*/30 * * * *"),
  FEEDS_PATH: z.string().default("feeds.json"),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  const e = parsed.data;
  return {
    vimeoToken: e.VIMEO_ACCESS_TOKEN,
    databaseUrl: e.DATABASE_URL,
    feedTtlDays: e.FEED_TTL_DAYS,
    freePageSize: e.FREE_PAGE_SIZE,
    maintenanceCron: e.MAINTENANCE_CRON,
    feedsPath: resolve(e.FEEDS_PATH),
  };
}

export function loadFeeds(path: string): FeedSource[] {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read feeds file ${path}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Feeds file ${path} is not valid JSON`, { cause: err });
  }

  const parsed = feedsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid feeds file ${path}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data.feeds;
}

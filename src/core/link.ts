import { UnsupportedError } from "./errors.js";
import { LinkInfo } from "./types.js";

const VIMEO_HOSTS = new Set(["vimeo.com", "www.vimeo.com"]);
const COLLECTION_SEGMENTS = new Set(["channels", "groups"]);

function toUrl(link: string): URL {
  const trimmed = link.trim();
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  try {
    return new URL(withScheme);
  } catch {
    throw new UnsupportedError(`unparseable link: ${link}`);
  }
}

export function parseLink(link: string): LinkInfo {
  const url = toUrl(link);
  const host = url.hostname.toLowerCase();

  if (!VIMEO_HOSTS.has(host)) {
    throw new UnsupportedError(`unsupported link host: ${host}`);
  }

  const parts = url.pathname.split("/").filter(Boolean);

  if (parts[0] === "channels" && parts[1]) {
    return { provider: "vimeo", linkType: "channel", itemId: parts[1] };
  }
  if (parts[0] === "groups" && parts[1]) {
    return { provider: "vimeo", linkType: "group", itemId: parts[1] };
  }
  if (parts.length >= 1 && /^\d+$/.test(parts[0])) {
    return { provider: "vimeo", linkType: "video", itemId: parts[0] };
  }
  if (parts.length === 1 && !COLLECTION_SEGMENTS.has(parts[0])) {
    return { provider: "vimeo", linkType: "user", itemId: parts[0] };
  }

  throw new UnsupportedError(`unsupported vimeo link: ${link}`);
}

import { UnsupportedError } from "../../src/core/errors.js";
import { parseLink } from "../../src/core/link.js";

describe("parseLink", () => {
  it.each([
    ["https://vimeo.com/channels/staffpicks", "channel", "staffpicks"],
    ["https://www.vimeo.com/channels/staffpicks/videos", "channel", "staffpicks"],
    ["vimeo.com/groups/motion", "group", "motion"],
    ["https://vimeo.com/someone", "user", "someone"],
    ["https://vimeo.com/user12345?share=copy", "user", "user12345"],
    ["https://vimeo.com/76979871", "video", "76979871"],
  ])("classifies %s", (url, linkType, itemId) => {
    expect(parseLink(url)).toEqual({ provider: "vimeo", linkType, itemId });
  });

  it.each([
    "https://www.youtube.com/channel/abc",
    "https://vimeo.com/",
    "https://vimeo.com/channels",
    "https://vimeo.com/someone/albums",
    "not a link at all",
  ])("rejects %s", (url) => {
    expect(() => parseLink(url)).toThrow(UnsupportedError);
  });
});

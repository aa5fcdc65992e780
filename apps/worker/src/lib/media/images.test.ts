import { afterEach, describe, expect, it, vi } from "vitest";

import type { FeedItem } from "../rss-parser.js";
import {
  collectImages,
  extractFeedImages,
  extractShareImage,
  isUsableImageUrl
} from "./images.js";

const feedItem: FeedItem = {
  title: "Election debate tonight",
  mediaContent: [
    { $: { url: "https://cdn.example.com/a.jpg", medium: "image" } },
    { $: { url: "https://cdn.example.com/clip.mp4", medium: "video" } }
  ],
  enclosure: { url: "https://example.com/uploads/b.png", type: "image/png" },
  mediaThumbnail: [{ $: { url: "https://img.example.com/c.webp" } }],
  content:
    '<p><img src="https://ads.doubleclick.net/p.gif"><img data-src="https://example.com/a.jpg"></p>',
  summary: '<img src="https://cdn.example.com/a.jpg">'
};

const sharePage = `<html><head>
<meta property="og:image" content=" https://example.com/og.jpg ">
<meta name="twitter:image" content="https://example.com/tw.jpg">
</head><body></body></html>`;

describe("isUsableImageUrl", () => {
  it("accepts image extensions and image-like paths", () => {
    expect(isUsableImageUrl("https://example.com/a.JPG?w=200")).toBe(true);
    expect(isUsableImageUrl("https://example.com/photo/123")).toBe(true);
  });

  it("rejects trackers, non-http schemes and plain pages", () => {
    expect(isUsableImageUrl("https://stats.example.com/a.jpg")).toBe(false);
    expect(isUsableImageUrl("ftp://example.com/a.jpg")).toBe(false);
    expect(isUsableImageUrl("https://example.com/article")).toBe(false);
  });
});

describe("extractFeedImages", () => {
  it("collects media, enclosure, thumbnail and inline images in order", () => {
    expect(extractFeedImages(feedItem, 10)).toEqual([
      "https://cdn.example.com/a.jpg",
      "https://example.com/uploads/b.png",
      "https://img.example.com/c.webp",
      "https://example.com/a.jpg"
    ]);
  });

  it("stops at the image cap", () => {
    expect(extractFeedImages(feedItem, 3)).toEqual([
      "https://cdn.example.com/a.jpg",
      "https://example.com/uploads/b.png",
      "https://img.example.com/c.webp"
    ]);
  });

  it("returns nothing without a feed entry", () => {
    expect(extractFeedImages(null, 5)).toEqual([]);
  });
});

describe("extractShareImage", () => {
  it("prefers og:image over twitter:image", () => {
    expect(extractShareImage(sharePage)).toBe("https://example.com/og.jpg");
  });

  it("falls back to twitter:image", () => {
    expect(
      extractShareImage('<meta name="twitter:image" content="https://example.com/tw.jpg">')
    ).toBe("https://example.com/tw.jpg");
  });

  it("ignores relative share images", () => {
    expect(extractShareImage('<meta property="og:image" content="/og.jpg">')).toBeNull();
  });
});

describe("collectImages", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const options = { maxImages: 5, pageTimeoutMs: 1_000 };

  it("uses feed images without touching the network", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal("fetch", fetchMock);

    const images = await collectImages(feedItem, "https://news.example.com/1", options);

    expect(images).toHaveLength(4);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("falls back to the article page share image", async () => {
    const fetchMock = vi.fn<typeof fetch>(
      async () =>
        new Response(sharePage, { status: 200, headers: { "content-type": "text/html" } })
    );
    vi.stubGlobal("fetch", fetchMock);

    await expect(
      collectImages({ title: "No media" }, "https://news.example.com/1", options)
    ).resolves.toEqual(["https://example.com/og.jpg"]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("returns no images when the page cannot be fetched", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn<typeof fetch>(async () => {
        throw new TypeError("fetch failed");
      })
    );

    await expect(collectImages(null, "https://news.example.com/1", options)).resolves.toEqual(
      []
    );
  });

  it("skips the page lookup for non-http links", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal("fetch", fetchMock);

    await expect(collectImages(null, "mailto:desk@example.com", options)).resolves.toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

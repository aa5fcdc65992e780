import { parse } from "node-html-parser";
import type { HTMLElement } from "node-html-parser";
import { z } from "zod";
import type { AppLogger } from "@ballotwire/logger";

import { fetchHtml } from "../fetch-html.js";
import type { FeedItem } from "../rss-parser.js";

const BLOCKED_HOST_HINTS = [
  "doubleclick",
  "googletagmanager",
  "analytics",
  "pixel",
  "beacon",
  "tracking",
  "stat.",
  "stats."
];

const IMAGE_EXTENSION = /\.(?:jpe?g|png|webp)(?:$|[?#])/i;
const IMAGE_PATH_HINTS = ["image", "photo", "img", "media", "cdn", "upload"];
const IMAGE_ATTRIBUTES = ["src", "data-src", "data-lazy-src"];

// xml2js puts element attributes under `$`.
const mediaNodeSchema = z.object({
  $: z.object({
    url: z.string().optional(),
    medium: z.string().optional(),
    type: z.string().optional()
  })
});

export function isUsableImageUrl(url: string): boolean {
  const lowered = url.toLowerCase();
  if (!lowered.startsWith("http")) {
    return false;
  }
  if (BLOCKED_HOST_HINTS.some((hint) => lowered.includes(hint))) {
    return false;
  }
  return (
    IMAGE_EXTENSION.test(lowered) ||
    IMAGE_PATH_HINTS.some((hint) => lowered.includes(hint))
  );
}

function mediaUrls(nodes: unknown[] | undefined, requireImage: boolean): string[] {
  const urls: string[] = [];
  for (const node of nodes ?? []) {
    const parsed = mediaNodeSchema.safeParse(node);
    if (!parsed.success || !parsed.data.$.url) continue;
    const { url, medium, type } = parsed.data.$;
    if (
      !requireImage ||
      medium === "image" ||
      type?.startsWith("image/") ||
      IMAGE_EXTENSION.test(url)
    ) {
      urls.push(url);
    }
  }
  return urls;
}

function inlineImageUrls(html: string | undefined): string[] {
  if (!html || !html.includes("<img")) {
    return [];
  }

  const urls: string[] = [];
  for (const img of parse(html).querySelectorAll("img")) {
    for (const attribute of IMAGE_ATTRIBUTES) {
      const value = img.getAttribute(attribute)?.trim();
      if (value) {
        urls.push(value);
        break;
      }
    }
  }
  return urls;
}

/**
 * Image URLs carried by a feed entry, in source order: media:content,
 * image enclosures, media:thumbnail, then `<img>` tags in the entry HTML.
 */
export function extractFeedImages(item: FeedItem | null, maxImages: number): string[] {
  if (!item) {
    return [];
  }

  const candidates = [
    ...mediaUrls(item.mediaContent, true),
    ...(item.enclosure?.url && item.enclosure.type?.startsWith("image/")
      ? [item.enclosure.url]
      : []),
    ...mediaUrls(item.mediaThumbnail, false),
    ...inlineImageUrls(item.content),
    ...inlineImageUrls(item.summary)
  ];

  const unique: string[] = [];
  for (const candidate of candidates) {
    const url = candidate.trim();
    if (!isUsableImageUrl(url) || unique.includes(url)) continue;
    unique.push(url);
    if (unique.length >= maxImages) break;
  }
  return unique;
}

function metaContent(root: HTMLElement, selector: string) {
  const value = root.querySelector(selector)?.getAttribute("content");
  return value ? value.trim() : null;
}

/** The page's share image, from og:image or twitter:image. */
export function extractShareImage(html: string): string | null {
  const root = parse(html);
  const candidate =
    metaContent(root, "meta[property='og:image:secure_url']") ??
    metaContent(root, "meta[property='og:image']") ??
    metaContent(root, "meta[name='twitter:image']") ??
    metaContent(root, "meta[property='twitter:image']");

  return candidate && candidate.startsWith("http") ? candidate : null;
}

export type ImageCollectorOptions = {
  maxImages: number;
  pageTimeoutMs: number;
};

/**
 * Gathers images for a post. Falls back to the article page's share image
 * when the feed entry has none; any failure there just means no images.
 */
export async function collectImages(
  item: FeedItem | null,
  link: string,
  options: ImageCollectorOptions & { signal?: AbortSignal; logger?: AppLogger }
): Promise<string[]> {
  const fromFeed = extractFeedImages(item, options.maxImages);
  if (fromFeed.length > 0 || !link.startsWith("http")) {
    return fromFeed;
  }

  try {
    const { html } = await fetchHtml(link, options.pageTimeoutMs, options.signal);
    const shareImage = extractShareImage(html);
    return shareImage ? [shareImage] : [];
  } catch (error) {
    options.logger?.debug({ link, error }, "Share image lookup failed");
    return [];
  }
}

import type { Ruleset } from "./scoring/ruleset.js";
import { escapeHtml } from "./text/format.js";
import { normalize } from "./text/normalize.js";

const ELLIPSIS = "…";
const MAX_ENTITY_TAGS = 2;

export type CaptionOptions = {
  maxChars: number;
  channelHandle?: string;
  footer?: string;
};

export type CaptionInput = {
  title: string;
  description: string;
  source: string;
  topics: readonly string[];
  entities: readonly string[];
};

/**
 * Topic hashtags first, then keyword hashtags until `maxKeywordTags` are
 * present. The primary hashtag is always included and leads when it was
 * not already matched.
 */
export function generateHashtags(
  ruleset: Ruleset,
  title: string,
  description: string,
  topics: readonly string[]
): string[] {
  const { hashtags } = ruleset;
  const text = normalize(`${title} ${description}`);
  const tags: string[] = [];

  for (const name of topics) {
    const tag = ruleset.topics.find((topic) => topic.name === name)?.hashtag;
    if (tag && !tags.includes(tag)) {
      tags.push(tag);
    }
  }

  for (const rule of hashtags.rules) {
    if (tags.length >= hashtags.maxKeywordTags) break;
    const keyword = normalize(rule.keyword);
    if (keyword && text.includes(keyword) && !tags.includes(rule.tag)) {
      tags.push(rule.tag);
    }
  }

  if (!tags.includes(hashtags.primary)) {
    tags.unshift(hashtags.primary);
  }
  return tags.slice(0, hashtags.maxTags);
}

export function entityHashtag(entity: string): string {
  return `#${escapeHtml(entity.trim().replace(/\s+/g, "_"))}`;
}

function assemble(
  title: string,
  tagLine: string,
  description: string,
  source: string,
  options: CaptionOptions
) {
  const head = [`💠 <b>${title}</b>`, tagLine];
  if (options.channelHandle) {
    head.push(options.channelHandle);
  }

  const tail: string[] = [];
  if (source) {
    tail.push(`📰 ${source}`);
  }
  if (options.footer) {
    tail.push(options.footer);
  }

  const blocks = [...head];
  if (description) {
    blocks.push(description);
  }
  if (tail.length > 0) {
    blocks.push(tail.join("\n"));
  }
  return blocks.join("\n\n");
}

/**
 * Longest prefix of `text` (cut on code points, ellipsis appended) accepted
 * by `fits`, or null when not even one character fits.
 */
function fitText(text: string, fits: (candidate: string) => boolean): string | null {
  if (fits(text)) {
    return text;
  }

  const chars = Array.from(text);
  for (let length = chars.length - 1; length > 0; length--) {
    const candidate = chars.slice(0, length).join("").trimEnd() + ELLIPSIS;
    if (fits(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Renders the HTML caption shared by every platform. Text is cut before it
 * is escaped, so an entity is never split. Over `maxChars` the description
 * is shortened first, then dropped, then the title is shortened; as a last
 * resort only the primary hashtag is kept.
 */
export function buildCaption(
  ruleset: Ruleset,
  input: CaptionInput,
  options: CaptionOptions
): string {
  const title = input.title.trim();
  const description = input.description.trim();
  const source = escapeHtml(input.source.trim());

  const tags = generateHashtags(ruleset, input.title, input.description, input.topics);
  for (const entity of input.entities.slice(0, MAX_ENTITY_TAGS)) {
    const tag = entityHashtag(entity);
    if (!tags.includes(tag)) {
      tags.push(tag);
    }
  }
  const tagLine = tags.join(" ");

  const render = (titleText: string, descriptionText: string, tagText: string) =>
    assemble(escapeHtml(titleText), tagText, escapeHtml(descriptionText), source, options);
  const fits = (caption: string) => caption.length <= options.maxChars;

  const shortDescription = fitText(description, (candidate) =>
    fits(render(title, candidate, tagLine))
  );
  if (shortDescription !== null) {
    return render(title, shortDescription, tagLine);
  }

  const shortTitle = fitText(title, (candidate) => fits(render(candidate, "", tagLine)));
  if (shortTitle !== null) {
    return render(shortTitle, "", tagLine);
  }

  const primary = ruleset.hashtags.primary;
  const lastResort = fitText(title, (candidate) => fits(render(candidate, "", primary)));
  return render(lastResort ?? ELLIPSIS, "", primary);
}

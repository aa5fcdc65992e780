import { parse } from "node-html-parser";

const ELLIPSIS = "…";

export function stripHtml(html: string | null | undefined): string {
  if (!html) {
    return "";
  }

  const root = parse(html);
  for (const node of root.querySelectorAll("script,style,iframe")) {
    node.remove();
  }

  return normaliseWhitespace(root.text);
}

/**
 * Cuts `text` to `limit` characters, backing up to the last space when it
 * falls within the final fifth of the cut, and appends an ellipsis.
 */
export function truncateText(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }

  let cut = text.slice(0, limit);
  const lastSpace = cut.lastIndexOf(" ");
  if (lastSpace > limit * 0.8) {
    cut = cut.slice(0, lastSpace);
  }
  return `${cut}${ELLIPSIS}`;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

export function normaliseWhitespace(value: string) {
  return value.replace(/\s+/g, " ").trim();
}

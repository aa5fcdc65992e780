import { normalize } from "../text/normalize.js";

export type KeywordPattern = {
  keyword: string;
  pattern: RegExp;
};

/**
 * Text prepared once per article so every pattern group runs against the
 * same normalised strings.
 */
export type MatchTarget = {
  title: string;
  description: string;
  combined: string;
};

function escapeRegExp(value: string) {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Compiles a keyword into a whole-token pattern over normalised text.
 * Returns null when the keyword normalises to nothing.
 */
export function compileKeyword(keyword: string): KeywordPattern | null {
  const normalized = normalize(keyword);
  if (!normalized) {
    return null;
  }

  return {
    keyword,
    pattern: new RegExp(`(?:^|\\s)${escapeRegExp(normalized)}(?:\\s|$)`, "u")
  };
}

export function compileKeywords(keywords: readonly string[]): KeywordPattern[] {
  return keywords
    .map((keyword) => compileKeyword(keyword))
    .filter((compiled): compiled is KeywordPattern => compiled !== null);
}

export function prepareMatchTarget(
  title: string | null | undefined,
  description: string | null | undefined
): MatchTarget {
  const normalizedTitle = normalize(title);
  const normalizedDescription = normalize(description);

  return {
    title: normalizedTitle,
    description: normalizedDescription,
    combined: [normalizedTitle, normalizedDescription]
      .filter((part) => part.length > 0)
      .join(" ")
  };
}

export function matches(compiled: KeywordPattern, text: string): boolean {
  return text.length > 0 && compiled.pattern.test(text);
}

export function matchesAny(
  patterns: readonly KeywordPattern[],
  text: string
): boolean {
  return patterns.some((compiled) => matches(compiled, text));
}

/**
 * Script normalisation shared by keyword matching, fingerprinting and fuzzy
 * comparison.
 */

const LETTER_VARIANTS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\u064A/g, "\u06CC"],
  [/\u0643/g, "\u06A9"],
  [/\u0629/g, "\u0647"],
  [/\u0624/g, "\u0648"],
  [/[\u0625\u0623]/g, "\u0627"],
  [/[\u0626\u0649]/g, "\u06CC"]
];

const DIACRITICS = /[\u064B-\u065F\u0670]/g;

// Removed outright so a word spelled with and without ZWNJ yields one token.
const ZERO_WIDTH = /[\u200C\u200D\u200E\u200F\uFEFF]/g;

const NON_WORD = /[^\p{L}\p{N}_\s\u0600-\u06FF]/gu;

export function normalize(text: string | null | undefined): string {
  if (!text) {
    return "";
  }

  let value = text;
  for (const [pattern, replacement] of LETTER_VARIANTS) {
    value = value.replace(pattern, replacement);
  }

  value = value
    .replace(DIACRITICS, "")
    .replace(ZERO_WIDTH, "")
    .toLowerCase()
    .replace(NON_WORD, " ");

  return tokenize(value).join(" ");
}

export function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

export type Stopwords = ReadonlySet<string>;

export function createStopwords(words: Iterable<string>): Stopwords {
  const normalized = new Set<string>();
  for (const word of words) {
    const value = normalize(word);
    if (value) {
      normalized.add(value);
    }
  }
  return normalized;
}

/**
 * Normalises and drops stopwords and single-character tokens. Used for
 * fingerprints and fuzzy comparison only; keyword search runs on
 * {@link normalize} output so phrases that contain stopwords still match.
 */
export function normalizeForMatching(
  text: string | null | undefined,
  stopwords: Stopwords
): string {
  return matchingTokens(text, stopwords).join(" ");
}

export function matchingTokens(
  text: string | null | undefined,
  stopwords: Stopwords
): string[] {
  return tokenize(normalize(text)).filter(
    (token) => token.length >= 2 && !stopwords.has(token)
  );
}

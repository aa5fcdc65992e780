import { createHash } from "node:crypto";

import { matchingTokens, type Stopwords } from "./text/normalize.js";

export function sha256FromStrings(
  ...inputs: Array<string | null | undefined>
): string {
  const hash = createHash("sha256");
  for (const input of inputs) {
    if (!input) continue;
    hash.update(input, "utf8");
  }

  return hash.digest("hex");
}

/**
 * Order-independent identity of a headline: SHA-256 over its distinct
 * matching tokens, sorted and space-joined. The description never
 * contributes.
 */
export function contentFingerprint(title: string, stopwords: Stopwords): string {
  const tokens = [...new Set(matchingTokens(title, stopwords))].sort();
  return sha256FromStrings(tokens.join(" "));
}

import { describe, expect, it } from "vitest";

import { RunMetrics } from "../../metrics/run-metrics.js";
import { createStopwords } from "../text/normalize.js";
import { DedupIndex } from "./dedup-index.js";

const stopwords = createStopwords(["the"]);

function candidate(title: string, link: string, fingerprint: string) {
  return { title, link, fingerprint };
}

describe("DedupIndex", () => {
  it("rejects the second admission of the same article", () => {
    const index = new DedupIndex({ stopwords });
    const article = candidate("Council approves budget", "https://a.example/1", "hash-1");

    expect(index.check(article)).toBeNull();
    index.admit(article);
    expect(index.check(article)).toBe("fingerprint");
  });

  it("matches a known link under a different headline", () => {
    const index = new DedupIndex({ stopwords });
    index.admit(candidate("Council approves budget", "https://a.example/1", "hash-1"));

    expect(
      index.check(candidate("Mayor comments on vote", "https://a.example/1", "hash-2"))
    ).toBe("link");
  });

  it("flags near-duplicate headlines and counts the match", () => {
    const metrics = new RunMetrics();
    const index = new DedupIndex({ stopwords, metrics });
    index.admit(
      candidate("council approves new budget plan", "https://a.example/1", "hash-1")
    );

    expect(
      index.check(
        candidate(
          "council approves new budget proposal today",
          "https://b.example/2",
          "hash-2"
        )
      )
    ).toBe("fuzzy");
    expect(metrics.snapshot().fuzzyMatchCount).toBe(1);
  });

  it("seeds from history and counts repeated hashes", () => {
    const metrics = new RunMetrics();
    const index = DedupIndex.fromHistory(
      [
        { title: "Turnout rises", link: "https://a.example/1", contentHash: "hash-1" },
        { title: "Turnout rises again", link: "https://a.example/2", contentHash: "hash-1" }
      ],
      { stopwords, metrics }
    );

    expect(index.size).toBe(2);
    expect(metrics.snapshot().hashCollisions).toBe(1);
    expect(
      index.check(candidate("Something else entirely", "https://c.example/3", "hash-1"))
    ).toBe("fingerprint");
  });

  it("never fuzzy-matches titles with fewer than two tokens", () => {
    const index = new DedupIndex({ stopwords });
    index.admit(candidate("budget", "https://a.example/1", "hash-1"));

    expect(index.check(candidate("budget", "https://b.example/2", "hash-2"))).toBeNull();
    expect(index.isFuzzyDuplicate("the budget")).toBe(false);
  });
});

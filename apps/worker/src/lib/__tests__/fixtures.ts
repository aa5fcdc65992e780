import { createLogger } from "@ballotwire/logger";

import { createScoredArticle, type Article, type ScoredArticle } from "../articles.js";
import { contentFingerprint } from "../hash.js";
import { compileRuleset, type Ruleset } from "../scoring/ruleset.js";
import { RelevanceScorer } from "../scoring/scorer.js";

export const silentLogger = createLogger({ name: "test", level: "silent" });

export const testRuleset: Ruleset = compileRuleset({
  stopwords: ["the", "of"],
  coreKeywords: [
    { keyword: "election", titleWeight: 4, descriptionWeight: 2 },
    { keyword: "ballot box", titleWeight: 3, descriptionWeight: 1 }
  ],
  contextKeywords: [{ keyword: "debate", titleWeight: 2, descriptionWeight: 1 }],
  rejectionKeywords: ["football"],
  entities: ["Smith", "Jones"],
  topics: [
    { name: "registration", keywords: ["registration"], hashtag: "#Registration" },
    { name: "turnout", keywords: ["turnout", "ballot box"], hashtag: "#Turnout" }
  ],
  hashtags: {
    primary: "#Election",
    keywords: [
      { keyword: "debate", tag: "#Debate" },
      { keyword: "smith", tag: "#Smith" }
    ]
  },
  weights: {
    entityInTitle: 2,
    entityInDescription: 1,
    entityBoost: 2,
    multiTopicBoost: 1
  }
});

export const testThresholds = { high: 6, medium: 3 };

export function makeArticle(overrides: Partial<Article> = {}): Article {
  return {
    title: "Election debate tonight",
    link: "https://news.example.com/1",
    description: "",
    publishedAt: new Date("2025-01-06T11:00:00Z"),
    source: "Example",
    feedUrl: "https://feeds.example.com/rss",
    raw: null,
    ...overrides
  };
}

export function makeScoredArticle(overrides: Partial<Article> = {}): ScoredArticle {
  const article = makeArticle(overrides);
  const scorer = new RelevanceScorer(testRuleset, testThresholds);
  return createScoredArticle(
    article,
    scorer.score(article.title, article.description),
    contentFingerprint(article.title, testRuleset.stopwords)
  );
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" }
  });
}

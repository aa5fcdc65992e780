import type { FeedItem } from "./rss-parser.js";
import type { RelevanceScore, RelevanceTier } from "./scoring/scorer.js";

export type FeedSource = {
  name: string;
  url: string;
  trustBonus?: number;
};

export type Article = Readonly<{
  title: string;
  link: string;
  description: string;
  publishedAt: Date | null;
  source: string;
  feedUrl: string;
  /** Parsed feed entry, kept for image collection. */
  raw: FeedItem | null;
}>;

export type ScoredArticle = Article &
  Readonly<{
    score: number;
    tier: RelevanceTier;
    entities: readonly string[];
    topics: readonly string[];
    fingerprint: string;
  }>;

export function createScoredArticle(
  article: Article,
  relevance: RelevanceScore,
  fingerprint: string
): ScoredArticle {
  return Object.freeze({
    title: article.title,
    link: article.link,
    description: article.description,
    publishedAt: article.publishedAt,
    source: article.source,
    feedUrl: article.feedUrl,
    raw: article.raw,
    score: relevance.score,
    tier: relevance.tier,
    entities: [...relevance.entities],
    topics: [...relevance.topics],
    fingerprint
  });
}

/** Newest first; undated entries sink to the end in their original order. */
export function sortNewestFirst(articles: readonly Article[]): Article[] {
  return [...articles].sort((a, b) => {
    if (!a.publishedAt || !b.publishedAt) {
      return (a.publishedAt ? 0 : 1) - (b.publishedAt ? 0 : 1);
    }
    return b.publishedAt.getTime() - a.publishedAt.getTime();
  });
}

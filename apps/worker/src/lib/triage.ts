import { contentFingerprint } from "./hash.js";
import {
  createScoredArticle,
  type Article,
  type ScoredArticle
} from "./articles.js";
import type { DedupIndex, DuplicateReason } from "./dedup/dedup-index.js";
import type { RelevanceScorer, RelevanceTier } from "./scoring/scorer.js";
import type { Stopwords } from "./text/normalize.js";

export type TriageCounts = {
  timeWindow: number;
  lowRelevance: number;
  duplicate: number;
  duplicateByReason: Record<DuplicateReason, number>;
  queued: Record<Lowercase<RelevanceTier>, number>;
};

export type TriageDecision =
  | { outcome: "stale"; article: Article }
  | { outcome: "low_relevance"; article: Article; score: number }
  | { outcome: "duplicate"; article: ScoredArticle; reason: DuplicateReason }
  | { outcome: "queued"; article: ScoredArticle };

export type TriageOptions = {
  scorer: RelevanceScorer;
  index: DedupIndex;
  stopwords: Stopwords;
  /** Entries published before this instant are skipped. */
  notBefore: Date;
  trustBonusFor?: (source: string) => number;
  onDecision?: (decision: TriageDecision) => void;
};

/**
 * Articles that survived scoring and dedup, highest score first. The sort is
 * stable, so equal scores keep the newest-first input order.
 */
export class TriageQueue {
  private readonly items: ScoredArticle[];

  constructor(items: readonly ScoredArticle[]) {
    this.items = [...items].sort((a, b) => b.score - a.score);
  }

  get size(): number {
    return this.items.length;
  }

  peek(): ScoredArticle | undefined {
    return this.items[0];
  }

  next(): ScoredArticle | undefined {
    return this.items.shift();
  }

  /** Empties the queue and returns how many items were left unpublished. */
  drainOverflow(): number {
    const count = this.items.length;
    this.items.length = 0;
    return count;
  }

  toArray(): readonly ScoredArticle[] {
    return [...this.items];
  }
}

function emptyCounts(): TriageCounts {
  return {
    timeWindow: 0,
    lowRelevance: 0,
    duplicate: 0,
    duplicateByReason: { fingerprint: 0, link: 0, fuzzy: 0 },
    queued: { high: 0, medium: 0, low: 0 }
  };
}

/**
 * Scores and dedups `articles` (expected newest first) strictly in order,
 * admitting each survivor to the index before the next one is examined.
 */
export function triageArticles(
  articles: readonly Article[],
  options: TriageOptions
): { queue: TriageQueue; counts: TriageCounts } {
  const counts = emptyCounts();
  const accepted: ScoredArticle[] = [];
  const notBefore = options.notBefore.getTime();

  for (const article of articles) {
    if (article.publishedAt && article.publishedAt.getTime() < notBefore) {
      counts.timeWindow++;
      options.onDecision?.({ outcome: "stale", article });
      continue;
    }

    const relevance = options.scorer.score(article.title, article.description, {
      sourceBonus: options.trustBonusFor?.(article.source) ?? 0
    });

    if (relevance.tier === "LOW") {
      counts.lowRelevance++;
      counts.queued.low++;
      options.onDecision?.({
        outcome: "low_relevance",
        article,
        score: relevance.score
      });
      continue;
    }

    const scored = createScoredArticle(
      article,
      relevance,
      contentFingerprint(article.title, options.stopwords)
    );

    const reason = options.index.check(scored);
    if (reason) {
      counts.duplicate++;
      counts.duplicateByReason[reason]++;
      options.onDecision?.({ outcome: "duplicate", article: scored, reason });
      continue;
    }

    options.index.admit(scored);
    counts.queued[relevance.tier === "HIGH" ? "high" : "medium"]++;
    accepted.push(scored);
    options.onDecision?.({ outcome: "queued", article: scored });
  }

  return { queue: new TriageQueue(accepted), counts };
}

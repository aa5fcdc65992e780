import type { Ruleset, WeightedPattern } from "./ruleset.js";
import {
  matches,
  matchesAny,
  prepareMatchTarget,
  type MatchTarget
} from "./matcher.js";

export type RelevanceTier = "HIGH" | "MEDIUM" | "LOW";

export type TierThresholds = {
  high: number;
  medium: number;
};

export type RelevanceScore = {
  score: number;
  tier: RelevanceTier;
  entities: string[];
  topics: string[];
  rejected: boolean;
};

export type ScoreOptions = {
  /** Added after the tier decision; see {@link RelevanceScorer.score}. */
  sourceBonus?: number;
};

export const REJECTED_SCORE = -1;

export function tierForScore(
  score: number,
  thresholds: TierThresholds
): RelevanceTier {
  if (score >= thresholds.high) return "HIGH";
  if (score >= thresholds.medium) return "MEDIUM";
  return "LOW";
}

function accumulateExclusive(
  patterns: readonly WeightedPattern[],
  target: MatchTarget
): number {
  let total = 0;
  for (const entry of patterns) {
    if (matches(entry, target.title)) {
      total += entry.titleWeight;
    } else if (matches(entry, target.description)) {
      total += entry.descriptionWeight;
    }
  }
  return total;
}

export class RelevanceScorer {
  constructor(
    private readonly ruleset: Ruleset,
    private readonly thresholds: TierThresholds,
    private readonly options: { bonusPromotesTier: boolean } = {
      bonusPromotesTier: false
    }
  ) {}

  /**
   * Scores an article from its title and description.
   *
   * A rejection keyword anywhere vetoes the article outright. A source bonus
   * always moves the score; it moves the tier only when the scorer was built
   * with `bonusPromotesTier`.
   */
  score(
    title: string,
    description: string,
    options: ScoreOptions = {}
  ): RelevanceScore {
    const target = prepareMatchTarget(title, description);
    const { weights } = this.ruleset;

    if (matchesAny(this.ruleset.rejection, target.combined)) {
      return {
        score: REJECTED_SCORE,
        tier: "LOW",
        entities: [],
        topics: [],
        rejected: true
      };
    }

    let score =
      accumulateExclusive(this.ruleset.core, target) +
      accumulateExclusive(this.ruleset.context, target);

    const entities: string[] = [];
    for (const entity of this.ruleset.entities) {
      if (!matches(entity, target.combined)) continue;
      entities.push(entity.keyword);
      score += matches(entity, target.title)
        ? weights.entityInTitle
        : weights.entityInDescription;
    }

    const topics: string[] = [];
    for (const topic of this.ruleset.topics) {
      if (topics.includes(topic.name)) continue;
      if (matchesAny(topic.patterns, target.combined)) {
        topics.push(topic.name);
      }
    }

    if (entities.length > 0 && score >= this.thresholds.medium) {
      score += weights.entityBoost;
    }
    if (
      topics.length >= weights.multiTopicMinimum &&
      score >= this.thresholds.medium
    ) {
      score += weights.multiTopicBoost;
    }

    const tier = tierForScore(score, this.thresholds);
    const bonus = options.sourceBonus ?? 0;

    if (bonus === 0) {
      return { score, tier, entities, topics, rejected: false };
    }

    const boosted = score + bonus;
    return {
      score: boosted,
      tier: this.options.bonusPromotesTier
        ? tierForScore(boosted, this.thresholds)
        : tier,
      entities,
      topics,
      rejected: false
    };
  }
}

import { readFileSync } from "node:fs";
import { z } from "zod";

import { createStopwords, type Stopwords } from "../text/normalize.js";
import {
  compileKeyword,
  compileKeywords,
  type KeywordPattern
} from "./matcher.js";

const weightedKeywordSchema = z.object({
  keyword: z.string().min(1),
  titleWeight: z.number().int(),
  descriptionWeight: z.number().int()
});

export const rulesetSourceSchema = z.object({
  stopwords: z.array(z.string()),
  coreKeywords: z.array(weightedKeywordSchema),
  contextKeywords: z.array(weightedKeywordSchema),
  rejectionKeywords: z.array(z.string().min(1)),
  entities: z.array(z.string().min(1)),
  topics: z.array(
    z.object({
      name: z.string().min(1),
      keywords: z.array(z.string().min(1)).min(1),
      hashtag: z.string().startsWith("#").optional()
    })
  ),
  hashtags: z.object({
    primary: z.string().startsWith("#"),
    maxKeywordTags: z.number().int().positive().default(5),
    maxTags: z.number().int().positive().default(6),
    keywords: z.array(
      z.object({
        keyword: z.string().min(1),
        tag: z.string().startsWith("#")
      })
    )
  }),
  weights: z.object({
    entityInTitle: z.number().int(),
    entityInDescription: z.number().int(),
    entityBoost: z.number().int(),
    multiTopicBoost: z.number().int(),
    multiTopicMinimum: z.number().int().min(2).default(2)
  })
});

export type RulesetSource = z.input<typeof rulesetSourceSchema>;

export type WeightedPattern = KeywordPattern & {
  titleWeight: number;
  descriptionWeight: number;
};

export type TopicGroup = {
  name: string;
  hashtag?: string;
  patterns: readonly KeywordPattern[];
};

export type HashtagRule = KeywordPattern & { tag: string };

export type ScoringWeights = Readonly<
  z.infer<typeof rulesetSourceSchema>["weights"]
>;

/**
 * Compiled keyword tables. Built once and shared by reference; nothing
 * mutates it after {@link compileRuleset} returns.
 */
export type Ruleset = Readonly<{
  stopwords: Stopwords;
  core: readonly WeightedPattern[];
  context: readonly WeightedPattern[];
  rejection: readonly KeywordPattern[];
  entities: readonly KeywordPattern[];
  topics: readonly TopicGroup[];
  hashtags: Readonly<{
    primary: string;
    maxKeywordTags: number;
    maxTags: number;
    rules: readonly HashtagRule[];
  }>;
  weights: ScoringWeights;
}>;

function compileWeighted(
  entries: ReadonlyArray<z.infer<typeof weightedKeywordSchema>>
): WeightedPattern[] {
  const compiled: WeightedPattern[] = [];
  for (const entry of entries) {
    const pattern = compileKeyword(entry.keyword);
    if (!pattern) continue;
    compiled.push({
      ...pattern,
      titleWeight: entry.titleWeight,
      descriptionWeight: entry.descriptionWeight
    });
  }
  return compiled;
}

export function compileRuleset(source: RulesetSource): Ruleset {
  const parsed = rulesetSourceSchema.parse(source);

  const topics: TopicGroup[] = [];
  for (const topic of parsed.topics) {
    const patterns = compileKeywords(topic.keywords);
    if (patterns.length === 0) continue;
    topics.push({ name: topic.name, hashtag: topic.hashtag, patterns });
  }

  const hashtagRules: HashtagRule[] = [];
  for (const entry of parsed.hashtags.keywords) {
    const pattern = compileKeyword(entry.keyword);
    if (!pattern) continue;
    hashtagRules.push({ ...pattern, tag: entry.tag });
  }

  return Object.freeze({
    stopwords: createStopwords(parsed.stopwords),
    core: compileWeighted(parsed.coreKeywords),
    context: compileWeighted(parsed.contextKeywords),
    rejection: compileKeywords(parsed.rejectionKeywords),
    entities: compileKeywords(parsed.entities),
    topics,
    hashtags: {
      primary: parsed.hashtags.primary,
      maxKeywordTags: parsed.hashtags.maxKeywordTags,
      maxTags: parsed.hashtags.maxTags,
      rules: hashtagRules
    },
    weights: parsed.weights
  });
}

const DEFAULT_RULESET_URL = new URL("../../../config/ruleset.json", import.meta.url);

let defaultRuleset: Ruleset | null = null;

export function loadRuleset(path: URL | string = DEFAULT_RULESET_URL): Ruleset {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return compileRuleset(rulesetSourceSchema.parse(raw));
}

/**
 * The bundled ruleset, compiled on first use.
 */
export function getDefaultRuleset(): Ruleset {
  if (!defaultRuleset) {
    defaultRuleset = loadRuleset();
  }
  return defaultRuleset;
}

import { matchingTokens, type Stopwords } from "../text/normalize.js";
import type { RunMetrics } from "../../metrics/run-metrics.js";
import {
  DEFAULT_FUZZY_THRESHOLDS,
  MIN_FUZZY_TOKENS,
  isFuzzyMatch,
  type FuzzyThresholds
} from "./similarity.js";

export type DuplicateReason = "fingerprint" | "link" | "fuzzy";

export type DedupCandidate = {
  title: string;
  link: string;
  fingerprint: string;
};

export type HistoryEntry = {
  title: string;
  link: string;
  contentHash: string;
};

type FuzzyRecord = {
  title: string;
  tokens: ReadonlySet<string>;
};

export type DedupIndexOptions = {
  stopwords: Stopwords;
  thresholds?: FuzzyThresholds;
  metrics?: RunMetrics;
};

/**
 * Known fingerprints, links and headline token sets for one run. Seeded from
 * the history store, then grown as articles are admitted so near-duplicates
 * inside a single batch are caught before anything is persisted.
 *
 * Not safe for concurrent writers; the triage pass is its only mutator.
 */
export class DedupIndex {
  private readonly fingerprints = new Set<string>();
  private readonly links = new Set<string>();
  private readonly records: FuzzyRecord[] = [];
  private readonly stopwords: Stopwords;
  private readonly thresholds: FuzzyThresholds;
  private readonly metrics?: RunMetrics;

  constructor(options: DedupIndexOptions) {
    this.stopwords = options.stopwords;
    this.thresholds = options.thresholds ?? DEFAULT_FUZZY_THRESHOLDS;
    this.metrics = options.metrics;
  }

  static fromHistory(
    entries: readonly HistoryEntry[],
    options: DedupIndexOptions
  ): DedupIndex {
    const index = new DedupIndex(options);
    for (const entry of entries) {
      index.seed(entry);
    }
    return index;
  }

  get size(): number {
    return this.records.length;
  }

  seed(entry: HistoryEntry): void {
    if (entry.link) {
      this.links.add(entry.link);
    }
    if (entry.contentHash) {
      if (this.fingerprints.has(entry.contentHash)) {
        this.metrics?.recordHashCollision();
      }
      this.fingerprints.add(entry.contentHash);
    }
    this.addRecord(entry.title);
  }

  /**
   * Returns why `candidate` duplicates something already known, or null.
   * Checks run cheapest first: fingerprint, link, then fuzzy title overlap.
   */
  check(candidate: DedupCandidate): DuplicateReason | null {
    if (this.fingerprints.has(candidate.fingerprint)) {
      return "fingerprint";
    }
    if (candidate.link && this.links.has(candidate.link)) {
      return "link";
    }
    if (this.isFuzzyDuplicate(candidate.title)) {
      this.metrics?.recordFuzzyMatch();
      return "fuzzy";
    }
    return null;
  }

  admit(candidate: DedupCandidate): void {
    this.fingerprints.add(candidate.fingerprint);
    if (candidate.link) {
      this.links.add(candidate.link);
    }
    this.addRecord(candidate.title);
  }

  isFuzzyDuplicate(title: string): boolean {
    const tokens = this.tokenSet(title);
    if (tokens.size < MIN_FUZZY_TOKENS) {
      return false;
    }
    return this.records.some((record) =>
      isFuzzyMatch(tokens, record.tokens, this.thresholds)
    );
  }

  private addRecord(title: string): void {
    if (!title) return;
    this.records.push({ title, tokens: this.tokenSet(title) });
  }

  private tokenSet(title: string): Set<string> {
    return new Set(matchingTokens(title, this.stopwords));
  }
}

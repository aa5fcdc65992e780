/**
 * Set similarity used for near-duplicate headline detection.
 */

export type FuzzyThresholds = {
  overlap: number;
  jaccard: number;
};

export const DEFAULT_FUZZY_THRESHOLDS: FuzzyThresholds = {
  overlap: 0.75,
  jaccard: 0.55
};

/** Titles with fewer tokens than this carry too little signal to compare. */
export const MIN_FUZZY_TOKENS = 2;

function intersectionSize<T>(setA: ReadonlySet<T>, setB: ReadonlySet<T>): number {
  const [smaller, larger] = setA.size <= setB.size ? [setA, setB] : [setB, setA];
  let count = 0;
  for (const item of smaller) {
    if (larger.has(item)) {
      count++;
    }
  }
  return count;
}

/**
 * Jaccard index = |A ∩ B| / |A ∪ B|
 */
export function jaccardSimilarity<T>(setA: ReadonlySet<T>, setB: ReadonlySet<T>): number {
  if (setA.size === 0 && setB.size === 0) {
    return 1.0;
  }

  const intersection = intersectionSize(setA, setB);
  return intersection / (setA.size + setB.size - intersection);
}

/**
 * Overlap coefficient = |A ∩ B| / min(|A|, |B|). Reaches 1 when one set
 * contains the other.
 */
export function overlapCoefficient<T>(setA: ReadonlySet<T>, setB: ReadonlySet<T>): number {
  const smallest = Math.min(setA.size, setB.size);
  if (smallest === 0) {
    return 0;
  }
  return intersectionSize(setA, setB) / smallest;
}

/**
 * Two token sets describe the same story when either the overlap
 * coefficient or the Jaccard index clears its threshold.
 */
export function isFuzzyMatch(
  tokensA: ReadonlySet<string>,
  tokensB: ReadonlySet<string>,
  thresholds: FuzzyThresholds = DEFAULT_FUZZY_THRESHOLDS
): boolean {
  if (tokensA.size < MIN_FUZZY_TOKENS || tokensB.size < MIN_FUZZY_TOKENS) {
    return false;
  }

  const intersection = intersectionSize(tokensA, tokensB);
  if (intersection === 0) {
    return false;
  }

  const overlap = intersection / Math.min(tokensA.size, tokensB.size);
  if (overlap >= thresholds.overlap) {
    return true;
  }

  const union = tokensA.size + tokensB.size - intersection;
  return intersection / union >= thresholds.jaccard;
}

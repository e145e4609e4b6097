/**
 * Set similarity used to rank related notes
 */

export const TAG_WEIGHT = 0.6;
export const TOPIC_WEIGHT = 0.4;

/**
 * Jaccard similarity |A ∩ B| / |A ∪ B|. Two empty sets score 0.
 */
export function jaccard(a: Iterable<string>, b: Iterable<string>): number {
  const setA = new Set(a);
  const setB = new Set(b);

  if (setA.size === 0 && setB.size === 0) {
    return 0;
  }

  let intersection = 0;
  for (const item of setA) {
    if (setB.has(item)) {
      intersection++;
    }
  }

  const union = setA.size + setB.size - intersection;
  return intersection / union;
}

export interface TaggedItem {
  tags: readonly string[];
  topics: readonly string[];
}

/**
 * Weighted relatedness of two notes: tags count for 60%, topics for 40%
 */
export function relatedness(a: TaggedItem, b: TaggedItem): number {
  return TAG_WEIGHT * jaccard(a.tags, b.tags) + TOPIC_WEIGHT * jaccard(a.topics, b.topics);
}

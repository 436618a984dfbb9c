/**
 * Filename Similarity Scorer
 *
 * A 0-100 score that match thresholds are expressed in:
 *
 * 1. Both empty: 0
 * 2. Identical: 100
 * 3. One contains the other: length ratio of the shorter to the longer
 * 4. Otherwise: shared characters over the longer length, where each
 *    character of `b` can be claimed only once, in the order `a` visits them
 *
 * Comparison is literal. Callers lower-case both sides first.
 * Lengths are measured in Unicode code points.
 */

/**
 * Counts characters of `a` that can be claimed from a multiset of `b`'s characters.
 *
 * @example
 * countSharedCharacters(['a', 'a', 'b'], ['a', 'b']) // 2 - the second 'a' finds nothing left
 */
export function countSharedCharacters(a: readonly string[], b: readonly string[]): number {
  const remaining = new Map<string, number>();
  for (const char of b) {
    remaining.set(char, (remaining.get(char) ?? 0) + 1);
  }

  let shared = 0;
  for (const char of a) {
    const available = remaining.get(char) ?? 0;
    if (available > 0) {
      shared++;
      remaining.set(char, available - 1);
    }
  }

  return shared;
}

/**
 * Scores how similar two filenames are.
 *
 * @returns Integer from 0 to 100
 *
 * @example
 * calculateFilenameSimilarity('cat', 'category') // 37
 * calculateFilenameSimilarity('aab', 'ab')       // 66
 */
export function calculateFilenameSimilarity(a: string, b: string): number {
  const charsA = Array.from(a);
  const charsB = Array.from(b);
  const longest = Math.max(charsA.length, charsB.length);

  // Empty against empty is treated as no similarity, not as an exact match
  if (longest === 0) {
    return 0;
  }

  if (a === b) {
    return 100;
  }

  if (a.includes(b) || b.includes(a)) {
    const shortest = Math.min(charsA.length, charsB.length);
    return Math.floor((100 * shortest) / longest);
  }

  return Math.floor((100 * countSharedCharacters(charsA, charsB)) / longest);
}

export default calculateFilenameSimilarity;

/**
 * Text-overlap similarity used when articles have no vectors to compare.
 */

/**
 * Extract shingles (n-grams of words) from text.
 * @param n Shingle size; 1 yields the set of words
 */
export function extractShingles(text: string, n = 1): Set<string> {
  const words = text
    .toLowerCase()
    .replace(/[^\w\s]/g, " ")
    .split(/\s+/)
    .filter((word) => word.length > 0);

  const shingles = new Set<string>();
  for (let i = 0; i <= words.length - n; i++) {
    shingles.add(words.slice(i, i + n).join(" "));
  }
  return shingles;
}

/**
 * Jaccard index |A ∩ B| / |A ∪ B|; two empty sets are identical.
 */
export function jaccardSimilarity<T>(setA: ReadonlySet<T>, setB: ReadonlySet<T>): number {
  if (setA.size === 0 && setB.size === 0) {
    return 1.0;
  }

  let intersection = 0;
  for (const item of setA) {
    if (setB.has(item)) {
      intersection++;
    }
  }
  return intersection / (setA.size + setB.size - intersection);
}

export function textOverlapSimilarity(textA: string, textB: string): number {
  return jaccardSimilarity(extractShingles(textA), extractShingles(textB));
}

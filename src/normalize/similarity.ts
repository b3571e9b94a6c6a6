/**
 * String similarity for fuzzy school-name matching
 */

/**
 * Calculate Levenshtein distance between two strings
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  // Single rolling row; row[j] = distance(a[0..i], b[0..j])
  let previous: number[] = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current: number[] = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a.charAt(i - 1) === b.charAt(j - 1) ? 0 : 1;
      current[j] = Math.min(
        previous[j - 1] + cost, // substitution
        current[j - 1] + 1,     // insertion
        previous[j] + 1         // deletion
      );
    }
    previous = current;
  }

  return previous[b.length];
}

/**
 * Normalized similarity in [0, 1]: 1 - distance / longer length.
 * Symmetric; identical strings (including two empty strings) score 1.
 */
export function similarityRatio(a: string, b: string): number {
  const maxLength = Math.max(a.length, b.length);
  if (maxLength === 0) return 1;
  return 1 - levenshteinDistance(a, b) / maxLength;
}

/**
 * Best-scoring candidate at or above threshold.
 *
 * Candidates are compared in lexicographic order and only a strictly higher
 * score replaces the current best, so ties resolve to the alphabetically
 * first name regardless of how the caller's collection is ordered.
 */
export function findBestMatch(
  name: string,
  candidates: Iterable<string>,
  threshold: number
): { match: string; score: number } | null {
  const nameUpper = name.toUpperCase();
  const ordered = [...candidates].sort();

  let best: { match: string; score: number } | null = null;

  for (const candidate of ordered) {
    const score = similarityRatio(nameUpper, candidate.toUpperCase());
    if (score >= threshold && (best === null || score > best.score)) {
      best = { match: candidate, score };
    }
  }

  return best;
}

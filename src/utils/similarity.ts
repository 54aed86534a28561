import { distance } from 'fastest-levenshtein';

/**
 * Scores how alike two strings are, from 0 (nothing shared) to 1 (identical)
 */
export type SimilarityMeasure = (a: string, b: string) => number;

/**
 * Normalized Levenshtein ratio: 1 - editDistance / longerLength
 */
export const levenshteinRatio: SimilarityMeasure = (a, b) => {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - distance(a, b) / longest;
};

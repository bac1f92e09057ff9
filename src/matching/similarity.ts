/**
 * Name similarity.
 *
 * Sørensen–Dice coefficient over character bigrams of the normalized
 * names: near-duplicate spellings ("Kathmandu"/"Katmandu" → 0.8) score
 * high, unrelated names score near 0.
 */

import { compareTwoStrings } from 'string-similarity';
import { normalizeName } from './normalize';

/** Similarity of two already-normalized names in [0, 1]. */
export function normalizedSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  return compareTwoStrings(a, b);
}

/** Similarity of two raw names in [0, 1]. */
export function nameSimilarity(a: string, b: string, noiseWords: Iterable<string> = []): number {
  const noise = [...noiseWords];
  return normalizedSimilarity(normalizeName(a, noise), normalizeName(b, noise));
}

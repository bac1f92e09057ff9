/**
 * Name normalization for matching.
 *
 * Tenants spell the same place differently: case, diacritics, punctuation
 * and administrative words ("Ward", "Municipality") vary while the name
 * itself does not. Normalization removes exactly those differences.
 */

import { LocalizedNames } from '../domain/tenant-unit';

/** Combining marks left behind by NFD decomposition. */
const COMBINING_MARKS = /[\u0300-\u036f]/g;

/** Anything that is neither a letter, a mark nor a digit, in any script. */
const SEPARATORS = /[^\p{L}\p{M}\p{N}]+/gu;

/** Case-fold, strip Latin diacritics and punctuation, collapse whitespace. */
export function foldName(name: string): string {
  return name
    .normalize('NFD')
    .replace(COMBINING_MARKS, '')
    .normalize('NFC')
    .toLowerCase()
    .replace(SEPARATORS, ' ')
    .trim();
}

/**
 * Normalize a name for matching and for the canonical unique key. Noise
 * words are dropped unless nothing else remains ("Ward" stays "ward").
 */
export function normalizeName(name: string, noiseWords: Iterable<string> = []): string {
  const folded = foldName(name);
  const noise = new Set([...noiseWords].map(foldName));
  const kept = folded.split(' ').filter((token) => token.length > 0 && !noise.has(token));
  return kept.length > 0 ? kept.join(' ') : folded;
}

/**
 * Pick the unit's primary name: the default locale's entry, else the first
 * non-blank declared name. Returns null when every name is blank.
 */
export function pickPrimaryName(names: LocalizedNames, defaultLocale: string): string | null {
  const preferred = names[defaultLocale]?.trim();
  if (preferred) return preferred;
  for (const value of Object.values(names)) {
    const trimmed = value.trim();
    if (trimmed) return trimmed;
  }
  return null;
}

/** Distinct non-blank declared names, primary first. */
export function declaredNames(names: LocalizedNames, primaryName: string): string[] {
  const result = [primaryName];
  for (const value of Object.values(names)) {
    const trimmed = value.trim();
    if (trimmed && !result.includes(trimmed)) result.push(trimmed);
  }
  return result;
}

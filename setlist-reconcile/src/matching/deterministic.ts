import { normalize } from './normalize.js';
import type { CatalogEntry } from './types.js';

export interface DeterministicMatch {
  catalogId: string;
  confidence: 'Exact';
}

/**
 * Stage 1: match a setlist track against the catalog without any I/O.
 *
 * Each entry is checked in catalog order, first for case-insensitive
 * equality of the raw strings, then for equality of the normalized forms.
 * The first entry satisfying either check wins. Only whole-string equality
 * counts, so "Tokyo (Acoustic)" never matches "Midnight in Tokyo".
 */
export function deterministicMatch(
  trackName: string,
  catalog: readonly CatalogEntry[]
): DeterministicMatch | null {
  const rawTrack = trackName.trim().toLowerCase();
  const normalizedTrack = normalize(trackName);

  for (const entry of catalog) {
    if (rawTrack === entry.title.trim().toLowerCase()) {
      return { catalogId: entry.catalogId, confidence: 'Exact' };
    }

    if (normalizedTrack === normalize(entry.title)) {
      return { catalogId: entry.catalogId, confidence: 'Exact' };
    }
  }

  return null;
}

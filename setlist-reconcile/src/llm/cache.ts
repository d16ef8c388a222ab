import { createHash } from 'node:crypto';
import { normalize } from '../matching/normalize.js';
import type { MatchCandidate } from '../matching/types.js';

/**
 * Per-run cache of validated LLM results.
 *
 * Keyed on the normalized track name, so "Tokyo (Acoustic)" and
 * "Tokyo (Live)" share one entry and one external call. Entries never
 * expire; create one cache per run or call clear() between runs.
 */
export class MatchCache {
  private entries = new Map<string, readonly MatchCandidate[]>();

  static keyFor(trackName: string): string {
    return createHash('sha256').update(normalize(trackName)).digest('hex');
  }

  get(trackName: string): MatchCandidate[] | undefined {
    const stored = this.entries.get(MatchCache.keyFor(trackName));
    return stored ? stored.map((candidate) => ({ ...candidate })) : undefined;
  }

  set(trackName: string, candidates: readonly MatchCandidate[]): void {
    this.entries.set(
      MatchCache.keyFor(trackName),
      candidates.map((candidate) => ({ ...candidate }))
    );
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

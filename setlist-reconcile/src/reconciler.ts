import { deterministicMatch } from './matching/deterministic.js';
import { isMedley } from './matching/normalize.js';
import { NO_MATCH, NONE_SENTINEL } from './matching/types.js';
import type { CatalogEntry, Confidence, MatchCandidate, ResultRow, Track } from './matching/types.js';
import type { LLMMatcher } from './llm/fuzzy-matcher.js';
import { logger } from './utils/logger.js';

/**
 * Run the two-stage matching pipeline over flattened tracks.
 *
 * Stage 1 is the deterministic matcher; stage 2 (the LLM matcher) only
 * sees tracks stage 1 could not resolve, plus every medley. Without a
 * matcher the run is deterministic-only and unresolved tracks get a single
 * no-match row. Tracks are processed one at a time in input order.
 */
export async function reconcile(
  tracks: readonly Track[],
  catalog: readonly CatalogEntry[],
  matcher: LLMMatcher | null = null
): Promise<ResultRow[]> {
  const results: ResultRow[] = [];
  let deterministicHits = 0;
  let llmCalls = 0;

  for (const track of tracks) {
    const trackName = track.setlistTrackName;

    // Medleys are never compared as whole strings
    if (isMedley(trackName)) {
      if (!matcher) {
        logger.info(`[MEDLEY] "${trackName}" -> skipped (no LLM matcher)`);
        results.push(buildRow(track, NO_MATCH, catalog));
        continue;
      }

      logger.info(`[MEDLEY] "${trackName}" -> sending to LLM`);
      llmCalls++;
      const matches = await matcher.match(trackName, catalog);
      logger.info(`  Medley returned ${matches.length} matches: ${matches.map(formatId).join(', ')}`);
      for (const match of matches) {
        results.push(buildRow(track, match, catalog));
      }
      continue;
    }

    const exact = deterministicMatch(trackName, catalog);
    if (exact) {
      deterministicHits++;
      logger.info(`[EXACT]  "${trackName}" -> ${exact.catalogId}`);
      results.push(buildRow(track, exact, catalog));
      continue;
    }

    if (!matcher) {
      logger.info(`[SKIP]   "${trackName}" -> no LLM matcher`);
      results.push(buildRow(track, NO_MATCH, catalog));
      continue;
    }

    llmCalls++;
    logger.info(`[LLM]    "${trackName}" -> sending to LLM`);
    const matches = await matcher.match(trackName, catalog);
    for (const match of matches) {
      results.push(buildRow(track, match, catalog));
    }
  }

  const cacheNote = matcher ? `, cached_names=${matcher.cache.size}` : '';
  logger.info(
    `Match summary: deterministic=${deterministicHits}, llm_calls=${llmCalls}${cacheNote}, total_rows=${results.length}`
  );
  return results;
}

/**
 * Count result rows per confidence label
 */
export function summarizeResults(rows: readonly ResultRow[]): Record<Confidence, number> {
  const counts: Record<Confidence, number> = { Exact: 0, High: 0, Review: 0, None: 0 };
  for (const row of rows) {
    counts[row.matchConfidence]++;
  }
  return counts;
}

function buildRow(track: Track, match: MatchCandidate, catalog: readonly CatalogEntry[]): ResultRow {
  const matchedTitle =
    match.catalogId === null ? '' : (catalog.find((entry) => entry.catalogId === match.catalogId)?.title ?? '');

  return {
    showDate: track.showDate,
    venueName: track.venueName,
    setlistTrackName: track.setlistTrackName,
    matchedCatalogId: match.catalogId,
    matchedCatalogTitle: matchedTitle,
    matchConfidence: match.confidence
  };
}

function formatId(match: MatchCandidate): string {
  return match.catalogId ?? NONE_SENTINEL;
}

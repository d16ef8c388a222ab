import { isMedley, medleySegments } from '../matching/normalize.js';
import type { CatalogEntry } from '../matching/types.js';

export const MATCHING_SYSTEM_PROMPT = `You are a music catalog matching expert at a music publisher.
Your job is to match live performance setlist track names against our internal song catalog.

RULES:
1. A setlist track may be an abbreviation, variation, or alternate version of a catalog song.
   Example: "Tokyo (Acoustic)" could match "Midnight in Tokyo".
2. A setlist track containing "/" is a MEDLEY and may match MULTIPLE catalog songs.
   Return one match entry for EACH song in the medley.
   Example: "Desert Rain / Ocean Avenue" should match both "Desert Rain" AND "Ocean Avenue".
3. If a track is a well-known song by ANOTHER artist (a cover), it is NOT CONTROLLED by us.
   Return catalog_id "None" with confidence "None" for it.
   Example: "Yesterday" is by The Beatles, so it is not controlled.
4. Only match if you are genuinely confident. Do NOT force-match vaguely similar titles.
5. If unsure, set confidence to "Review" rather than guessing.

CONFIDENCE LEVELS:
- "High": confident match (abbreviation, suffix removed, clear variation).
- "Review": possible match that needs human review.
- "None": no match found, or the song is not controlled (cover).

Return ONLY valid JSON. No other text.`;

/**
 * Build the user prompt for matching one setlist track against the catalog
 */
export function buildMatchPrompt(trackName: string, catalog: readonly CatalogEntry[]): string {
  const parts = ['Match this setlist track against our catalog:', '', `SETLIST TRACK: "${trackName}"`];

  if (isMedley(trackName)) {
    const segments = medleySegments(trackName);
    parts.push('');
    parts.push(
      `IMPORTANT: This is a MEDLEY containing ${segments.length} songs: ${segments.map((s) => `"${s}"`).join(', ')}.`
    );
    parts.push('You MUST return a SEPARATE match entry for EACH part of the medley.');
    parts.push(`Return ${segments.length} objects in the "matches" array, one per song.`);
  }

  parts.push('');
  parts.push('OUR CATALOG:');
  for (const entry of catalog) {
    parts.push(`- ${entry.catalogId}: "${entry.title}" (Writers: ${entry.writers})`);
  }

  parts.push('');
  parts.push(`Return JSON with this exact structure:
{"matches": [{"catalog_id": "CAT-XXX or None", "confidence": "High/Review/None", "reasoning": "brief explanation"}]}

If this is a medley, include one entry per song in the medley.
If there is no match or the track is a cover, return:
{"matches": [{"catalog_id": "None", "confidence": "None", "reasoning": "explanation"}]}`);

  return parts.join('\n');
}

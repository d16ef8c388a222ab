import { logger } from '../utils/logger.js';
import { NONE_SENTINEL, isConfidence } from './types.js';
import type { Confidence, MatchCandidate } from './types.js';

function readField(raw: unknown, key: string): string {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return NONE_SENTINEL;
  }

  const value: unknown = Reflect.get(raw, key);
  if (value === undefined || value === null) {
    return NONE_SENTINEL;
  }

  return (typeof value === 'string' ? value : JSON.stringify(value)).trim();
}

/**
 * Turn an externally sourced match object into a trusted MatchCandidate.
 *
 * Unknown catalog ids are cleared along with their confidence; unknown
 * confidence labels are downgraded to "Review". Never throws.
 */
export function validateMatch(
  raw: unknown,
  knownCatalogIds: ReadonlySet<string>
): MatchCandidate {
  let catalogId = readField(raw, 'catalog_id');
  let confidence = readField(raw, 'confidence');

  if (catalogId !== NONE_SENTINEL && !knownCatalogIds.has(catalogId)) {
    logger.warn(`Matcher returned unknown catalog_id "${catalogId}", clearing match`);
    catalogId = NONE_SENTINEL;
    confidence = NONE_SENTINEL;
  }

  let resolved: Confidence = 'Review';
  if (isConfidence(confidence)) {
    resolved = confidence;
  } else {
    logger.warn(`Matcher returned unknown confidence "${confidence}", setting to Review`);
  }

  return {
    catalogId: catalogId === NONE_SENTINEL ? null : catalogId,
    confidence: resolved
  };
}

/** Recognized match confidence labels, strongest first */
export const CONFIDENCE_LEVELS = ['Exact', 'High', 'Review', 'None'] as const;

export type Confidence = (typeof CONFIDENCE_LEVELS)[number];

/** Literal written wherever an absent catalog id or confidence leaves the process */
export const NONE_SENTINEL = 'None';

/** A song in the internal catalog */
export interface CatalogEntry {
  catalogId: string;
  title: string;
  writers: string;
  controlledPercentage: string;
}

/** One song performed at one show, as flattened from tour data */
export interface Track {
  showDate: string;
  venueName: string;
  city: string;
  setlistTrackName: string;
}

/** A validated match produced by either matching stage */
export interface MatchCandidate {
  /** Catalog id, or null when nothing in the catalog matched */
  catalogId: string | null;
  confidence: Confidence;
}

/** A single output row; medleys produce several rows for the same track */
export interface ResultRow {
  showDate: string;
  venueName: string;
  setlistTrackName: string;
  matchedCatalogId: string | null;
  matchedCatalogTitle: string;
  matchConfidence: Confidence;
}

export const NO_MATCH: Readonly<MatchCandidate> = Object.freeze({
  catalogId: null,
  confidence: 'None'
});

export function isConfidence(value: string): value is Confidence {
  return (CONFIDENCE_LEVELS as readonly string[]).includes(value);
}

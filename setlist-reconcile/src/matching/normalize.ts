const PARENTHETICAL = /\s*\([^()]*\)\s*/g;

/**
 * Canonicalize a title or track name for comparison.
 *
 * Strips every parenthetical such as "(Acoustic)" or "(Extended Jam)",
 * innermost first so nested groups disappear too, then lowercases and
 * collapses whitespace.
 */
export function normalize(text: string): string {
  let stripped = text;
  let previous: string;
  do {
    previous = stripped;
    stripped = stripped.replace(PARENTHETICAL, ' ');
  } while (stripped !== previous);

  return stripped.toLowerCase().replace(/\s+/g, ' ').trim();
}

/** Medley indicator: "Desert Rain / Ocean Avenue" */
export function isMedley(trackName: string): boolean {
  return trackName.includes('/');
}

/** Split a medley track name into its trimmed, non-empty segments */
export function medleySegments(trackName: string): string[] {
  return trackName
    .split('/')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

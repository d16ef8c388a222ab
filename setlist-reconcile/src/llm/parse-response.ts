import type { ParsedMatchResponse, ResponseShape } from './types.js';

/** Keys the model has been seen to nest its match list under, in priority order */
const LIST_KEYS = ['matches', 'results', 'data'] as const;

type Recognizer = (value: unknown) => unknown[] | undefined;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const bareList: Recognizer = (value) => (Array.isArray(value) ? value : undefined);

const keyedList: Recognizer = (value) => {
  if (!isRecord(value)) return undefined;
  for (const key of LIST_KEYS) {
    const candidate = value[key];
    if (Array.isArray(candidate)) {
      return candidate;
    }
  }
  return undefined;
};

const singleMatch: Recognizer = (value) =>
  isRecord(value) && 'catalog_id' in value ? [value] : undefined;

const anyList: Recognizer = (value) => {
  if (!isRecord(value)) return undefined;
  return Object.values(value).find((candidate): candidate is unknown[] => Array.isArray(candidate));
};

const RECOGNIZERS: ReadonlyArray<[Exclude<ResponseShape, 'unrecognized'>, Recognizer]> = [
  ['bare-list', bareList],
  ['keyed-list', keyedList],
  ['single-match', singleMatch],
  ['any-list', anyList]
];

/**
 * Clean an LLM response to extract valid JSON.
 * Removes markdown code blocks and any leading/trailing prose around the payload.
 */
export function cleanJsonResponse(response: string): string {
  let cleaned = response.trim();

  cleaned = cleaned.replace(/^```(?:json)?\s*/i, '');
  cleaned = cleaned.replace(/\s*```\s*$/, '');

  // Keep from the first { or [ to the last } or ]
  const firstBrace = cleaned.indexOf('{');
  const firstBracket = cleaned.indexOf('[');
  const starts = [firstBrace, firstBracket].filter((index) => index >= 0);
  const start = starts.length > 0 ? Math.min(...starts) : -1;
  const end = Math.max(cleaned.lastIndexOf('}'), cleaned.lastIndexOf(']'));

  if (start >= 0 && end >= start) {
    cleaned = cleaned.substring(start, end + 1);
  }

  return cleaned.trim();
}

/**
 * Parse raw model text as JSON, retrying once on a cleaned copy.
 * @throws SyntaxError when neither form is valid JSON
 */
export function parseJsonText(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    const cleaned = cleanJsonResponse(raw);
    if (cleaned === raw.trim()) {
      throw error;
    }
    return JSON.parse(cleaned);
  }
}

/**
 * Locate the list of match entries inside an already-parsed response.
 * Recognizers run in priority order and the first structural hit wins.
 */
export function recognizeMatches(value: unknown): ParsedMatchResponse {
  for (const [shape, recognize] of RECOGNIZERS) {
    const entries = recognize(value);
    if (entries) {
      return { shape, entries };
    }
  }
  return { shape: 'unrecognized', entries: [] };
}

/**
 * Parse a model reply into match entries.
 * @throws SyntaxError only for text that is not JSON at all
 */
export function parseMatchResponse(raw: string): ParsedMatchResponse {
  return recognizeMatches(parseJsonText(raw));
}

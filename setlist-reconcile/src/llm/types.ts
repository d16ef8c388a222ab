/** A single structured-output completion request */
export interface CompletionRequest {
  /** Model identifier (e.g., "gpt-4o-mini") */
  model: string;
  /** Sampling temperature; 0 for repeatable answers */
  temperature: number;
  systemPrompt: string;
  userPrompt: string;
  /** Ask the backend to constrain output to a JSON object */
  responseFormat: 'json';
}

/** Which structural shape a parsed response was recognized as */
export type ResponseShape =
  | 'bare-list'
  | 'keyed-list'
  | 'single-match'
  | 'any-list'
  | 'unrecognized';

export interface ParsedMatchResponse {
  shape: ResponseShape;
  entries: unknown[];
}

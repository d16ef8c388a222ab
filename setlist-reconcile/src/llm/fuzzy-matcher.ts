import { logger } from '../utils/logger.js';
import { validateMatch } from '../matching/validate.js';
import { NO_MATCH, NONE_SENTINEL } from '../matching/types.js';
import type { CatalogEntry, MatchCandidate } from '../matching/types.js';
import { computeBackoffDelay, sleep as defaultSleep } from './backoff.js';
import type { RandomSource, Sleep } from './backoff.js';
import { MatchCache } from './cache.js';
import { parseMatchResponse } from './parse-response.js';
import { MATCHING_SYSTEM_PROMPT, buildMatchPrompt } from './prompts.js';
import type { LLMProvider } from './provider.js';

/** Model and resilience settings, usually taken from ReconcileConfig */
export interface MatcherSettings {
  model: string;
  temperature: number;
  maxRetries: number;
  /** Exponential backoff base, in seconds */
  backoffBase: number;
  /** Cap on a single backoff delay, in seconds */
  backoffMax: number;
  /** Pause before every provider call, in milliseconds */
  rateLimitDelayMs: number;
}

export interface LLMMatcherOptions {
  provider: LLMProvider;
  settings: MatcherSettings;
  /** Shared result cache; a fresh one is created when omitted */
  cache?: MatchCache;
  /** Injected so tests can observe delays without waiting */
  sleep?: Sleep;
  random?: RandomSource;
}

/**
 * Stage 2: LLM-backed fuzzy matching for tracks the deterministic
 * matcher could not resolve (abbreviations, medleys, covers).
 *
 * Never throws. Failures are retried with exponential backoff and, once
 * retries run out, degrade to a single no-match candidate.
 */
export class LLMMatcher {
  readonly cache: MatchCache;
  private provider: LLMProvider;
  private settings: MatcherSettings;
  private sleep: Sleep;
  private random: RandomSource;

  constructor(options: LLMMatcherOptions) {
    this.provider = options.provider;
    this.settings = options.settings;
    this.cache = options.cache ?? new MatchCache();
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Match a setlist track against the catalog.
   * @param maxRetries - Additional attempts after the first; defaults to the configured value
   * @returns Validated candidates in the order the model returned them
   */
  async match(
    trackName: string,
    catalog: readonly CatalogEntry[],
    maxRetries: number = this.settings.maxRetries
  ): Promise<MatchCandidate[]> {
    const cached = this.cache.get(trackName);
    if (cached) {
      logger.debug(`Cache hit for "${trackName}"`);
      return cached;
    }

    const knownIds = new Set(catalog.map((entry) => entry.catalogId));
    const userPrompt = buildMatchPrompt(trackName, catalog);
    let lastError = 'no attempts made';

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        if (this.settings.rateLimitDelayMs > 0) {
          await this.sleep(this.settings.rateLimitDelayMs);
        }

        const raw = await this.provider.complete({
          model: this.settings.model,
          temperature: this.settings.temperature,
          systemPrompt: MATCHING_SYSTEM_PROMPT,
          userPrompt,
          responseFormat: 'json'
        });

        const parsed = parseMatchResponse(raw);
        logger.debug(`Response for "${trackName}" recognized as ${parsed.shape} (${parsed.entries.length} entries)`);

        const entries =
          parsed.entries.length > 0
            ? parsed.entries
            : [{ catalog_id: NONE_SENTINEL, confidence: NONE_SENTINEL, reasoning: 'Unparseable response' }];

        const validated = entries.map((entry) => validateMatch(entry, knownIds));
        this.cache.set(trackName, validated);
        return validated;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        lastError = error instanceof SyntaxError ? `Invalid JSON from LLM: ${message}` : `API error: ${message}`;
        logger.warn(`Attempt ${attempt + 1} for "${trackName}" failed: ${lastError}`);
      }

      if (attempt < maxRetries) {
        const waitMs = computeBackoffDelay(
          attempt,
          { base: this.settings.backoffBase, max: this.settings.backoffMax },
          this.random
        );
        logger.info(`Retrying in ${(waitMs / 1000).toFixed(1)}s (attempt ${attempt + 2}/${maxRetries + 1})...`);
        await this.sleep(waitMs);
      }
    }

    logger.error(`LLM matching failed after ${maxRetries + 1} attempts for "${trackName}": ${lastError}`);
    const fallback: MatchCandidate[] = [{ ...NO_MATCH }];
    this.cache.set(trackName, fallback);
    return fallback;
  }
}

import type { LLMConfig } from '../config/types.js';
import { logger } from '../utils/logger.js';
import type { LLMProvider } from './provider.js';
import { OllamaProvider } from './providers/ollama.js';
import { OpenAIProvider } from './providers/openai.js';

export type { LLMProvider } from './provider.js';
export type { CompletionRequest, ParsedMatchResponse, ResponseShape } from './types.js';
export { LLMMatcher } from './fuzzy-matcher.js';
export type { LLMMatcherOptions, MatcherSettings } from './fuzzy-matcher.js';
export { MatchCache } from './cache.js';
export { OllamaProvider } from './providers/ollama.js';
export { OpenAIProvider } from './providers/openai.js';

/**
 * Create an LLM provider from config.
 * Returns null when stage 2 cannot run, which puts the reconciler into
 * deterministic-only mode.
 */
export function createLLMProvider(config: LLMConfig): LLMProvider | null {
  if (!config.enabled) {
    logger.info('LLM matching disabled in configuration; only deterministic matches will be attempted');
    return null;
  }

  switch (config.provider) {
    case 'openai':
      if (!config.apiKey) {
        logger.warn('OPENAI_API_KEY not set; only deterministic matches will be attempted');
        return null;
      }
      return new OpenAIProvider({ apiKey: config.apiKey, apiEndpoint: config.apiEndpoint });

    case 'ollama':
      return new OllamaProvider({ apiEndpoint: config.apiEndpoint });

    default: {
      const unknownProvider: never = config.provider;
      throw new Error(`Unknown LLM provider: ${String(unknownProvider)}`);
    }
  }
}

import type { ReconcileConfig } from './types.js';

/**
 * Default configuration values
 */
export const defaultConfig: ReconcileConfig = {
  tourData: {
    url: null,
    localPath: 'data/tour_setlist.json',
    timeoutMs: 10_000
  },
  catalogPath: 'data/catalog.csv',
  outputPath: 'output/matched_setlists.csv',
  llm: {
    enabled: true,
    provider: 'openai',
    model: 'gpt-4o-mini',
    temperature: 0
  },
  retry: {
    maxRetries: 3,
    backoffBase: 2,
    backoffMax: 30
  },
  rateLimit: {
    delayMs: 100
  }
};

/** Supported LLM backends */
export type LLMProviderName = 'openai' | 'ollama';

/** LLM provider configuration */
export interface LLMConfig {
  /** Whether stage 2 (LLM fuzzy matching) may run at all */
  enabled: boolean;

  /** Which backend to call */
  provider: LLMProviderName;

  /** Model name (e.g., "gpt-4o-mini", "qwen2.5:7b") */
  model: string;

  /** Sampling temperature; 0 keeps answers deterministic */
  temperature: number;

  /** API endpoint URL (for ollama and self-hosted providers) */
  apiEndpoint?: string;

  /** API key for cloud providers (falls back to OPENAI_API_KEY) */
  apiKey?: string;
}

/**
 * Configuration for a reconciliation run
 */
export interface ReconcileConfig {
  /** Where tour setlists come from */
  tourData: {
    /** Remote JSON endpoint (null = local file only) */
    url: string | null;

    /** Local JSON file used when the endpoint is unset or unavailable */
    localPath: string;

    /** Request timeout in milliseconds */
    timeoutMs: number;
  };

  /** Path to the catalog CSV */
  catalogPath: string;

  /** Path of the CSV written at the end of a run */
  outputPath: string;

  llm: LLMConfig;

  /** Retry settings for LLM calls */
  retry: {
    /** Additional attempts after the first failure */
    maxRetries: number;

    /** Exponential base, in seconds (delay = base ^ attempt + jitter) */
    backoffBase: number;

    /** Upper bound on a single backoff delay, in seconds */
    backoffMax: number;
  };

  rateLimit: {
    /** Pause before every LLM call, in milliseconds */
    delayMs: number;
  };
}

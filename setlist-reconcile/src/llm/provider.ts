import type { CompletionRequest } from './types.js';

/** LLM provider interface */
export interface LLMProvider {
  /** Provider name (e.g., "openai", "ollama") */
  name: string;

  /**
   * Send a completion request to the provider
   * @returns The raw text of the model's reply
   * @throws On any transport or service failure, or an empty reply
   */
  complete(request: CompletionRequest): Promise<string>;
}

import OpenAI from 'openai';
import type { LLMProvider } from '../provider.js';
import type { CompletionRequest } from '../types.js';

export interface OpenAIProviderConfig {
  apiKey: string;
  /** Override for OpenAI-compatible endpoints */
  apiEndpoint?: string;
}

export class OpenAIProvider implements LLMProvider {
  name = 'openai';
  private client: OpenAI;

  constructor(config: OpenAIProviderConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.apiEndpoint,
      // Retries belong to the matcher, which applies its own backoff
      maxRetries: 0
    });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: request.model,
      temperature: request.temperature,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userPrompt }
      ]
    });

    const content = response.choices[0]?.message.content;
    if (!content || !content.trim()) {
      throw new Error('OpenAI returned an empty response');
    }

    return content.trim();
  }
}

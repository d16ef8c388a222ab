import { Ollama } from 'ollama';
import type { LLMProvider } from '../provider.js';
import type { CompletionRequest } from '../types.js';

export interface OllamaProviderConfig {
  apiEndpoint?: string; // Default: http://127.0.0.1:11434
}

export class OllamaProvider implements LLMProvider {
  name = 'ollama';
  private client: Ollama;

  constructor(config: OllamaProviderConfig = {}) {
    this.client = new Ollama({
      host: config.apiEndpoint || 'http://127.0.0.1:11434'
    });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.chat({
      model: request.model,
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userPrompt }
      ],
      format: 'json', // Request JSON mode for structured outputs
      stream: false,
      options: {
        temperature: request.temperature
      }
    });

    const content = response.message.content.trim();
    if (!content) {
      throw new Error('Ollama returned an empty response');
    }

    return content;
  }
}

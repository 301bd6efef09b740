/**
 * @fileoverview Claude provider backed by the Anthropic SDK.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { TextBlock } from '@anthropic-ai/sdk/resources/messages';
import { ProviderError, errorMessage } from '../../../utils/errors.js';
import type { GenerateOptions, LlmProvider } from '../types.js';

export interface ClaudeSettings {
  apiKey?: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

export class ClaudeProvider implements LlmProvider {
  readonly name = 'claude' as const;
  private client: Anthropic | null = null;

  constructor(private readonly settings: ClaudeSettings) {}

  isConfigured(): boolean {
    return Boolean(this.settings.apiKey);
  }

  private getClient(): Anthropic {
    if (!this.client) {
      if (!this.settings.apiKey) {
        throw new ProviderError(this.name, 'ANTHROPIC_API_KEY not configured');
      }
      this.client = new Anthropic({ apiKey: this.settings.apiKey });
    }
    return this.client;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const client = this.getClient();

    try {
      const response = await client.messages.create(
        {
          model: this.settings.model,
          max_tokens: this.settings.maxTokens,
          temperature: this.settings.temperature,
          messages: [{ role: 'user', content: prompt }],
        },
        { timeout: options.timeoutMs }
      );

      return response.content
        .filter((block): block is TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('');
    } catch (error) {
      const status = error instanceof Anthropic.APIError ? error.status : undefined;
      throw new ProviderError(this.name, errorMessage(error), status);
    }
  }
}

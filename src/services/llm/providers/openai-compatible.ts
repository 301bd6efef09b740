/**
 * @fileoverview Provider for OpenAI-style `/chat/completions` endpoints.
 *
 * OpenAI and Groq share the wire format, so one adapter serves both and
 * differs only in base URL, key and model.
 */

import { fetchWithRetry } from '../../http/fetch-with-retry.js';
import { ProviderError, errorMessage } from '../../../utils/errors.js';
import type { GenerateOptions, LlmProvider, ProviderName } from '../types.js';

export interface OpenAiCompatibleSettings {
  apiKey?: string;
  model: string;
  baseUrl: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Pull `choices[0].message.content` out of a parsed completion body.
 * Returns null when the body does not have that shape.
 */
export function extractCompletionText(body: unknown): string | null {
  if (!body || typeof body !== 'object' || !('choices' in body) || !Array.isArray(body.choices)) {
    return null;
  }
  const first: unknown = body.choices[0];
  if (!first || typeof first !== 'object' || !('message' in first)) {
    return null;
  }
  const message = first.message;
  if (!message || typeof message !== 'object' || !('content' in message)) {
    return null;
  }
  if (message.content === null) {
    return '';
  }
  return typeof message.content === 'string' ? message.content : null;
}

export class OpenAiCompatibleProvider implements LlmProvider {
  constructor(
    readonly name: Extract<ProviderName, 'openai' | 'groq'>,
    private readonly settings: OpenAiCompatibleSettings
  ) {}

  isConfigured(): boolean {
    return Boolean(this.settings.apiKey);
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    if (!this.settings.apiKey) {
      throw new ProviderError(this.name, 'API key not configured');
    }

    const url = `${this.settings.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    let response: Response;
    try {
      response = await fetchWithRetry(
        url,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.settings.apiKey}`,
          },
          body: JSON.stringify({
            model: this.settings.model,
            messages: [{ role: 'user', content: prompt }],
            temperature: this.settings.temperature,
            max_tokens: this.settings.maxTokens,
          }),
        },
        { operation: `${this.name}_chat_completion`, timeoutMs: options.timeoutMs }
      );
    } catch (error) {
      throw new ProviderError(this.name, errorMessage(error));
    }

    if (!response.ok) {
      const detail = (await response.text()).slice(0, 200);
      throw new ProviderError(this.name, `HTTP ${response.status}: ${detail}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ProviderError(this.name, `Invalid JSON response: ${errorMessage(error)}`);
    }

    const text = extractCompletionText(body);
    if (text === null) {
      throw new ProviderError(this.name, 'Unexpected response shape');
    }
    return text;
  }
}

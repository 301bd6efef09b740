/**
 * @fileoverview Local Ollama provider (`POST /api/generate`, non-streaming).
 */

import { fetchWithRetry } from '../../http/fetch-with-retry.js';
import { ProviderError, errorMessage } from '../../../utils/errors.js';
import type { GenerateOptions, LlmProvider } from '../types.js';

export interface OllamaSettings {
  enabled: boolean;
  model: string;
  baseUrl: string;
}

export class OllamaProvider implements LlmProvider {
  readonly name = 'ollama' as const;

  constructor(private readonly settings: OllamaSettings) {}

  isConfigured(): boolean {
    return this.settings.enabled;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const url = `${this.settings.baseUrl.replace(/\/+$/, '')}/api/generate`;

    let response: Response;
    try {
      // A local daemon that is down fails fast; no point retrying it.
      response = await fetchWithRetry(
        url,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ model: this.settings.model, prompt, stream: false }),
        },
        { operation: 'ollama_generate', timeoutMs: options.timeoutMs, retryDelaysMs: [] }
      );
    } catch (error) {
      throw new ProviderError(this.name, errorMessage(error));
    }

    if (!response.ok) {
      throw new ProviderError(this.name, `HTTP ${response.status}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ProviderError(this.name, `Invalid JSON response: ${errorMessage(error)}`);
    }

    if (!body || typeof body !== 'object' || !('response' in body) || typeof body.response !== 'string') {
      throw new ProviderError(this.name, 'Unexpected response shape');
    }
    return body.response;
  }
}

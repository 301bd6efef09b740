/**
 * @fileoverview Gemini provider backed by @google/generative-ai.
 *
 * Streams the response so generation can be cut once the closing `</html>`
 * tag has arrived; models tend to append commentary after the document.
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import { ProviderError, errorMessage } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import type { GenerateOptions, LlmProvider } from '../types.js';

const logger = createLogger({ domain: 'llm' });

export interface GeminiSettings {
  apiKey?: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

export class GeminiProvider implements LlmProvider {
  readonly name = 'gemini' as const;
  private client: GoogleGenerativeAI | null = null;

  constructor(private readonly settings: GeminiSettings) {}

  isConfigured(): boolean {
    return Boolean(this.settings.apiKey);
  }

  private getClient(): GoogleGenerativeAI {
    if (!this.client) {
      if (!this.settings.apiKey) {
        throw new ProviderError(this.name, 'GOOGLE_API_KEY not configured');
      }
      this.client = new GoogleGenerativeAI(this.settings.apiKey);
    }
    return this.client;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const model = this.getClient().getGenerativeModel(
      {
        model: this.settings.model,
        generationConfig: {
          temperature: this.settings.temperature,
          maxOutputTokens: this.settings.maxTokens,
        },
      },
      { timeout: options.timeoutMs }
    );

    const stopMarker = options.stopAfter?.toLowerCase();
    let text = '';

    try {
      const result = await model.generateContentStream(prompt);
      // The aggregated response is unused; keep its rejection from going unhandled.
      result.response.catch((error: unknown) => {
        logger.debug('gemini_aggregate_discarded', { error: errorMessage(error) });
      });

      for await (const chunk of result.stream) {
        text += chunk.text();
        if (stopMarker && text.toLowerCase().includes(stopMarker)) {
          break;
        }
      }
    } catch (error) {
      throw new ProviderError(this.name, errorMessage(error), statusOf(error));
    }

    return text;
  }
}

/** HTTP status carried by GoogleGenerativeAIFetchError, when present. */
function statusOf(error: unknown): number | undefined {
  if (!error || typeof error !== 'object' || !('status' in error)) {
    return undefined;
  }
  return typeof error.status === 'number' ? error.status : undefined;
}

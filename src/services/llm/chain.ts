/**
 * @fileoverview Sequential provider fallback chain.
 *
 * Providers are tried one at a time in the order derived from LLM_PROVIDER.
 * The first non-empty answer wins; failures and empty answers are logged and
 * the chain moves on.
 */

import config from '../../config.js';
import type { AppConfig } from '../../config.js';
import {
  GenerationFailedError,
  NoProviderAvailableError,
  errorMessage,
} from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import { providerOrder } from './order.js';
import { ClaudeProvider } from './providers/anthropic.js';
import { GeminiProvider } from './providers/gemini.js';
import { OllamaProvider } from './providers/ollama.js';
import { OpenAiCompatibleProvider } from './providers/openai-compatible.js';
import type {
  GenerateTextResult,
  LlmProvider,
  ProviderAttempt,
  ProviderName,
} from './types.js';

const logger = createLogger({ domain: 'llm' });

/** Marker after which streamed HTML output is cut. */
const HTML_END_MARKER = '</html>';

/**
 * Build one adapter per provider from configuration.
 */
export function createProviders(llm: AppConfig['llm']): Record<ProviderName, LlmProvider> {
  return {
    gemini: new GeminiProvider(llm.gemini),
    openai: new OpenAiCompatibleProvider('openai', llm.openai),
    claude: new ClaudeProvider(llm.claude),
    groq: new OpenAiCompatibleProvider('groq', llm.groq),
    ollama: new OllamaProvider(llm.ollama),
  };
}

export interface ChainOptions {
  preference: string;
  timeoutMs: number;
  emptyRetries: number;
}

/**
 * Ordered provider chain. Holds its adapters so tests can swap them out.
 */
export class ProviderChain {
  private readonly order: ProviderName[];

  constructor(
    private readonly providers: Record<ProviderName, LlmProvider>,
    private readonly options: ChainOptions
  ) {
    this.order = providerOrder(options.preference);
  }

  /** Names of providers that would be attempted, in order. */
  configuredProviders(): ProviderName[] {
    return this.order.filter((name) => this.providers[name].isConfigured());
  }

  /**
   * Send the prompt down the chain.
   *
   * @throws NoProviderAvailableError when no provider is configured
   * @throws GenerationFailedError when every configured provider failed or answered empty
   */
  async generateText(prompt: string): Promise<GenerateTextResult> {
    const attempts: ProviderAttempt[] = [];
    const configured = this.configuredProviders();

    for (const name of this.order) {
      if (!configured.includes(name)) {
        logger.debug('provider_skipped', { provider: name, reason: 'not_configured' });
        attempts.push({ provider: name, outcome: 'skipped' });
      }
    }

    if (configured.length === 0) {
      logger.error('no_provider_available', { order: this.order });
      throw new NoProviderAvailableError();
    }

    const { emptyRetries } = this.options;
    const totalPasses = (Number.isInteger(emptyRetries) && emptyRetries > 0 ? emptyRetries : 0) + 1;
    for (let pass = 1; pass <= totalPasses; pass++) {
      let sawEmpty = false;

      for (const name of configured) {
        const provider = this.providers[name];
        const startedAt = Date.now();
        try {
          const text = await provider.generate(prompt, {
            timeoutMs: this.options.timeoutMs,
            stopAfter: HTML_END_MARKER,
          });
          const durationMs = Date.now() - startedAt;

          if (!text.trim()) {
            sawEmpty = true;
            attempts.push({ provider: name, outcome: 'empty', durationMs });
            logger.warn('provider_empty_response', { provider: name, pass, durationMs });
            continue;
          }

          attempts.push({ provider: name, outcome: 'succeeded', durationMs });
          logger.info('provider_succeeded', {
            provider: name,
            pass,
            durationMs,
            outputLength: text.length,
          });
          return { text, provider: name, attempts };
        } catch (error) {
          const durationMs = Date.now() - startedAt;
          attempts.push({ provider: name, outcome: 'failed', error: errorMessage(error), durationMs });
          logger.warn('provider_failed', { provider: name, pass, durationMs, error: errorMessage(error) });
        }
      }

      if (!sawEmpty) {
        break;
      }
      if (pass < totalPasses) {
        logger.info('provider_chain_retry', { pass, reason: 'empty_response' });
      }
    }

    const summary = attempts
      .filter((attempt) => attempt.outcome !== 'skipped')
      .map((attempt) =>
        attempt.error ? `${attempt.provider} ${attempt.outcome} (${attempt.error})` : `${attempt.provider} ${attempt.outcome}`
      )
      .join('; ');
    throw new GenerationFailedError(`All LLM providers failed: ${summary}`, { attempts });
  }
}

let chain: ProviderChain | null = null;

/**
 * Get the chain built from application configuration.
 */
export function getProviderChain(): ProviderChain {
  if (!chain) {
    chain = new ProviderChain(createProviders(config.llm), {
      preference: config.llm.preference,
      timeoutMs: config.llm.timeoutMs,
      emptyRetries: config.llm.emptyRetries,
    });
  }
  return chain;
}

/**
 * Replace the shared chain (tests) or clear it so the next call rebuilds it.
 */
export function setProviderChain(next: ProviderChain | null): void {
  chain = next;
}

/**
 * Generate text with the configured chain.
 */
export async function generateText(prompt: string): Promise<GenerateTextResult> {
  return getProviderChain().generateText(prompt);
}

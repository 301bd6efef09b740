/**
 * LLM Service Types
 *
 * Every hosted or local model sits behind the same small provider interface
 * so the fallback chain can treat them uniformly.
 */

export type ProviderName = 'gemini' | 'openai' | 'claude' | 'groq' | 'ollama';

/**
 * Per-call options passed through to a provider.
 */
export interface GenerateOptions {
  /** Abort the call after this many milliseconds */
  timeoutMs: number;
  /**
   * Stop reading a streamed response once this marker has been seen
   * (case-insensitive). Used to cut generation at `</html>`.
   */
  stopAfter?: string;
}

/**
 * A single LLM backend.
 */
export interface LlmProvider {
  readonly name: ProviderName;

  /** Whether the provider has what it needs (API key, enabled flag). */
  isConfigured(): boolean;

  /**
   * Send one prompt and return the generated text.
   * @throws ProviderError when the call fails
   */
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

export type AttemptOutcome = 'skipped' | 'failed' | 'empty' | 'succeeded';

/**
 * What happened when the chain reached a provider.
 */
export interface ProviderAttempt {
  provider: ProviderName;
  outcome: AttemptOutcome;
  /** Error message when the outcome is `failed` */
  error?: string;
  durationMs?: number;
}

/**
 * Successful chain result.
 */
export interface GenerateTextResult {
  text: string;
  provider: ProviderName;
  attempts: ProviderAttempt[];
}

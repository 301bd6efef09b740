/**
 * Provider ordering for the fallback chain.
 */

import type { ProviderName } from './types.js';

/** Hosted coding-tuned models first, the local model last. */
const DEFAULT_ORDER: ProviderName[] = ['gemini', 'openai', 'claude', 'groq', 'ollama'];

const ORDER_BY_PREFERENCE: Record<string, ProviderName[]> = {
  groq: ['groq', 'openai', 'claude', 'gemini', 'ollama'],
  ollama: ['ollama', 'groq', 'openai', 'claude', 'gemini'],
  gemini: ['gemini', 'openai', 'claude', 'groq', 'ollama'],
  openai: ['openai', 'gemini', 'claude', 'groq', 'ollama'],
  claude: ['claude', 'openai', 'gemini', 'groq', 'ollama'],
  anthropic: ['claude', 'openai', 'gemini', 'groq', 'ollama'],
};

/**
 * Order in which providers are attempted for a given LLM_PROVIDER value.
 * Unknown or empty preferences get the default order.
 */
export function providerOrder(preference: string): ProviderName[] {
  const key = preference.trim().toLowerCase();
  const order = Object.hasOwn(ORDER_BY_PREFERENCE, key) ? ORDER_BY_PREFERENCE[key] : DEFAULT_ORDER;
  return [...order];
}

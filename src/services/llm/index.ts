export { createProviders, generateText, getProviderChain, setProviderChain, ProviderChain } from './chain.js';
export type { ChainOptions } from './chain.js';
export { providerOrder } from './order.js';
export type {
  GenerateOptions,
  GenerateTextResult,
  LlmProvider,
  ProviderAttempt,
  ProviderName,
} from './types.js';

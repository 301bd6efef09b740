/**
 * Mock for @anthropic-ai/sdk module.
 *
 * Provides configurable mock responses for testing the Claude provider
 * without making real API calls.
 */

import { vi } from 'vitest';

/**
 * Text block response from Anthropic API.
 */
export interface TextBlock {
  type: 'text';
  text: string;
}

/**
 * Thinking-style block the provider must skip.
 */
export interface OtherBlock {
  type: 'thinking';
  thinking: string;
}

export type ContentBlock = TextBlock | OtherBlock;

/**
 * Mock response structure matching Anthropic API response.
 */
export interface MockResponse {
  content: ContentBlock[];
  stop_reason: 'end_turn' | 'max_tokens';
}

export interface CreateCall {
  apiKey?: string;
  model: string;
  messages: unknown[];
  max_tokens?: number;
  temperature?: number;
  timeout?: number;
}

/**
 * Mirrors the SDK's APIError so `instanceof Anthropic.APIError` works.
 */
export class MockAPIError extends Error {
  constructor(
    public readonly status: number | undefined,
    message: string
  ) {
    super(message);
    this.name = 'APIError';
  }
}

// Queue of mock responses (or errors) to return
let mockResponses: Array<MockResponse | Error> = [];

// Call history for assertions
let createCalls: CreateCall[] = [];

/**
 * Set the mock responses to return from messages.create().
 * Responses are consumed in order; an Error entry is thrown instead.
 * If the queue is empty, a default text response is returned.
 */
export function setMockResponses(responses: Array<MockResponse | Error>): void {
  mockResponses = [...responses];
}

/**
 * Create a simple text response.
 */
export function createTextResponse(text: string): MockResponse {
  return {
    content: [{ type: 'text', text }],
    stop_reason: 'end_turn',
  };
}

/**
 * Get all calls made to messages.create() for assertions.
 */
export function getCreateCalls(): CreateCall[] {
  return [...createCalls];
}

/**
 * Clear mock state. Call this in beforeEach.
 */
export function clearMockState(): void {
  mockResponses = [];
  createCalls = [];
}

interface CreateParams {
  model: string;
  messages: unknown[];
  max_tokens?: number;
  temperature?: number;
}

// Mock Anthropic class
class MockAnthropic {
  static APIError = MockAPIError;

  messages: {
    create: (params: CreateParams, options?: { timeout?: number }) => Promise<MockResponse>;
  };

  constructor(config?: { apiKey?: string }) {
    const apiKey = config?.apiKey;
    this.messages = {
      create: vi.fn(async (params: CreateParams, options?: { timeout?: number }) => {
        createCalls.push({
          apiKey,
          model: params.model,
          messages: params.messages,
          max_tokens: params.max_tokens,
          temperature: params.temperature,
          timeout: options?.timeout,
        });

        const next = mockResponses.shift();
        if (next instanceof Error) {
          throw next;
        }
        if (next) {
          return next;
        }

        // Default response
        return createTextResponse('<html><body>Mock response</body></html>');
      }),
    };
  }
}

// Export as default (matches how Anthropic SDK is imported)
export default MockAnthropic;

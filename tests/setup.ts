/**
 * Global test setup for Vitest.
 *
 * This file runs before all tests. It configures the test environment
 * and sets up mock cleanup between tests.
 */

import { afterEach, beforeEach, vi } from 'vitest';
import { clearMockState } from './mocks/anthropic.js';
import { clearGeminiMock } from './mocks/gemini.js';

// Set test environment variables before any imports.
// No provider keys: tests wire their own providers, and nothing may reach the network.
process.env.NODE_ENV = 'test';
process.env.LLM_PROVIDER = '';
process.env.OLLAMA_ENABLED = 'false';
process.env.HF_TOKEN = '';
process.env.UNSPLASH_ACCESS_KEY = '';
process.env.SESSION_STORE_PROVIDER = 'memory';
process.env.PAGE_OUTPUT_DIR = './data/test-pages';
process.env.TEMPLATES_DIR = './templates';

// Reset mocks before each test
beforeEach(() => {
  vi.clearAllMocks();
  clearMockState();
  clearGeminiMock();
});

afterEach(() => {
  vi.unstubAllGlobals();
});

/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. Provider keys are
 * optional individually: a provider without a key is simply skipped by the
 * fallback chain, so the only hard requirement is that at least one LLM
 * provider is usable.
 *
 * @see .env.example for the available variables
 */

import 'dotenv/config';
import os from 'os';
import path from 'path';

// ---------------------------------------------------------------------------
// Config helpers
// ---------------------------------------------------------------------------

/** Read an env var that has no default. Returns undefined when unset or blank. */
function secret(key: string): string | undefined {
  const raw = process.env[key];
  return raw && raw.trim() ? raw.trim() : undefined;
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an optional float env var with a default. */
function optionalFloat(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseFloat(raw) : defaultValue;
}

/** Read an optional boolean env var (defaults to `defaultValue`). */
function optionalBool(key: string, defaultValue: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return defaultValue;
  return raw !== (defaultValue ? 'false' : 'true') ? defaultValue : !defaultValue;
}

/** Return a path that differs between dev and production. */
function dbPath(envKey: string, prodPath: string, devPath: string): string {
  return process.env[envKey] || (process.env.NODE_ENV === 'production' ? prodPath : devPath);
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  port: optionalInt('PORT', 3000),
  nodeEnv: optional('NODE_ENV', 'development'),
  maxRequestBody: optional('MAX_REQUEST_BODY', '25mb'),

  /** LLM providers. Order of attempts is derived from `preference`. */
  llm: {
    preference: optional('LLM_PROVIDER', ''),
    timeoutMs: optionalInt('LLM_TIMEOUT_MS', 120000),
    emptyRetries: optionalInt('LLM_EMPTY_RETRIES', 1),

    gemini: {
      apiKey: secret('GOOGLE_API_KEY'),
      model: optional('GEMINI_MODEL', 'gemini-2.5-flash'),
      temperature: optionalFloat('GEMINI_TEMPERATURE', 0.7),
      maxTokens: optionalInt('GEMINI_MAX_TOKENS', 16384),
    },
    openai: {
      apiKey: secret('OPENAI_API_KEY'),
      model: optional('OPENAI_MODEL', 'gpt-4o-mini'),
      baseUrl: optional('OPENAI_BASE_URL', 'https://api.openai.com/v1'),
      temperature: optionalFloat('OPENAI_TEMPERATURE', 0.6),
      maxTokens: optionalInt('OPENAI_MAX_TOKENS', 4096),
    },
    claude: {
      apiKey: secret('ANTHROPIC_API_KEY'),
      model: optional('ANTHROPIC_MODEL', 'claude-3-5-sonnet-20241022'),
      temperature: optionalFloat('ANTHROPIC_TEMPERATURE', 0.6),
      maxTokens: optionalInt('ANTHROPIC_MAX_TOKENS', 4096),
    },
    groq: {
      apiKey: secret('GROQ_API_KEY'),
      model: optional('GROQ_MODEL', 'llama-3.1-70b-versatile'),
      baseUrl: optional('GROQ_BASE_URL', 'https://api.groq.com/openai/v1'),
      temperature: optionalFloat('GROQ_TEMPERATURE', 0.7),
      maxTokens: optionalInt('GROQ_MAX_TOKENS', 4096),
    },
    ollama: {
      enabled: optionalBool('OLLAMA_ENABLED', true),
      model: optional('OLLAMA_MODEL', 'mistral'),
      baseUrl: optional('OLLAMA_BASE_URL', 'http://localhost:11434'),
    },
  },

  /** Image generation and stock photo sources */
  images: {
    huggingFaceToken: secret('HF_TOKEN'),
    huggingFaceBaseUrl: optional('HF_BASE_URL', 'https://api-inference.huggingface.co/models'),
    unsplashAccessKey: secret('UNSPLASH_ACCESS_KEY'),
    timeoutMs: optionalInt('IMAGE_TIMEOUT_MS', 60000),
  },

  /** Design catalog overrides (bundled defaults are used when unset) */
  catalog: {
    stylePresetsPath: process.env.STYLE_PRESETS_PATH,
    componentLibraryPath: process.env.COMPONENT_LIBRARY_PATH,
    interactiveEnhancementsPath: process.env.INTERACTIVE_ENHANCEMENTS_PATH,
  },

  /** Reference inputs */
  reference: {
    templatesDir: optional('TEMPLATES_DIR', './templates'),
    fetchTimeoutMs: optionalInt('REFERENCE_FETCH_TIMEOUT_MS', 10000),
  },

  /** Session storage configuration */
  sessions: {
    provider: optional('SESSION_STORE_PROVIDER', 'sqlite') as 'sqlite' | 'memory',
    sqlitePath: dbPath('SESSION_DB_PATH', '/app/data/sessions.db', './data/sessions.db'),
  },

  /** Where generated pages are written */
  output: {
    dir: optional('PAGE_OUTPUT_DIR', path.join(os.tmpdir(), 'pagesmith')),
  },
};

export type AppConfig = typeof config;

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];
  const { llm } = config;

  const anyProvider =
    Boolean(llm.gemini.apiKey) ||
    Boolean(llm.openai.apiKey) ||
    Boolean(llm.claude.apiKey) ||
    Boolean(llm.groq.apiKey) ||
    llm.ollama.enabled;
  if (!anyProvider) {
    errors.push(
      'At least one LLM provider is required: set GOOGLE_API_KEY, OPENAI_API_KEY, ANTHROPIC_API_KEY or GROQ_API_KEY, or enable Ollama'
    );
  }

  const preference = llm.preference.trim().toLowerCase();
  const knownPreferences = ['', 'gemini', 'openai', 'claude', 'anthropic', 'groq', 'ollama'];
  if (!knownPreferences.includes(preference)) {
    errors.push(`LLM_PROVIDER must be one of gemini, openai, claude, anthropic, groq, ollama, got ${llm.preference}`);
  }

  // Numeric bounds
  if (Number.isNaN(config.port) || config.port < 1 || config.port > 65535) {
    errors.push(`PORT must be 1-65535, got ${config.port}`);
  }
  if (Number.isNaN(llm.timeoutMs) || llm.timeoutMs < 1000) {
    errors.push(`LLM_TIMEOUT_MS must be >= 1000, got ${llm.timeoutMs}`);
  }
  if (Number.isNaN(llm.emptyRetries) || llm.emptyRetries < 0 || llm.emptyRetries > 5) {
    errors.push(`LLM_EMPTY_RETRIES must be 0-5, got ${llm.emptyRetries}`);
  }
  for (const name of ['gemini', 'openai', 'claude', 'groq'] as const) {
    const { temperature, maxTokens } = llm[name];
    if (Number.isNaN(temperature) || temperature < 0 || temperature > 2) {
      errors.push(`${name.toUpperCase()} temperature must be 0-2, got ${temperature}`);
    }
    if (Number.isNaN(maxTokens) || maxTokens < 1) {
      errors.push(`${name.toUpperCase()} max tokens must be >= 1, got ${maxTokens}`);
    }
  }
  if (Number.isNaN(config.images.timeoutMs) || config.images.timeoutMs < 1000) {
    errors.push(`IMAGE_TIMEOUT_MS must be >= 1000, got ${config.images.timeoutMs}`);
  }
  if (Number.isNaN(config.reference.fetchTimeoutMs) || config.reference.fetchTimeoutMs < 1000) {
    errors.push(`REFERENCE_FETCH_TIMEOUT_MS must be >= 1000, got ${config.reference.fetchTimeoutMs}`);
  }
  if (config.sessions.provider !== 'sqlite' && config.sessions.provider !== 'memory') {
    errors.push(`SESSION_STORE_PROVIDER must be sqlite or memory, got ${config.sessions.provider}`);
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;

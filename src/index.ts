/**
 * @fileoverview Express server entry point for Pagesmith.
 *
 * Validates configuration, logs which LLM providers are usable and starts the
 * HTTP server. SIGINT/SIGTERM close the session store and then the server.
 */

import config, { validateConfig } from './config.js';
import { createApp } from './app.js';
import { getProviderChain } from './services/llm/index.js';
import { getImageSources } from './services/images/index.js';
import { closeSessionStore, getSessionStore } from './services/sessions/index.js';
import { createLogger, initObservability } from './utils/observability/index.js';

// Fail fast if critical configuration is missing
validateConfig();
initObservability();

const logger = createLogger({ domain: 'server' });

// Open the store up front so a bad database path fails at boot
getSessionStore();

const app = createApp();

const server = app.listen(config.port, () => {
  logger.info('server_started', { port: config.port, env: config.nodeEnv });

  // Presence only, never values
  logger.info('config_check', {
    llmProviders: getProviderChain().configuredProviders(),
    llmPreference: config.llm.preference || undefined,
    imageSources: getImageSources()
      .filter((source) => source.isAvailable())
      .map((source) => source.name),
    sessionStore: config.sessions.provider,
    outputDir: config.output.dir,
  });
});

let isShuttingDown = false;

function shutdown(signal: string): void {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  logger.info('shutdown_signal_received', { signal });

  closeSessionStore();

  const forceExitTimer = setTimeout(() => {
    logger.warn('force_exit_after_timeout');
    process.exit(1);
  }, 10000);

  server.close(() => {
    clearTimeout(forceExitTimer);
    logger.info('server_closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

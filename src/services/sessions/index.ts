/**
 * @fileoverview Session store factory.
 *
 * Picks the SQLite or in-memory store from config.
 * Singleton pattern - returns the same instance on repeated calls.
 */

import config from '../../config.js';
import type { SessionStore } from './types.js';
import { MemorySessionStore } from './memory.js';
import { SqliteSessionStore } from './sqlite.js';

export type {
  CreateSessionInput,
  RevisionKind,
  Session,
  SessionRevision,
  SessionStore,
} from './types.js';
export { MemorySessionStore } from './memory.js';
export { SqliteSessionStore } from './sqlite.js';

let instance: SessionStore | null = null;

/**
 * Get the session store instance.
 */
export function getSessionStore(): SessionStore {
  if (instance) {
    return instance;
  }

  instance =
    config.sessions.provider === 'memory'
      ? new MemorySessionStore()
      : new SqliteSessionStore(config.sessions.sqlitePath);
  return instance;
}

/**
 * Close the session store.
 * Call this during graceful shutdown.
 */
export function closeSessionStore(): void {
  if (instance) {
    instance.close();
    instance = null;
  }
}

/**
 * Reset the session store instance.
 * Useful for tests.
 */
export function resetSessionStore(): void {
  instance = null;
}

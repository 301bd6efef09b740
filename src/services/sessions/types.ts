/**
 * Session Service Types
 *
 * A session is one page being iterated on. It keeps the brief and design
 * choices from the first request plus the current HTML, so follow-up
 * change requests can be made by session id alone.
 */

import type { SectionPreferences } from '../catalog/types.js';

export type RevisionKind = 'generate' | 'update';

export interface Session {
  id: string;
  /** Brief the page was first generated from */
  originalPrompt: string;
  stylePreset?: string;
  preferredSections?: SectionPreferences;
  /** Uploaded profile image (data URL) or profile image URL */
  profileImage?: string;
  /** Latest HTML of the page */
  currentHtml: string;
  /** LLM provider that produced the current HTML */
  provider: string;
  /** Unix timestamp (milliseconds) */
  createdAt: number;
  /** Unix timestamp (milliseconds) */
  updatedAt: number;
}

/**
 * One stored version of a session's page.
 */
export interface SessionRevision {
  id: string;
  sessionId: string;
  kind: RevisionKind;
  /** Brief or change request that produced this revision */
  prompt: string;
  html: string;
  provider: string;
  createdAt: number;
}

export interface CreateSessionInput {
  originalPrompt: string;
  stylePreset?: string;
  preferredSections?: SectionPreferences;
  profileImage?: string;
  html: string;
  provider: string;
  /** Kind of the first revision (default `generate`) */
  initialKind?: RevisionKind;
  /** Prompt recorded on the first revision (default `originalPrompt`) */
  revisionPrompt?: string;
}

/**
 * Session store interface.
 *
 * Implementations:
 * - SqliteSessionStore: persists to a SQLite file
 * - MemorySessionStore: in-process maps (tests, ephemeral deployments)
 */
export interface SessionStore {
  /** Create a session and record its first revision. */
  create(input: CreateSessionInput): Promise<Session>;

  /** Get a session by id, or null. */
  get(id: string): Promise<Session | null>;

  /**
   * Replace the session's current HTML and append an `update` revision.
   * Returns the updated session, or null when the id is unknown.
   */
  recordUpdate(id: string, prompt: string, html: string, provider: string): Promise<Session | null>;

  /** Revisions in chronological order; empty for an unknown id. */
  listRevisions(id: string): Promise<SessionRevision[]>;

  /** Delete a session and its revisions. Returns whether it existed. */
  delete(id: string): Promise<boolean>;

  /** Release resources. */
  close(): void;
}

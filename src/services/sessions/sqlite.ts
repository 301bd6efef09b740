/**
 * @fileoverview SQLite session store.
 *
 * Two tables: `page_sessions` holds the current state of each session and
 * `page_revisions` every version of its HTML. Revisions are removed with
 * their session through a foreign key cascade.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { randomUUID } from 'crypto';
import { parseSectionPreferences } from '../catalog/preferences.js';
import type { SectionPreferences } from '../catalog/types.js';
import type {
  CreateSessionInput,
  RevisionKind,
  Session,
  SessionRevision,
  SessionStore,
} from './types.js';

interface SessionRow {
  id: string;
  original_prompt: string;
  style_preset: string | null;
  preferred_sections: string | null;
  profile_image: string | null;
  current_html: string;
  provider: string;
  created_at: number;
  updated_at: number;
}

interface RevisionRow {
  id: string;
  session_id: string;
  kind: string;
  prompt: string;
  html: string;
  provider: string;
  created_at: number;
}

function parsePreferencesColumn(raw: string | null): SectionPreferences | undefined {
  if (!raw) return undefined;
  try {
    return parseSectionPreferences(JSON.parse(raw));
  } catch {
    return undefined;
  }
}

function toSession(row: SessionRow): Session {
  return {
    id: row.id,
    originalPrompt: row.original_prompt,
    stylePreset: row.style_preset ?? undefined,
    preferredSections: parsePreferencesColumn(row.preferred_sections),
    profileImage: row.profile_image ?? undefined,
    currentHtml: row.current_html,
    provider: row.provider,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toRevisionKind(kind: string): RevisionKind {
  return kind === 'update' ? 'update' : 'generate';
}

/**
 * SQLite implementation of the session store.
 */
export class SqliteSessionStore implements SessionStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    // Ensure directory exists
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma('foreign_keys = ON');
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS page_sessions (
        id TEXT PRIMARY KEY,
        original_prompt TEXT NOT NULL,
        style_preset TEXT,
        preferred_sections TEXT,
        profile_image TEXT,
        current_html TEXT NOT NULL,
        provider TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS page_revisions (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL REFERENCES page_sessions(id) ON DELETE CASCADE,
        kind TEXT NOT NULL,
        prompt TEXT NOT NULL,
        html TEXT NOT NULL,
        provider TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_revisions_session
        ON page_revisions(session_id, created_at);
    `);
  }

  private insertRevision(
    sessionId: string,
    kind: RevisionKind,
    prompt: string,
    html: string,
    provider: string,
    createdAt: number
  ): void {
    this.db
      .prepare(
        `INSERT INTO page_revisions (id, session_id, kind, prompt, html, provider, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(randomUUID(), sessionId, kind, prompt, html, provider, createdAt);
  }

  async create(input: CreateSessionInput): Promise<Session> {
    const id = randomUUID();
    const now = Date.now();
    const preferencesJson = input.preferredSections ? JSON.stringify(input.preferredSections) : null;

    const insert = this.db.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO page_sessions
           (id, original_prompt, style_preset, preferred_sections, profile_image, current_html, provider, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          id,
          input.originalPrompt,
          input.stylePreset ?? null,
          preferencesJson,
          input.profileImage ?? null,
          input.html,
          input.provider,
          now,
          now
        );
      this.insertRevision(
        id,
        input.initialKind ?? 'generate',
        input.revisionPrompt ?? input.originalPrompt,
        input.html,
        input.provider,
        now
      );
    });
    insert();

    return {
      id,
      originalPrompt: input.originalPrompt,
      stylePreset: input.stylePreset,
      preferredSections: input.preferredSections,
      profileImage: input.profileImage,
      currentHtml: input.html,
      provider: input.provider,
      createdAt: now,
      updatedAt: now,
    };
  }

  async get(id: string): Promise<Session | null> {
    const row = this.db
      .prepare(
        `SELECT id, original_prompt, style_preset, preferred_sections, profile_image,
                current_html, provider, created_at, updated_at
         FROM page_sessions WHERE id = ?`
      )
      .get(id) as SessionRow | undefined;

    return row ? toSession(row) : null;
  }

  async recordUpdate(id: string, prompt: string, html: string, provider: string): Promise<Session | null> {
    const now = Date.now();

    const update = this.db.transaction((): boolean => {
      const result = this.db
        .prepare(`UPDATE page_sessions SET current_html = ?, provider = ?, updated_at = ? WHERE id = ?`)
        .run(html, provider, now, id);
      if (result.changes === 0) {
        return false;
      }
      this.insertRevision(id, 'update', prompt, html, provider, now);
      return true;
    });

    return update() ? this.get(id) : null;
  }

  async listRevisions(id: string): Promise<SessionRevision[]> {
    const rows = this.db
      .prepare(
        `SELECT id, session_id, kind, prompt, html, provider, created_at
         FROM page_revisions
         WHERE session_id = ?
         ORDER BY created_at ASC, rowid ASC`
      )
      .all(id) as RevisionRow[];

    return rows.map((row) => ({
      id: row.id,
      sessionId: row.session_id,
      kind: toRevisionKind(row.kind),
      prompt: row.prompt,
      html: row.html,
      provider: row.provider,
      createdAt: row.created_at,
    }));
  }

  async delete(id: string): Promise<boolean> {
    const result = this.db.prepare(`DELETE FROM page_sessions WHERE id = ?`).run(id);
    return result.changes > 0;
  }

  /** Close the database connection. */
  close(): void {
    this.db.close();
  }
}

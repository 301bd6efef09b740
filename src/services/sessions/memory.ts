/**
 * In-memory session store. State is lost on restart.
 */

import { randomUUID } from 'crypto';
import type { CreateSessionInput, Session, SessionRevision, SessionStore } from './types.js';

function copySession(session: Session): Session {
  return { ...session, preferredSections: session.preferredSections && structuredClone(session.preferredSections) };
}

export class MemorySessionStore implements SessionStore {
  private sessions = new Map<string, Session>();
  private revisions = new Map<string, SessionRevision[]>();

  async create(input: CreateSessionInput): Promise<Session> {
    const now = Date.now();
    const session: Session = {
      id: randomUUID(),
      originalPrompt: input.originalPrompt,
      stylePreset: input.stylePreset,
      preferredSections: input.preferredSections && structuredClone(input.preferredSections),
      profileImage: input.profileImage,
      currentHtml: input.html,
      provider: input.provider,
      createdAt: now,
      updatedAt: now,
    };

    this.sessions.set(session.id, session);
    this.revisions.set(session.id, [
      {
        id: randomUUID(),
        sessionId: session.id,
        kind: input.initialKind ?? 'generate',
        prompt: input.revisionPrompt ?? input.originalPrompt,
        html: input.html,
        provider: input.provider,
        createdAt: now,
      },
    ]);

    return copySession(session);
  }

  async get(id: string): Promise<Session | null> {
    const session = this.sessions.get(id);
    return session ? copySession(session) : null;
  }

  async recordUpdate(id: string, prompt: string, html: string, provider: string): Promise<Session | null> {
    const session = this.sessions.get(id);
    if (!session) {
      return null;
    }

    const now = Date.now();
    const updated: Session = { ...session, currentHtml: html, provider, updatedAt: now };
    this.sessions.set(id, updated);
    this.revisions.get(id)?.push({
      id: randomUUID(),
      sessionId: id,
      kind: 'update',
      prompt,
      html,
      provider,
      createdAt: now,
    });

    return copySession(updated);
  }

  async listRevisions(id: string): Promise<SessionRevision[]> {
    return (this.revisions.get(id) ?? []).map((revision) => ({ ...revision }));
  }

  async delete(id: string): Promise<boolean> {
    this.revisions.delete(id);
    return this.sessions.delete(id);
  }

  close(): void {
    this.sessions.clear();
    this.revisions.clear();
  }
}

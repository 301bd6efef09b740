/**
 * Contract tests shared by both session stores.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import {
  MemorySessionStore,
  SqliteSessionStore,
  type SessionStore,
} from '../../../src/services/sessions/index.js';

const TEST_DB_PATH = './data/test-sessions.db';

function removeTestDb(): void {
  for (const suffix of ['', '-wal', '-shm']) {
    if (fs.existsSync(TEST_DB_PATH + suffix)) {
      fs.unlinkSync(TEST_DB_PATH + suffix);
    }
  }
}

const implementations: Array<[string, () => SessionStore]> = [
  ['MemorySessionStore', () => new MemorySessionStore()],
  [
    'SqliteSessionStore',
    () => {
      fs.mkdirSync(path.dirname(TEST_DB_PATH), { recursive: true });
      removeTestDb();
      return new SqliteSessionStore(TEST_DB_PATH);
    },
  ],
];

describe.each(implementations)('%s', (_name, createStore) => {
  let store: SessionStore;

  beforeEach(() => {
    store = createStore();
  });

  afterEach(() => {
    store.close();
    removeTestDb();
  });

  describe('create', () => {
    it('stores the session and a generate revision', async () => {
      const session = await store.create({
        originalPrompt: 'Portfolio for a potter',
        stylePreset: 'warm',
        preferredSections: { hero: { include: true, variant: 'split' } },
        profileImage: 'data:image/png;base64,AQID',
        html: '<html>v1</html>',
        provider: 'openai',
      });

      const loaded = await store.get(session.id);
      expect(loaded).toEqual(session);
      expect(loaded?.preferredSections).toEqual({ hero: { include: true, variant: 'split' } });
      expect(loaded?.createdAt).toBe(loaded?.updatedAt);

      const revisions = await store.listRevisions(session.id);
      expect(revisions).toHaveLength(1);
      expect(revisions[0]).toMatchObject({
        sessionId: session.id,
        kind: 'generate',
        prompt: 'Portfolio for a potter',
        html: '<html>v1</html>',
        provider: 'openai',
      });
    });

    it('keeps stored section preferences apart from callers', async () => {
      const input = { hero: { include: true, variant: 'split' } };
      const session = await store.create({
        originalPrompt: 'Portfolio for a potter',
        preferredSections: input,
        html: '<html>v1</html>',
        provider: 'openai',
      });

      input.hero.variant = 'centered';
      const returned = session.preferredSections?.hero;
      if (returned) {
        returned.include = false;
      }
      const loaded = await store.get(session.id);
      const hero = loaded?.preferredSections?.hero;
      if (hero) {
        hero.variant = 'minimal';
      }

      expect((await store.get(session.id))?.preferredSections).toEqual({ hero: { include: true, variant: 'split' } });
    });

    it('records the first revision kind and prompt when given', async () => {
      const session = await store.create({
        originalPrompt: 'Make it blue',
        html: '<html>edited</html>',
        provider: 'groq',
        initialKind: 'update',
        revisionPrompt: 'Make it blue',
      });

      const [revision] = await store.listRevisions(session.id);
      expect(revision.kind).toBe('update');
      expect(revision.prompt).toBe('Make it blue');
      expect((await store.get(session.id))?.stylePreset).toBeUndefined();
    });

    it('assigns distinct ids', async () => {
      const input = { originalPrompt: 'x', html: '<p>x</p>', provider: 'ollama' };
      const first = await store.create(input);
      const second = await store.create(input);
      expect(first.id).not.toBe(second.id);
    });
  });

  describe('get', () => {
    it('returns null for an unknown id', async () => {
      expect(await store.get('missing')).toBeNull();
    });
  });

  describe('recordUpdate', () => {
    it('replaces the current html and appends a revision', async () => {
      const session = await store.create({ originalPrompt: 'Bakery site', html: '<html>v1</html>', provider: 'openai' });

      const updated = await store.recordUpdate(session.id, 'Add a menu', '<html>v2</html>', 'anthropic');

      expect(updated?.currentHtml).toBe('<html>v2</html>');
      expect(updated?.provider).toBe('anthropic');
      expect(updated?.originalPrompt).toBe('Bakery site');
      expect((await store.get(session.id))?.currentHtml).toBe('<html>v2</html>');

      const revisions = await store.listRevisions(session.id);
      expect(revisions.map((revision) => [revision.kind, revision.prompt, revision.html])).toEqual([
        ['generate', 'Bakery site', '<html>v1</html>'],
        ['update', 'Add a menu', '<html>v2</html>'],
      ]);
    });

    it('returns null for an unknown id', async () => {
      expect(await store.recordUpdate('missing', 'x', '<p>x</p>', 'openai')).toBeNull();
      expect(await store.listRevisions('missing')).toEqual([]);
    });
  });

  describe('delete', () => {
    it('removes the session and its revisions', async () => {
      const session = await store.create({ originalPrompt: 'x', html: '<p>x</p>', provider: 'openai' });

      expect(await store.delete(session.id)).toBe(true);
      expect(await store.get(session.id)).toBeNull();
      expect(await store.listRevisions(session.id)).toEqual([]);
      expect(await store.delete(session.id)).toBe(false);
    });
  });
});

describe('SqliteSessionStore persistence', () => {
  afterEach(() => {
    removeTestDb();
  });

  it('reads sessions back after reopening the database', async () => {
    fs.mkdirSync(path.dirname(TEST_DB_PATH), { recursive: true });
    removeTestDb();

    const first = new SqliteSessionStore(TEST_DB_PATH);
    const session = await first.create({
      originalPrompt: 'Cafe site',
      preferredSections: { gallery: { include: false } },
      html: '<html>cafe</html>',
      provider: 'gemini',
    });
    first.close();

    const second = new SqliteSessionStore(TEST_DB_PATH);
    try {
      const loaded = await second.get(session.id);
      expect(loaded?.currentHtml).toBe('<html>cafe</html>');
      expect(loaded?.preferredSections).toEqual({ gallery: { include: false } });
      expect(loaded?.profileImage).toBeUndefined();
    } finally {
      second.close();
    }
  });
});

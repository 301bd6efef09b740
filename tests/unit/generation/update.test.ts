import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { UPDATE_INPUT_REQUIRED, updateWebsite } from '../../../src/services/generation/index.js';
import { setProviderChain } from '../../../src/services/llm/index.js';
import { PageWriter, setPageWriter } from '../../../src/services/output/page-writer.js';
import { getSessionStore, resetSessionStore } from '../../../src/services/sessions/index.js';
import { NotFoundError, ValidationError } from '../../../src/utils/errors.js';
import { useFakeProviders } from '../../helpers/app.js';
import { stubFetch } from '../../helpers/fetch.js';

describe('updateWebsite', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pagesmith-update-'));
    setPageWriter(new PageWriter(outputDir));
    resetSessionStore();
    stubFetch();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setPageWriter(null);
    setProviderChain(null);
    resetSessionStore();
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  it('edits the session page and records a revision', async () => {
    const session = await getSessionStore().create({
      originalPrompt: 'Bakery in Lisbon',
      stylePreset: 'editorial',
      profileImage: 'data:image/png;base64,AQID',
      html: '<html><body><h1>Old</h1></body></html>',
      provider: 'gemini',
    });
    const providers = useFakeProviders({
      openai: ['<html><body><h1 style="color:blue">Old</h1><img src="{{image: profile}}"></body></html>'],
    });

    const result = await updateWebsite({ changeRequest: ' Make the heading blue ', sessionId: session.id });

    const expectedHtml =
      '<html><body><h1 style="color:blue">Old</h1><img src="data:image/png;base64,AQID"></body></html>';
    expect(result.sessionId).toBe(session.id);
    expect(result.content).toBe(expectedHtml);
    expect(fs.readFileSync(result.filePath, 'utf-8')).toBe(expectedHtml);

    const prompt = providers.openai.prompts[0];
    expect(prompt).toContain('<current_html>\n<html><body><h1>Old</h1></body></html>\n</current_html>');
    expect(prompt).toContain('Make the heading blue');
    expect(prompt).toContain('- Style Name: Editorial Luxe');

    const stored = await getSessionStore().get(session.id);
    expect(stored?.currentHtml).toBe(expectedHtml);
    expect(stored?.provider).toBe('openai');
    const revisions = await getSessionStore().listRevisions(session.id);
    expect(revisions.map((revision) => [revision.kind, revision.prompt])).toEqual([
      ['generate', 'Bakery in Lisbon'],
      ['update', 'Make the heading blue'],
    ]);
  });

  it('prefers HTML from the request over the session', async () => {
    const session = await getSessionStore().create({
      originalPrompt: 'Bakery',
      html: '<p>stored</p>',
      provider: 'gemini',
    });
    const providers = useFakeProviders({ openai: ['<p>edited</p>'] });

    await updateWebsite({ changeRequest: 'Shorter', currentHtml: '<p>from client</p>', sessionId: session.id });

    expect(providers.openai.prompts[0]).toContain('<p>from client</p>');
    expect(providers.openai.prompts[0]).not.toContain('<p>stored</p>');
  });

  it('starts a session when none is given', async () => {
    useFakeProviders({ openai: ['<p>edited</p>'] });

    const result = await updateWebsite({ changeRequest: 'Add a footer', currentHtml: '<p>page</p>' });

    const session = await getSessionStore().get(result.sessionId);
    expect(session?.originalPrompt).toBe('Add a footer');
    expect(session?.currentHtml).toBe('<p>edited</p>');
    const revisions = await getSessionStore().listRevisions(result.sessionId);
    expect(revisions.map((revision) => [revision.kind, revision.prompt])).toEqual([['update', 'Add a footer']]);
  });

  it('keeps the original brief on a new session', async () => {
    useFakeProviders({ openai: ['<p>edited</p>'] });

    const result = await updateWebsite({
      changeRequest: 'Add a footer',
      currentHtml: '<p>page</p>',
      originalPrompt: 'Florist in Porto',
    });

    expect((await getSessionStore().get(result.sessionId))?.originalPrompt).toBe('Florist in Porto');
  });

  it('rejects an unknown session', async () => {
    useFakeProviders({ openai: ['<p>edited</p>'] });

    await expect(updateWebsite({ changeRequest: 'Add a footer', sessionId: 'missing' })).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  it('tags log records from a session update with the session id', async () => {
    const session = await getSessionStore().create({
      originalPrompt: 'Bakery',
      html: '<p>stored</p>',
      provider: 'gemini',
    });
    useFakeProviders({ openai: [new Error('rate limited')], groq: ['<p>edited</p>'] });
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    await updateWebsite({ changeRequest: 'Shorter', sessionId: session.id });

    const records: Array<Record<string, unknown>> = stderrSpy.mock.calls.map((call) => JSON.parse(String(call[0])));
    const failure = records.find((record) => record.event === 'provider_failed');
    expect(failure).toMatchObject({ provider: 'openai', sessionId: session.id });
  });

  it('fails without writing a page when the session disappears mid-update', async () => {
    const session = await getSessionStore().create({
      originalPrompt: 'Bakery',
      html: '<p>stored</p>',
      provider: 'gemini',
    });
    useFakeProviders({ openai: ['<p>edited</p>'] });
    vi.spyOn(getSessionStore(), 'recordUpdate').mockResolvedValue(null);

    await expect(updateWebsite({ changeRequest: 'Shorter', sessionId: session.id })).rejects.toBeInstanceOf(
      NotFoundError
    );
    expect(fs.readdirSync(outputDir)).toEqual([]);
  });

  it('requires a change request and something to edit', async () => {
    const providers = useFakeProviders({ openai: ['<p>edited</p>'] });

    await expect(updateWebsite({ changeRequest: '  ', currentHtml: '<p>page</p>' })).rejects.toThrow(
      UPDATE_INPUT_REQUIRED
    );
    await expect(updateWebsite({ changeRequest: 'Add a footer' })).rejects.toBeInstanceOf(ValidationError);
    expect(providers.openai.prompts).toHaveLength(0);
  });
});

import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { listTemplates, loadTemplate, withProfilePlaceholders } from '../../../src/services/reference/index.js';

const HEADSHOT = '<img src="https://images.unsplash.com/photo-1507003211169-0a1dd7228f2d?w=500&h=600" alt="me">';

describe('withProfilePlaceholders', () => {
  it('replaces stock headshots including their query string', () => {
    expect(withProfilePlaceholders(HEADSHOT)).toBe('<img src="{{image: profile}}" alt="me">');
  });

  it('replaces other unsplash photo files', () => {
    expect(withProfilePlaceholders('<img src="https://images.unsplash.com/photo-42-abc.jpg">')).toBe(
      '<img src="{{image: profile}}">'
    );
  });

  it('leaves other images alone', () => {
    const html = '<img src="https://cdn.test/logo.png">';
    expect(withProfilePlaceholders(html)).toBe(html);
  });
});

describe('templates', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pagesmith-templates-'));
    fs.writeFileSync(path.join(dir, 'portfolio.html'), HEADSHOT);
    fs.writeFileSync(path.join(dir, 'landing.html'), HEADSHOT);
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'not a template');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('adds profile placeholders to personal templates only', () => {
    expect(loadTemplate('portfolio', dir)).toBe('<img src="{{image: profile}}" alt="me">');
    expect(loadTemplate('landing', dir)).toBe(HEADSHOT);
  });

  it('returns null for unknown or unsafe names', () => {
    expect(loadTemplate('missing', dir)).toBeNull();
    expect(loadTemplate('../portfolio', dir)).toBeNull();
    expect(loadTemplate('', dir)).toBeNull();
  });

  it('lists html templates by name', () => {
    expect(listTemplates(dir)).toEqual(['landing', 'portfolio']);
  });

  it('lists nothing for a missing directory', () => {
    expect(listTemplates(path.join(dir, 'absent'))).toEqual([]);
  });
});

import { describe, expect, it } from 'vitest';
import { ensureProfilePlaceholder, isPersonalSiteBrief } from '../../../src/services/images/index.js';

const UPLOADED = { profile: 'data:image/png;base64,AAA' };
const STOCK_IMG = '<img class="rounded" src="https://images.unsplash.com/photo-1.jpg" alt="person">';

describe('isPersonalSiteBrief', () => {
  it('detects personal sites', () => {
    expect(isPersonalSiteBrief('My Portfolio as a designer')).toBe(true);
    expect(isPersonalSiteBrief('Create resume page')).toBe(true);
    expect(isPersonalSiteBrief('A bakery landing page')).toBe(false);
  });
});

describe('ensureProfilePlaceholder', () => {
  it('swaps stock photos for the profile placeholder', () => {
    expect(ensureProfilePlaceholder(`<header>${STOCK_IMG}</header>`, 'portfolio for a designer', UPLOADED)).toBe(
      '<header><img src="{{image: profile}}" alt="profile"></header>'
    );
  });

  it('keeps pages that already place the profile', () => {
    const html = `{{image: profile}}${STOCK_IMG}`;

    expect(ensureProfilePlaceholder(html, 'portfolio', UPLOADED)).toBe(html);
  });

  it('does nothing without an upload or for other briefs', () => {
    expect(ensureProfilePlaceholder(STOCK_IMG, 'portfolio', {})).toBe(STOCK_IMG);
    expect(ensureProfilePlaceholder(STOCK_IMG, 'A bakery', UPLOADED)).toBe(STOCK_IMG);
  });
});

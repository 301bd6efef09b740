import { describe, expect, it } from 'vitest';
import {
  fillImages,
  imagePromptFor,
  isProfileLabel,
  placeholderImageUrl,
} from '../../../src/services/images/index.js';
import { FakeImageSource } from './fake-source.js';

describe('placeholder helpers', () => {
  it('recognises profile-like labels', () => {
    expect(['profile', 'Team Avatar', 'headshot photo'].map(isProfileLabel)).toEqual([true, true, true]);
    expect(isProfileLabel('hero-banner')).toBe(false);
  });

  it('builds deterministic picsum URLs', () => {
    expect(placeholderImageUrl('hero banner')).toBe('https://picsum.photos/seed/hero%20banner/800/500');
    expect(placeholderImageUrl('avatar')).toBe('https://picsum.photos/seed/avatar/400/400');
  });

  it('builds source prompts with the style hint', () => {
    expect(imagePromptFor('food-dish', 'warm tones')).toBe('food-dish, warm tones');
    expect(imagePromptFor('food-dish')).toBe('food-dish');
    expect(imagePromptFor('profile photo', 'film grain')).toBe(
      'professional headshot portrait, profile photo, high quality, business professional, in the style of film grain'
    );
  });
});

describe('fillImages', () => {
  it('uses uploads first and picsum when no source is available', async () => {
    const html = '<img src="{{image: profile}}" alt="me"><img src="{{image: hero banner}}">';

    const result = await fillImages(html, {
      uploadedImages: { profile: 'data:image/png;base64,AAA' },
      sources: [new FakeImageSource('flux', 'https://cdn.test/never.png', false)],
    });

    expect(result).toBe(
      '<img src="data:image/png;base64,AAA" alt="me"><img src="https://picsum.photos/seed/hero%20banner/800/500">'
    );
  });

  it('walks the sources in order and turns bare placeholders into img tags', async () => {
    const flux = new FakeImageSource('flux', 'https://cdn.test/flux.png', false);
    const diffusion = new FakeImageSource('stable-diffusion', null);
    const unsplash = new FakeImageSource('unsplash', 'https://images.unsplash.com/photo-x?w=1080');

    const result = await fillImages('<section>{{image: food-dish}}</section>', {
      styleImageHint: 'warm tones',
      sources: [flux, diffusion, unsplash],
    });

    expect(result).toBe('<section><img src="https://images.unsplash.com/photo-x?w=1080" alt="food-dish"></section>');
    expect(flux.prompts).toEqual([]);
    expect(diffusion.prompts).toEqual(['food-dish, warm tones']);
    expect(unsplash.prompts).toEqual(['food-dish, warm tones']);
  });

  it('moves past a source that throws', async () => {
    const broken = new FakeImageSource('flux', new Error('boom'));
    const stock = new FakeImageSource('unsplash', 'https://cdn.test/stock.jpg');

    const result = await fillImages('<img src="{{image: interior}}">', { sources: [broken, stock] });

    expect(result).toBe('<img src="https://cdn.test/stock.jpg">');
  });

  it('resolves each distinct label once', async () => {
    const source = new FakeImageSource('unsplash', 'https://cdn.test/team.jpg');

    const result = await fillImages('{{image: team}}<hr>{{image:team}}', { sources: [source] });

    expect(source.prompts).toEqual(['team']);
    expect(result).toBe('<img src="https://cdn.test/team.jpg" alt="team"><hr><img src="https://cdn.test/team.jpg" alt="team">');
  });

  it('fills only the first placeholder form from sources and the rest with picsum', async () => {
    const source = new FakeImageSource('unsplash', 'https://cdn.test/hero.png');

    const result = await fillImages('<img src="{{image: hero}}"><p>{image: b}</p>', { sources: [source] });

    expect(result).toBe(
      '<img src="https://cdn.test/hero.png"><p><img src="https://picsum.photos/seed/b/800/500" alt="b"></p>'
    );
    expect(source.prompts).toEqual(['hero']);
  });

  it('uses an upload for a placeholder outside the first form', async () => {
    const result = await fillImages('<img src="{{image: hero}}"><p>{{image: profile}}</p>', {
      uploadedImages: { profile: 'data:image/png;base64,AQID' },
      sources: [],
    });

    expect(result).toBe(
      '<img src="https://picsum.photos/seed/hero/800/500"><p><img src="data:image/png;base64,AQID" alt="profile"></p>'
    );
  });

  it('normalises real-URL images before filling', async () => {
    const result = await fillImages('<img src="https://evil.test/a.jpg" alt="interior">', { sources: [] });

    expect(result).toBe('<img src="https://picsum.photos/seed/interior/800/500" alt="interior">');
  });

  it('returns pages without placeholders unchanged', async () => {
    const html = '<html><body><h1>No images</h1></body></html>';

    expect(await fillImages(html, { sources: [] })).toBe(html);
  });
});

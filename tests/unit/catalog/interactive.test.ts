import { describe, expect, it } from 'vitest';
import { buildInteractiveContext, parseSectionPreferences } from '../../../src/services/catalog/index.js';
import { testEnhancements } from './fixtures.js';

describe('buildInteractiveContext', () => {
  it('describes each known enhancement', () => {
    const context = buildInteractiveContext(['counters', { id: 'missing' }, { id: 5 }], testEnhancements);

    expect(context.split('\n')).toEqual([
      'INTERACTIVE ENHANCEMENT BLUEPRINT:',
      'Integrate the following micro-interactions. Each chosen effect must be implemented in HTML/CSS ' +
        '(with minimal JS if required), kept lightweight, and paired with a brief on-page explanation of why it matters.',
      '- Counters: Show numbers. Place it in the stats band. Implementation notes: IntersectionObserver. ' +
        "Include a short caption or subheading that explains the effect's benefit so users understand the premium feel.",
      'Ensure animations respect prefers-reduced-motion by providing graceful fallbacks.',
    ]);
  });

  it('accepts { id } objects', () => {
    expect(buildInteractiveContext([{ id: 'counters' }], testEnhancements)).toContain('- Counters: Show numbers.');
  });

  it('returns nothing when no known enhancement was chosen', () => {
    expect(buildInteractiveContext([], testEnhancements)).toBe('');
    expect(buildInteractiveContext(undefined, testEnhancements)).toBe('');
    expect(buildInteractiveContext(['missing', ''], testEnhancements)).toBe('');
  });
});

describe('parseSectionPreferences', () => {
  it('keeps well-formed fields only', () => {
    expect(
      parseSectionPreferences({
        hero: { include: false, variant: 'hero_split' },
        pricing: 'yes',
        faq: { include: 'no', variant: '' },
      })
    ).toEqual({
      hero: { include: false, variant: 'hero_split' },
      faq: {},
    });
  });

  it('returns an empty map for non-objects', () => {
    expect(parseSectionPreferences(null)).toEqual({});
    expect(parseSectionPreferences(['hero'])).toEqual({});
    expect(parseSectionPreferences('hero')).toEqual({});
  });
});

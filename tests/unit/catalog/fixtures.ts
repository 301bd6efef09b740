import type {
  ComponentLibrary,
  ComponentVariant,
  EnhancementLibrary,
  StylePresetLibrary,
} from '../../../src/services/catalog/index.js';

function variant(id: string, name: string, layout: string, bestFor: string[], extra: Partial<ComponentVariant> = {}): ComponentVariant {
  return {
    id,
    name,
    layout,
    contentFocus: [],
    visualNotes: '',
    bestFor,
    cssPrimitives: [],
    ...extra,
  };
}

export const testLibrary: ComponentLibrary = {
  hero: {
    label: 'Hero',
    description: 'Top of the page',
    variants: [
      variant('hero_split', 'Split Hero', 'Copy left, image right', ['saas', 'general']),
      variant('hero_portrait', 'Portrait Hero', 'Centered portrait', ['portfolio'], {
        contentFocus: ['headline', 'photo'],
        visualNotes: 'circle crop',
        cssPrimitives: ['grid'],
      }),
    ],
  },
  pricing: {
    label: '',
    description: 'Plans',
    variants: [variant('pricing_tiers', 'Three Tiers', 'Three columns', ['saas'])],
  },
  empty: {
    label: 'Empty',
    description: '',
    variants: [],
  },
};

export const testPresets: StylePresetLibrary = {
  neo_brutal: {
    label: '',
    palette: ['#000', '#fff'],
    fonts: ['Space Grotesk'],
    mood: ['bold', 'calm'],
    uiAccents: 'thick borders',
    instructions: 'Be loud.',
    imagePrompt: 'high contrast',
  },
};

export const testEnhancements: EnhancementLibrary = {
  counters: {
    label: 'Counters',
    purpose: 'Show numbers.',
    placement: 'the stats band',
    implementation: 'IntersectionObserver',
  },
};

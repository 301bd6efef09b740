import { describe, expect, it } from 'vitest';
import { refineImageQuery } from '../../../src/services/images/index.js';

describe('refineImageQuery', () => {
  it('rewrites known dishes', () => {
    expect(refineImageQuery('Chicken Biryani', 'stock')).toBe('biryani rice dish indian food');
    expect(refineImageQuery('lamb curry', 'generative')).toBe(
      'lamb rogan josh, kashmiri curry, indian dish, food photography, delicious meal, high quality'
    );
  });

  it('adds food cues to food queries', () => {
    expect(refineImageQuery('food-dish', 'stock')).toBe('food-dish food cuisine dish');
    expect(refineImageQuery('food-dish', 'generative')).toBe(
      'food-dish, food photography, delicious meal, high quality, professional'
    );
  });

  it('returns other queries unchanged', () => {
    expect(refineImageQuery('sunset', 'stock')).toBe('sunset');
    expect(refineImageQuery('lamb', 'generative')).toBe('lamb');
  });
});

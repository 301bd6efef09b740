/**
 * Query rewrites that get better results for common subjects.
 *
 * Stock search wants short keyword strings; generative models want a
 * descriptive prompt with quality cues.
 */

export type QueryFlavour = 'stock' | 'generative';

interface Refinement {
  matches: (lower: string) => boolean;
  stock: (query: string) => string;
  generative: (query: string) => string;
}

const REFINEMENTS: Refinement[] = [
  {
    matches: (q) => q.includes('biryani') || q.includes('biriyani'),
    stock: () => 'biryani rice dish indian food',
    generative: () => 'delicious biryani rice dish, indian cuisine, food photography, high quality',
  },
  {
    matches: (q) => q.includes('lamb') && ['rogan', 'josh', 'food', 'dish', 'curry'].some((word) => q.includes(word)),
    stock: () => 'lamb rogan josh kashmiri curry indian food',
    generative: () =>
      'lamb rogan josh, kashmiri curry, indian dish, food photography, delicious meal, high quality',
  },
  {
    matches: (q) => q.includes('food') || q.includes('dish'),
    stock: (query) => `${query} food cuisine dish`,
    generative: (query) => `${query}, food photography, delicious meal, high quality, professional`,
  },
  {
    matches: (q) => q.includes('cleaning'),
    stock: () => 'professional cleaning service',
    generative: () => 'professional cleaning service, clean, modern, high quality',
  },
  {
    matches: (q) => q.includes('portfolio'),
    stock: () => 'professional portfolio work',
    generative: () => 'professional portfolio work, modern design, high quality',
  },
];

/**
 * Rewrite an image query for the given kind of source. Queries no rule
 * matches are returned unchanged.
 */
export function refineImageQuery(query: string, flavour: QueryFlavour): string {
  const lower = query.toLowerCase();
  const refinement = REFINEMENTS.find((candidate) => candidate.matches(lower));
  if (!refinement) {
    return query;
  }
  return flavour === 'stock' ? refinement.stock(query) : refinement.generative(query);
}

/**
 * @fileoverview Component blueprint selection.
 *
 * Infers what kind of project the brief describes, picks one variant per
 * library section for it, applies the client's per-section overrides and
 * renders the result as a COMPONENT BLUEPRINT prompt block.
 */

import { getCatalog } from './registry.js';
import { titleCase } from './style.js';
import type {
  ComponentLibrary,
  ComponentSection,
  ComponentSelection,
  ComponentVariant,
  SectionPreferences,
} from './types.js';

/** Keywords (substring match) that mark a brief as a given project type. */
const PROJECT_TAG_KEYWORDS: ReadonlyArray<[tag: string, keywords: string[]]> = [
  ['saas', ['saas', 'software', 'platform', 'startup', 'app', 'tech']],
  ['agency', ['agency', 'studio', 'consult', 'freelance', 'creative']],
  ['services', ['service', 'salon', 'spa', 'therapy', 'coaching']],
  ['product', ['product', 'ecommerce', 'shop', 'store', 'retail']],
  ['portfolio', ['portfolio', 'photography', 'designer', 'artist']],
  ['education', ['school', 'academy', 'bootcamp', 'education', 'course']],
  ['case-study', ['case study', 'success story']],
];

export interface ComponentContext {
  selections: Record<string, ComponentSelection>;
  /** COMPONENT BLUEPRINT block, or '' when nothing was selected */
  blueprint: string;
}

/**
 * Tags describing the project, from the brief and template name.
 */
export function inferProjectTags(text: string, templateName = ''): Set<string> {
  const haystack = `${text} ${templateName}`.toLowerCase();
  const tags = new Set<string>();

  for (const [tag, keywords] of PROJECT_TAG_KEYWORDS) {
    if (keywords.some((keyword) => haystack.includes(keyword))) {
      tags.add(tag);
    }
  }

  if (tags.size === 0) {
    tags.add('general');
  }
  return tags;
}

function toSelection(key: string, section: ComponentSection, variant: ComponentVariant): ComponentSelection {
  return {
    sectionLabel: section.label || titleCase(key),
    sectionDescription: section.description,
    variant,
  };
}

/**
 * For each section, the first variant suited to one of the tags, else the
 * section's first variant. Sections without variants are left out.
 */
export function selectComponentVariants(
  tags: Set<string>,
  library: ComponentLibrary = getCatalog().componentLibrary
): Record<string, ComponentSelection> {
  const selections: Record<string, ComponentSelection> = {};

  for (const [key, section] of Object.entries(library)) {
    const chosen =
      section.variants.find((variant) => variant.bestFor.some((tag) => tags.has(tag))) ??
      section.variants[0];
    if (chosen) {
      selections[key] = toSelection(key, section, chosen);
    }
  }

  return selections;
}

function renderBlueprint(selections: Record<string, ComponentSelection>): string {
  const lines = [
    'COMPONENT BLUEPRINT:',
    'Assemble the page using these curated section patterns for consistency.',
  ];

  for (const { sectionLabel, variant } of Object.values(selections)) {
    lines.push(`- ${sectionLabel} → ${variant.name}: ${variant.layout}`);
    if (variant.contentFocus.length > 0) {
      lines.push(`  Content focus: ${variant.contentFocus.join(', ')}`);
    }
    if (variant.visualNotes) {
      lines.push(`  Visual notes: ${variant.visualNotes}`);
    }
    if (variant.cssPrimitives.length > 0) {
      lines.push(`  CSS primitives: ${variant.cssPrimitives.join(', ')}`);
    }
  }

  return lines.join('\n');
}

/**
 * Select component variants for a brief and render the blueprint.
 *
 * Preferences override the inferred choice per section: `include: false`
 * drops the section, `variant` picks that variant id (falling back to the
 * section's first variant). Preferences for unknown sections are ignored.
 */
export function buildComponentContext(
  prompt: string,
  templateName = '',
  preferences: SectionPreferences = {},
  library: ComponentLibrary = getCatalog().componentLibrary
): ComponentContext {
  const selections = selectComponentVariants(inferProjectTags(prompt, templateName), library);

  for (const [key, preference] of Object.entries(preferences)) {
    if (!Object.hasOwn(library, key)) continue;
    const section = library[key];

    if (preference.include === false) {
      delete selections[key];
      continue;
    }

    const wanted = preference.variant
      ? section.variants.find((variant) => variant.id === preference.variant)
      : undefined;
    const variant = wanted ?? section.variants[0];
    if (variant) {
      selections[key] = toSelection(key, section, variant);
    }
  }

  if (Object.keys(selections).length === 0) {
    return { selections: {}, blueprint: '' };
  }
  return { selections, blueprint: renderBlueprint(selections) };
}

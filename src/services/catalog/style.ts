/**
 * Style preset prompt context.
 */

import { getCatalog } from './registry.js';
import type { StylePresetLibrary } from './types.js';

export interface StyleContext {
  /** DESIGN STYLE GUIDANCE block, or '' for an unknown preset */
  context: string;
  /** Style suffix for image prompts, or '' */
  imageHint: string;
}

/** `neo_brutal` → `Neo_Brutal` */
export function titleCase(value: string): string {
  return value.toLowerCase().replace(/[a-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1));
}

/**
 * Build the style guidance block for a preset key.
 */
export function buildStyleContext(
  key: string | undefined,
  presets: StylePresetLibrary = getCatalog().stylePresets
): StyleContext {
  if (!key || !Object.hasOwn(presets, key)) {
    return { context: '', imageHint: '' };
  }
  const preset = presets[key];

  const headingFont = preset.fonts[0] ?? 'sans-serif';
  const bodyFont = preset.fonts[1] ?? 'sans-serif';

  const context = [
    'DESIGN STYLE GUIDANCE:',
    `- Style Name: ${preset.label || titleCase(key)}`,
    `- Palette: ${preset.palette.join(' / ')}`,
    `- Typography: Heading – ${headingFont}, Body – ${bodyFont}`,
    `- Mood: ${preset.mood.join(', ')}`,
    `- UI Accents: ${preset.uiAccents}`,
    `- Additional Instructions: ${preset.instructions}`,
    'Ensure every section, color choice, component spacing, and interaction embodies this style consistently.',
  ].join('\n');

  return { context, imageHint: preset.imagePrompt };
}

/**
 * Interactive enhancement prompt context.
 */

import { getCatalog } from './registry.js';
import type { EnhancementLibrary } from './types.js';

/** Clients send either bare ids or `{ id }` objects. */
export type EnhancementSelection = string | { id?: unknown };

function selectionId(item: EnhancementSelection): string | null {
  if (typeof item === 'string') {
    return item || null;
  }
  return typeof item.id === 'string' && item.id ? item.id : null;
}

/**
 * Render the INTERACTIVE ENHANCEMENT BLUEPRINT for the chosen effects.
 * Unknown ids are ignored; returns '' when nothing known was chosen.
 */
export function buildInteractiveContext(
  selected: EnhancementSelection[] | undefined,
  library: EnhancementLibrary = getCatalog().interactiveEnhancements
): string {
  if (!selected || selected.length === 0) {
    return '';
  }

  const lines: string[] = [];
  for (const item of selected) {
    const id = selectionId(item);
    if (!id || !Object.hasOwn(library, id)) continue;
    const enhancement = library[id];
    lines.push(
      `- ${enhancement.label}: ${enhancement.purpose} Place it in ${enhancement.placement}. ` +
        `Implementation notes: ${enhancement.implementation}. ` +
        "Include a short caption or subheading that explains the effect's benefit so users understand the premium feel."
    );
  }

  if (lines.length === 0) {
    return '';
  }

  const header =
    'INTERACTIVE ENHANCEMENT BLUEPRINT:\n' +
    'Integrate the following micro-interactions. Each chosen effect must be implemented in HTML/CSS ' +
    '(with minimal JS if required), kept lightweight, and paired with a brief on-page explanation of why it matters.\n';
  const footer = '\nEnsure animations respect prefers-reduced-motion by providing graceful fallbacks.';
  return header + lines.join('\n') + footer;
}

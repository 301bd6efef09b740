/**
 * Validation of client-supplied section preferences.
 */

import type { SectionPreference, SectionPreferences } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep only well-formed `{ include?: boolean, variant?: string }` entries.
 * Anything that is not an object yields an empty preference map.
 */
export function parseSectionPreferences(value: unknown): SectionPreferences {
  if (!isRecord(value)) {
    return {};
  }

  const preferences: SectionPreferences = {};
  for (const [section, raw] of Object.entries(value)) {
    if (!isRecord(raw)) continue;
    const preference: SectionPreference = {};
    if (typeof raw.include === 'boolean') preference.include = raw.include;
    if (typeof raw.variant === 'string' && raw.variant) preference.variant = raw.variant;
    preferences[section] = preference;
  }
  return preferences;
}

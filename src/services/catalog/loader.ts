/**
 * @fileoverview Catalog file loading.
 *
 * Each catalog can be overridden by a JSON file path from config. A file that
 * is missing, unparsable, not an object or empty falls back to the bundled
 * copy under `catalog/`. Entries that do not have the expected shape are
 * dropped one by one so a single bad preset does not hide the rest.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import type {
  ComponentSection,
  ComponentVariant,
  InteractiveEnhancement,
  StylePreset,
} from './types.js';

const logger = createLogger({ domain: 'catalog' });

// Three levels up from src/services/catalog (or dist/services/catalog).
const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const BUNDLED_CATALOG_DIR = path.resolve(__dirname, '..', '..', '..', 'catalog');

type EntryParser<T> = (value: unknown) => T | null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  if (value === undefined) return '';
  return typeof value === 'string' ? value : null;
}

function stringList(record: Record<string, unknown>, key: string): string[] | null {
  const value = record[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) return null;
  return value.filter((item): item is string => typeof item === 'string');
}

export const parseStylePreset: EntryParser<StylePreset> = (value) => {
  if (!isRecord(value)) return null;
  const label = stringField(value, 'label');
  const palette = stringList(value, 'palette');
  const fonts = stringList(value, 'fonts');
  const mood = stringList(value, 'mood');
  const uiAccents = stringField(value, 'ui_accents');
  const instructions = stringField(value, 'instructions');
  const imagePrompt = stringField(value, 'image_prompt');
  if (
    label === null || palette === null || fonts === null || mood === null ||
    uiAccents === null || instructions === null || imagePrompt === null
  ) {
    return null;
  }
  return { label, palette, fonts, mood, uiAccents, instructions, imagePrompt };
};

function parseVariant(value: unknown): ComponentVariant | null {
  if (!isRecord(value)) return null;
  const id = stringField(value, 'id');
  const name = stringField(value, 'name');
  const layout = stringField(value, 'layout');
  const contentFocus = stringList(value, 'content_focus');
  const visualNotes = stringField(value, 'visual_notes');
  const bestFor = stringList(value, 'best_for');
  const cssPrimitives = stringList(value, 'css_primitives');
  if (
    !id || name === null || layout === null || contentFocus === null ||
    visualNotes === null || bestFor === null || cssPrimitives === null
  ) {
    return null;
  }
  return { id, name: name || id, layout, contentFocus, visualNotes, bestFor, cssPrimitives };
}

export const parseComponentSection: EntryParser<ComponentSection> = (value) => {
  if (!isRecord(value)) return null;
  const label = stringField(value, 'label');
  const description = stringField(value, 'description');
  const rawVariants = value.variants === undefined ? [] : value.variants;
  if (label === null || description === null || !Array.isArray(rawVariants)) {
    return null;
  }
  const variants = rawVariants
    .map(parseVariant)
    .filter((variant): variant is ComponentVariant => variant !== null);
  return { label, description, variants };
};

export const parseEnhancement: EntryParser<InteractiveEnhancement> = (value) => {
  if (!isRecord(value)) return null;
  const label = stringField(value, 'label');
  const purpose = stringField(value, 'purpose');
  const placement = stringField(value, 'placement');
  const implementation = stringField(value, 'implementation');
  if (!label || purpose === null || placement === null || implementation === null) {
    return null;
  }
  return { label, purpose, placement, implementation };
};

/**
 * Read a JSON object from disk. Returns null (and logs why) when the file
 * cannot be used.
 */
function readJsonObject(filePath: string): Record<string, unknown> | null {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    logger.warn('catalog_file_unreadable', { filePath, error: errorMessage(error) });
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.warn('catalog_file_invalid_json', { filePath, error: errorMessage(error) });
    return null;
  }

  if (!isRecord(parsed) || Object.keys(parsed).length === 0) {
    logger.warn('catalog_file_empty', { filePath });
    return null;
  }
  return parsed;
}

/**
 * Parse every entry of a catalog object, dropping malformed ones.
 */
export function parseEntries<T>(
  raw: Record<string, unknown>,
  parse: EntryParser<T>,
  source: string
): Record<string, T> {
  const entries: Record<string, T> = {};
  for (const [key, value] of Object.entries(raw)) {
    const entry = parse(value);
    if (entry) {
      entries[key] = entry;
    } else {
      logger.warn('catalog_entry_dropped', { source, key });
    }
  }
  return entries;
}

/**
 * Load one catalog: the configured file when usable, else the bundled file.
 */
export function loadCatalogFile<T>(
  configuredPath: string | undefined,
  bundledFile: string,
  parse: EntryParser<T>
): Record<string, T> {
  if (configuredPath) {
    const raw = readJsonObject(configuredPath);
    if (raw) {
      const entries = parseEntries(raw, parse, configuredPath);
      if (Object.keys(entries).length > 0) {
        logger.info('catalog_loaded', { filePath: configuredPath, entries: Object.keys(entries).length });
        return entries;
      }
    }
    logger.warn('catalog_fallback_to_bundled', { configuredPath, bundledFile });
  }

  const bundledPath = path.join(BUNDLED_CATALOG_DIR, bundledFile);
  const raw = readJsonObject(bundledPath);
  if (!raw) {
    logger.error('catalog_bundled_missing', { filePath: bundledPath });
    return {};
  }
  return parseEntries(raw, parse, bundledPath);
}

/**
 * @fileoverview Design catalog access.
 *
 * Loaded lazily on first use and cached for the life of the process.
 */

import config from '../../config.js';
import {
  loadCatalogFile,
  parseComponentSection,
  parseEnhancement,
  parseStylePreset,
} from './loader.js';
import type { Catalog } from './types.js';

let catalog: Catalog | null = null;

/**
 * Get the style presets, component library and interactive enhancements.
 */
export function getCatalog(): Catalog {
  if (!catalog) {
    catalog = {
      stylePresets: loadCatalogFile(
        config.catalog.stylePresetsPath,
        'style-presets.json',
        parseStylePreset
      ),
      componentLibrary: loadCatalogFile(
        config.catalog.componentLibraryPath,
        'component-library.json',
        parseComponentSection
      ),
      interactiveEnhancements: loadCatalogFile(
        config.catalog.interactiveEnhancementsPath,
        'interactive-enhancements.json',
        parseEnhancement
      ),
    };
  }
  return catalog;
}

/**
 * Drop the cached catalog (for testing).
 */
export function resetCatalog(): void {
  catalog = null;
}

export { getCatalog, resetCatalog } from './registry.js';
export { BUNDLED_CATALOG_DIR } from './loader.js';
export { buildStyleContext, titleCase } from './style.js';
export type { StyleContext } from './style.js';
export {
  buildComponentContext,
  inferProjectTags,
  selectComponentVariants,
} from './components.js';
export type { ComponentContext } from './components.js';
export { buildInteractiveContext } from './interactive.js';
export type { EnhancementSelection } from './interactive.js';
export type * from './types.js';
export { parseSectionPreferences } from './preferences.js';

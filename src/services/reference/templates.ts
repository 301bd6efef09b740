/**
 * Site templates: starter HTML files under TEMPLATES_DIR.
 * Names map to `<name>.html`; anything that could leave the directory is refused.
 */

import fs from 'fs';
import path from 'path';
import config from '../../config.js';
import { createLogger } from '../../utils/observability/index.js';

const logger = createLogger({ domain: 'reference' });

const TEMPLATE_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Stock headshots that starter templates ship with, query string included. */
const STOCK_HEADSHOT_SRC =
  /src="https:\/\/images\.unsplash\.com\/photo-(?:1507003211169-0a1dd7228f2d|1472099645785-5658abf4ff4e)[^"]*"/g;
const UNSPLASH_PHOTO_SRC = /src="https:\/\/images\.unsplash\.com\/photo-[^"]*\.(?:jpg|jpeg|png)"/g;

function isPersonalTemplate(name: string): boolean {
  const lower = name.toLowerCase();
  return lower.includes('portfolio') || lower.includes('resume');
}

/**
 * Point a personal template's stock photos at the profile placeholder.
 */
export function withProfilePlaceholders(html: string): string {
  return html
    .replace(STOCK_HEADSHOT_SRC, 'src="{{image: profile}}"')
    .replace(UNSPLASH_PHOTO_SRC, 'src="{{image: profile}}"');
}

/**
 * Read a template by name. Returns null for unknown or unsafe names.
 */
export function loadTemplate(name: string, dir: string = config.reference.templatesDir): string | null {
  if (!TEMPLATE_NAME_PATTERN.test(name)) {
    logger.warn('template_name_rejected', { name });
    return null;
  }

  const filePath = path.join(dir, `${name}.html`);
  if (!fs.existsSync(filePath)) {
    logger.warn('template_not_found', { name, filePath });
    return null;
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  logger.info('template_loaded', { name, length: content.length });
  return isPersonalTemplate(name) ? withProfilePlaceholders(content) : content;
}

/**
 * Names of the available templates, sorted.
 */
export function listTemplates(dir: string = config.reference.templatesDir): string[] {
  if (!fs.existsSync(dir)) {
    return [];
  }
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith('.html'))
    .map((entry) => entry.name.slice(0, -'.html'.length))
    .filter((name) => TEMPLATE_NAME_PATTERN.test(name))
    .sort();
}

/**
 * @fileoverview Reference website analysis.
 *
 * Fetches a page the user wants the result to resemble and condenses it into
 * a text summary (title, colors, fonts, layout landmarks, an HTML sample)
 * for the generation prompt.
 */

import * as cheerio from 'cheerio';
import config from '../../config.js';
import { errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import { fetchWithRetry } from '../http/fetch-with-retry.js';

const logger = createLogger({ domain: 'reference' });

const COLOR_PATTERN = /#[0-9a-fA-F]{6}|rgb\([^)]+\)|[a-z-]+:\s*[a-z]+/g;
const FONT_PATTERN = /font-family:\s*([^;,}]+)/g;
const HERO_PATTERN = /hero|banner|jumbotron/i;

const CSS_SAMPLE_LENGTH = 1000;
const HTML_SAMPLE_LENGTH = 2000;

function distinct(values: string[]): string[] {
  return [...new Set(values)];
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Summarize the design of already-fetched HTML.
 */
export function summarizeWebsiteDesign(url: string, html: string): string {
  const $ = cheerio.load(html);
  const lines = [`REFERENCE WEBSITE URL: ${url}`, ''];

  const title = $('title').first().text().trim();
  if (title) {
    lines.push(`Website Title: ${title}`);
  }

  const description = $('meta[name="description"]').attr('content');
  if (description) {
    lines.push(`Description: ${description}`);
  }

  const css = ($('style').first().html() ?? '').slice(0, CSS_SAMPLE_LENGTH);
  const colors = distinct((css.match(COLOR_PATTERN) ?? []).slice(0, 5));
  if (colors.length > 0) {
    lines.push(`Color Scheme: ${colors.join(', ')}`);
  }

  const fonts = distinct(
    [...html.matchAll(FONT_PATTERN)].slice(0, 3).map((match) => match[1].trim())
  );
  if (fonts.length > 0) {
    lines.push(`Fonts Used: ${fonts.join(', ')}`);
  }

  const elements: string[] = [];
  if ($('header, nav').length > 0) elements.push('Header/Navigation');
  if (HERO_PATTERN.test(html)) elements.push('Hero Section');
  if ($('footer').length > 0) elements.push('Footer');

  lines.push('', `Layout Elements: ${elements.length > 0 ? elements.join(', ') : 'Standard layout'}`);
  lines.push('', `HTML Structure Sample (first ${HTML_SAMPLE_LENGTH} chars):`, html.slice(0, HTML_SAMPLE_LENGTH));
  lines.push(
    '',
    "INSTRUCTIONS: Analyze this website's design, layout, color scheme, typography, and structure. " +
      'Create a similar design for the new website with the same professional appearance and layout style.'
  );

  return lines.join('\n');
}

/**
 * Fetch a reference website and summarize it. Returns null when the URL is
 * not http(s) or the page cannot be fetched.
 */
export async function fetchWebsiteDesign(url: string): Promise<string | null> {
  if (!isHttpUrl(url)) {
    logger.warn('reference_url_rejected', { url });
    return null;
  }

  try {
    const response = await fetchWithRetry(
      url,
      { method: 'GET', headers: { Accept: 'text/html' } },
      { operation: 'reference_fetch', timeoutMs: config.reference.fetchTimeoutMs, retryDelaysMs: [] }
    );
    if (!response.ok) {
      logger.warn('reference_fetch_failed', { url, status: response.status });
      return null;
    }
    const html = await response.text();
    logger.info('reference_fetched', { url, length: html.length });
    return summarizeWebsiteDesign(url, html);
  } catch (error) {
    logger.warn('reference_fetch_failed', { url, error: errorMessage(error) });
    return null;
  }
}

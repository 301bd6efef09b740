/**
 * @fileoverview Placeholder replacement.
 *
 * Every `{{image: label}}` left in generated HTML is swapped for a real image:
 * an upload under the same label, else the first image the source chain
 * produces, else a deterministic picsum placeholder. Placeholders outside the
 * first form present take an upload or picsum directly.
 */

import { errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import { normalizeImageMarkup } from './normalize.js';
import { getImageSources } from './sources/index.js';
import type { FillImagesOptions, ImageSource, UploadedImages } from './types.js';

const logger = createLogger({ domain: 'images' });

/**
 * Placeholder forms in precedence order. Only the first form present in a
 * page is replaced from the source chain; `src` forms replace the whole
 * attribute, bare forms become an `<img>` tag.
 */
const PLACEHOLDER_FORMS: ReadonlyArray<{ pattern: RegExp; attribute: boolean }> = [
  { pattern: /src="\{\{image:\s*(.*?)\s*\}\}"/g, attribute: true },
  { pattern: /src="\{image:\s*(.*?)\s*\}"/g, attribute: true },
  { pattern: /src="image:\s*(.*?)"/g, attribute: true },
  { pattern: /\{\{image:\s*(.*?)\s*\}\}/g, attribute: false },
  { pattern: /\{image:\s*(.*?)\s*\}/g, attribute: false },
];

const LEFTOVER_NESTED_IMG = /<img\s+src="&lt;img[^>]*>"[^>]*>/g;
const LEFTOVER_ESCAPED_IMG = /&lt;img[^>]*&gt;/g;
const REMAINING_SRC_PLACEHOLDER = /src="\{\{?image:\s*(.*?)\s*\}\}?"/g;
const REMAINING_PLACEHOLDER = /\{\{?image:\s*(.*?)\s*\}\}?/g;

const PROFILE_LABEL_WORDS = ['profile', 'avatar', 'photo'];

export function isProfileLabel(label: string): boolean {
  const lower = label.toLowerCase();
  return PROFILE_LABEL_WORDS.some((word) => lower.includes(word));
}

/** Deterministic stand-in image for a label. */
export function placeholderImageUrl(label: string): string {
  const size = isProfileLabel(label) ? '400/400' : '800/500';
  return `https://picsum.photos/seed/${encodeURIComponent(label)}/${size}`;
}

/** Prompt sent to image sources for a label. */
export function imagePromptFor(label: string, styleImageHint = ''): string {
  if (isProfileLabel(label)) {
    const prompt = `professional headshot portrait, ${label}, high quality, business professional`;
    return styleImageHint ? `${prompt}, in the style of ${styleImageHint}` : prompt;
  }
  return styleImageHint ? `${label}, ${styleImageHint}` : label;
}

/**
 * Walk the sources in order; the first image wins, otherwise `fallbackUrl`.
 */
export async function resolveImage(
  prompt: string,
  fallbackUrl: string,
  sources: ImageSource[] = getImageSources()
): Promise<string> {
  for (const source of sources) {
    if (!source.isAvailable()) {
      logger.debug('image_source_skipped', { source: source.name });
      continue;
    }
    try {
      const url = await source.fetch(prompt);
      if (url) {
        logger.debug('image_resolved', { source: source.name });
        return url;
      }
    } catch (error) {
      logger.warn('image_source_failed', { source: source.name, error: errorMessage(error) });
    }
  }
  logger.info('image_placeholder_used', { fallbackUrl });
  return fallbackUrl;
}

function imgTag(url: string, label: string): string {
  return `<img src="${url}" alt="${label.replace(/"/g, '&quot;')}">`;
}

/**
 * Replace image placeholders in generated HTML.
 */
export async function fillImages(html: string, options: FillImagesOptions = {}): Promise<string> {
  const uploaded: UploadedImages = options.uploadedImages ?? {};
  const hint = options.styleImageHint ?? '';
  const sources = options.sources ?? getImageSources();

  let result = normalizeImageMarkup(html);

  const form = PLACEHOLDER_FORMS.find(({ pattern }) => new RegExp(pattern.source).test(result));
  if (form) {
    const labels = new Set([...result.matchAll(form.pattern)].map((match) => match[1].trim()));
    const resolved = new Map<string, string>();

    for (const label of labels) {
      if (Object.hasOwn(uploaded, label)) {
        resolved.set(label, uploaded[label]);
        continue;
      }
      resolved.set(label, await resolveImage(imagePromptFor(label, hint), placeholderImageUrl(label), sources));
    }

    result = result.replace(form.pattern, (_match: string, raw: string) => {
      const label = raw.trim();
      const url = resolved.get(label) ?? placeholderImageUrl(label);
      return form.attribute ? `src="${url}"` : imgTag(url, label);
    });
    logger.info('images_filled', { labels: labels.size });
  }

  result = result.replace(LEFTOVER_NESTED_IMG, '').replace(LEFTOVER_ESCAPED_IMG, '');

  // Placeholders of other forms skip the source chain but still take uploads
  const leftoverUrl = (label: string): string =>
    Object.hasOwn(uploaded, label) ? uploaded[label] : placeholderImageUrl(label);

  return result
    .replace(REMAINING_SRC_PLACEHOLDER, (_match: string, raw: string) => `src="${leftoverUrl(raw.trim())}"`)
    .replace(REMAINING_PLACEHOLDER, (_match: string, raw: string) => {
      const label = raw.trim();
      return imgTag(leftoverUrl(label), label);
    });
}

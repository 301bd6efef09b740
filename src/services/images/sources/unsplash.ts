/**
 * Unsplash random-photo source.
 */

import { errorMessage } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import { fetchWithRetry } from '../../http/fetch-with-retry.js';
import { refineImageQuery } from '../queries.js';
import type { ImageSource } from '../types.js';

const logger = createLogger({ domain: 'images' });

export const UNSPLASH_RANDOM_URL = 'https://api.unsplash.com/photos/random';

export interface UnsplashSettings {
  accessKey?: string;
  timeoutMs: number;
}

/** `urls.regular` from a random-photo response, if present. */
export function extractRegularUrl(body: unknown): string | null {
  if (!body || typeof body !== 'object' || !('urls' in body)) {
    return null;
  }
  const urls = body.urls;
  if (!urls || typeof urls !== 'object' || !('regular' in urls)) {
    return null;
  }
  return typeof urls.regular === 'string' && urls.regular ? urls.regular : null;
}

export class UnsplashImageSource implements ImageSource {
  readonly name = 'unsplash' as const;

  constructor(private readonly settings: UnsplashSettings) {}

  isAvailable(): boolean {
    return Boolean(this.settings.accessKey);
  }

  async fetch(prompt: string): Promise<string | null> {
    if (!this.settings.accessKey) {
      return null;
    }

    const params = new URLSearchParams({
      query: refineImageQuery(prompt, 'stock'),
      orientation: 'landscape',
    });

    try {
      const response = await fetchWithRetry(
        `${UNSPLASH_RANDOM_URL}?${params.toString()}`,
        {
          method: 'GET',
          headers: { Authorization: `Client-ID ${this.settings.accessKey}` },
        },
        { operation: 'unsplash_random', timeoutMs: this.settings.timeoutMs }
      );

      if (!response.ok) {
        logger.warn('image_source_failed', { source: this.name, status: response.status });
        return null;
      }

      const url = extractRegularUrl(await response.json());
      if (!url) {
        logger.warn('image_source_unexpected_body', { source: this.name });
      }
      return url;
    } catch (error) {
      logger.warn('image_source_failed', { source: this.name, error: errorMessage(error) });
      return null;
    }
  }
}

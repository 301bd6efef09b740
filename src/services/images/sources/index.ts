/**
 * Configured image source chain: FLUX, then Stable Diffusion, then Unsplash.
 */

import config from '../../../config.js';
import type { AppConfig } from '../../../config.js';
import type { ImageSource } from '../types.js';
import { FLUX_MODEL, HuggingFaceImageSource, STABLE_DIFFUSION_MODEL } from './huggingface.js';
import { UnsplashImageSource } from './unsplash.js';

let sources: ImageSource[] | null = null;

export function createImageSources(images: AppConfig['images']): ImageSource[] {
  const huggingFace = {
    token: images.huggingFaceToken,
    baseUrl: images.huggingFaceBaseUrl,
    timeoutMs: images.timeoutMs,
  };
  return [
    new HuggingFaceImageSource(FLUX_MODEL, huggingFace),
    new HuggingFaceImageSource(STABLE_DIFFUSION_MODEL, huggingFace),
    new UnsplashImageSource({ accessKey: images.unsplashAccessKey, timeoutMs: images.timeoutMs }),
  ];
}

export function getImageSources(): ImageSource[] {
  if (!sources) {
    sources = createImageSources(config.images);
  }
  return sources;
}

/**
 * Reset the cached sources (for testing).
 */
export function resetImageSources(): void {
  sources = null;
}

export { FLUX_MODEL, HuggingFaceImageSource, STABLE_DIFFUSION_MODEL } from './huggingface.js';
export type { DiffusionModel, HuggingFaceSettings } from './huggingface.js';
export { UNSPLASH_RANDOM_URL, UnsplashImageSource, extractRegularUrl } from './unsplash.js';
export type { UnsplashSettings } from './unsplash.js';

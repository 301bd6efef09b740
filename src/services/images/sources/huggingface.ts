/**
 * @fileoverview Hugging Face inference image sources (FLUX, Stable Diffusion).
 *
 * The inference endpoint answers a text-to-image request with the raw image
 * bytes, which are returned as a data URL.
 */

import { errorMessage } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import { fetchWithRetry } from '../../http/fetch-with-retry.js';
import { refineImageQuery } from '../queries.js';
import type { ImageSource, ImageSourceName } from '../types.js';

const logger = createLogger({ domain: 'images' });

export interface DiffusionModel {
  name: Extract<ImageSourceName, 'flux' | 'stable-diffusion'>;
  /** Hugging Face repository id */
  repoId: string;
  steps: number;
  guidanceScale: number;
  width: number;
  height: number;
  /** Appended to refined prompts */
  promptSuffix?: string;
}

export const FLUX_MODEL: DiffusionModel = {
  name: 'flux',
  repoId: 'black-forest-labs/FLUX.1-dev',
  steps: 28,
  guidanceScale: 3.5,
  width: 1024,
  height: 768,
};

export const STABLE_DIFFUSION_MODEL: DiffusionModel = {
  name: 'stable-diffusion',
  repoId: 'stabilityai/stable-diffusion-3.5-large',
  steps: 25,
  guidanceScale: 7.5,
  width: 1024,
  height: 768,
  promptSuffix: 'detailed',
};

export interface HuggingFaceSettings {
  token?: string;
  baseUrl: string;
  timeoutMs: number;
}

export class HuggingFaceImageSource implements ImageSource {
  readonly name: DiffusionModel['name'];

  constructor(
    private readonly model: DiffusionModel,
    private readonly settings: HuggingFaceSettings
  ) {
    this.name = model.name;
  }

  isAvailable(): boolean {
    return Boolean(this.settings.token);
  }

  /** Prompt actually sent to the model. */
  buildPrompt(prompt: string): string {
    const refined = refineImageQuery(prompt, 'generative');
    return this.model.promptSuffix ? `${refined}, ${this.model.promptSuffix}` : refined;
  }

  async fetch(prompt: string): Promise<string | null> {
    if (!this.settings.token) {
      return null;
    }
    const url = `${this.settings.baseUrl.replace(/\/+$/, '')}/${this.model.repoId}`;
    const headers = {
      'Content-Type': 'application/json',
      Accept: 'image/png',
      Authorization: `Bearer ${this.settings.token}`,
    };

    try {
      const response = await fetchWithRetry(
        url,
        {
          method: 'POST',
          headers,
          body: JSON.stringify({
            inputs: this.buildPrompt(prompt),
            parameters: {
              num_inference_steps: this.model.steps,
              guidance_scale: this.model.guidanceScale,
              width: this.model.width,
              height: this.model.height,
            },
          }),
        },
        { operation: `${this.name}_generate`, timeoutMs: this.settings.timeoutMs }
      );

      if (!response.ok) {
        logger.warn('image_source_failed', { source: this.name, status: response.status });
        return null;
      }

      const contentType = response.headers.get('content-type') ?? '';
      if (!contentType.startsWith('image/')) {
        logger.warn('image_source_unexpected_type', { source: this.name, contentType });
        return null;
      }

      const bytes = Buffer.from(await response.arrayBuffer());
      const mime = contentType.split(';')[0].trim();
      logger.info('image_generated', { source: this.name, bytes: bytes.length });
      return `data:${mime};base64,${bytes.toString('base64')}`;
    } catch (error) {
      logger.warn('image_source_failed', { source: this.name, error: errorMessage(error) });
      return null;
    }
  }
}

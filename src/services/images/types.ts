/**
 * Image source types.
 */

export type ImageSourceName = 'flux' | 'stable-diffusion' | 'unsplash';

/**
 * One place images can come from: a generative model or a stock library.
 */
export interface ImageSource {
  readonly name: ImageSourceName;

  /** Whether the source has the credentials it needs. */
  isAvailable(): boolean;

  /**
   * Produce an image for the prompt. Resolves to an image URL (an http URL
   * or a data URL) or null when the source has nothing; never rejects for
   * upstream failures.
   */
  fetch(prompt: string): Promise<string | null>;
}

/** Label → image URL for images the user uploaded. */
export type UploadedImages = Record<string, string>;

export interface FillImagesOptions {
  uploadedImages?: UploadedImages;
  /** Style preset suffix appended to generation prompts */
  styleImageHint?: string;
  /** Sources to walk; defaults to the configured chain */
  sources?: ImageSource[];
}

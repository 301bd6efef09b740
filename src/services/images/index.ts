export { fillImages, imagePromptFor, isProfileLabel, placeholderImageUrl, resolveImage } from './fill.js';
export { normalizeImageMarkup } from './normalize.js';
export { ensureProfilePlaceholder, isPersonalSiteBrief } from './profile.js';
export { refineImageQuery } from './queries.js';
export type { QueryFlavour } from './queries.js';
export {
  FLUX_MODEL,
  HuggingFaceImageSource,
  STABLE_DIFFUSION_MODEL,
  UnsplashImageSource,
  createImageSources,
  extractRegularUrl,
  getImageSources,
  resetImageSources,
} from './sources/index.js';
export type {
  FillImagesOptions,
  ImageSource,
  ImageSourceName,
  UploadedImages,
} from './types.js';

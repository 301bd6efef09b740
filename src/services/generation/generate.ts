/**
 * @fileoverview First-time page generation.
 *
 * Gathers every design input into one prompt, runs it through the provider
 * chain, then post-processes the HTML (profile placeholder, images, repair)
 * and stores the result as a new session.
 */

import {
  buildComponentContext,
  buildInteractiveContext,
  buildStyleContext,
} from '../catalog/index.js';
import { ensureProfilePlaceholder, fillImages } from '../images/index.js';
import type { UploadedImages } from '../images/index.js';
import { repairHtml } from '../html/repair.js';
import { generateText } from '../llm/index.js';
import { getPageWriter } from '../output/page-writer.js';
import {
  buildGenerationPrompt,
  buildProfileContext,
  buildTemplateContext,
} from '../prompts/index.js';
import {
  collectUploadedImages,
  fetchWebsiteDesign,
  loadTemplate,
  processReferenceFiles,
} from '../reference/index.js';
import { getSessionStore } from '../sessions/index.js';
import { ValidationError } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import type { GenerateWebsiteRequest, WebsiteResult } from './types.js';

const logger = createLogger({ domain: 'generation' });

function isHttpUrl(value: string): boolean {
  return value.startsWith('http://') || value.startsWith('https://');
}

function isImageDataUrl(value: string): boolean {
  return /^data:image\/[\w.+-]+;base64,/i.test(value);
}

/**
 * Profile picture and the prompt context announcing it.
 */
function resolveProfile(request: GenerateWebsiteRequest): { image?: string; context: string } {
  if (request.profileImage) {
    if (isImageDataUrl(request.profileImage)) {
      return { image: request.profileImage, context: buildProfileContext({ kind: 'upload' }) };
    }
    logger.warn('profile_image_ignored', { reason: 'not_an_image_data_url' });
  }

  if (request.profileImageUrl) {
    if (isHttpUrl(request.profileImageUrl)) {
      return {
        image: request.profileImageUrl,
        context: buildProfileContext({ kind: 'url', url: request.profileImageUrl }),
      };
    }
    logger.warn('profile_image_ignored', { reason: 'not_an_http_url' });
  }

  return { context: '' };
}

/**
 * Generate a page from a brief and design inputs.
 *
 * @throws ValidationError when the brief is empty
 * @throws NoProviderAvailableError / GenerationFailedError from the provider chain
 */
export async function generateWebsite(request: GenerateWebsiteRequest): Promise<WebsiteResult> {
  const brief = request.prompt.trim();
  if (!brief) {
    throw new ValidationError('Prompt is required');
  }

  const templateName = request.selectedTemplate?.trim() ?? '';
  const templateHtml = templateName ? loadTemplate(templateName) : null;

  const referenceBlocks: string[] = [];
  if (request.referenceUrl) {
    const design = await fetchWebsiteDesign(request.referenceUrl);
    if (design) {
      referenceBlocks.push(`REFERENCE WEBSITE DESIGN:\n${design}`);
    }
  }

  const profile = resolveProfile(request);
  let uploadedImages: UploadedImages = profile.image ? { profile: profile.image } : {};

  if (request.referenceFiles && request.referenceFiles.length > 0) {
    const documents = processReferenceFiles(request.referenceFiles);
    if (documents) {
      referenceBlocks.push(`REFERENCE DOCUMENTS:\n${documents}`);
    }
    uploadedImages = collectUploadedImages(request.referenceFiles, uploadedImages);
  }

  const style = buildStyleContext(request.stylePreset);
  const components = buildComponentContext(brief, templateName, request.preferredSections ?? {});
  const interactiveContext = buildInteractiveContext(request.interactiveEnhancements);

  const prompt = buildGenerationPrompt({
    brief,
    templateContext: buildTemplateContext(templateHtml),
    referenceContext: referenceBlocks.join('\n\n'),
    profileContext: profile.context,
    styleContext: style.context,
    interactiveContext,
    componentBlueprint: components.blueprint,
  });

  logger.info('generation_started', {
    template: templateName || undefined,
    stylePreset: request.stylePreset || undefined,
    uploadedImages: Object.keys(uploadedImages),
    promptLength: prompt.length,
  });

  const { text, provider } = await generateText(prompt);

  let html = ensureProfilePlaceholder(text, brief, uploadedImages);
  html = await fillImages(html, { uploadedImages, styleImageHint: style.imageHint });
  html = repairHtml(html);

  const session = await getSessionStore().create({
    originalPrompt: brief,
    stylePreset: request.stylePreset || undefined,
    preferredSections: request.preferredSections,
    profileImage: uploadedImages.profile,
    html,
    provider,
  });
  const { filePath } = await getPageWriter().write(session.id, html);

  logger.info('generation_completed', { sessionId: session.id, provider, htmlLength: html.length });

  return {
    sessionId: session.id,
    filePath,
    content: html,
    componentBlueprint: components.blueprint,
    componentVariants: components.selections,
    preferredSections: request.preferredSections ?? {},
    provider,
  };
}

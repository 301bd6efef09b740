/**
 * @fileoverview Conversational page updates.
 *
 * Applies a change request to the current HTML of a page with a
 * minimal-change prompt. The HTML and design choices come from the request
 * or, when missing there, from the session.
 */

import { buildComponentContext, buildStyleContext } from '../catalog/index.js';
import { fillImages } from '../images/index.js';
import type { UploadedImages } from '../images/index.js';
import { repairHtml } from '../html/repair.js';
import { generateText } from '../llm/index.js';
import { getPageWriter } from '../output/page-writer.js';
import { buildUpdatePrompt } from '../prompts/index.js';
import { getSessionStore } from '../sessions/index.js';
import type { Session } from '../sessions/index.js';
import { NotFoundError, ValidationError } from '../../utils/errors.js';
import { createLogger, withLogContext } from '../../utils/observability/index.js';
import type { UpdateWebsiteRequest, WebsiteResult } from './types.js';

const logger = createLogger({ domain: 'generation' });

export const UPDATE_INPUT_REQUIRED = 'Current HTML and update prompt are required';

/**
 * Apply a change request to a page.
 *
 * @throws ValidationError when the change request or the HTML to edit is missing
 * @throws NotFoundError when `sessionId` is unknown or the session is deleted mid-update
 */
export async function updateWebsite(request: UpdateWebsiteRequest): Promise<WebsiteResult> {
  const changeRequest = request.changeRequest.trim();
  if (!changeRequest || (!request.currentHtml && !request.sessionId)) {
    throw new ValidationError(UPDATE_INPUT_REQUIRED);
  }

  if (!request.sessionId) {
    return applyUpdate(request, changeRequest, null);
  }

  const session = await getSessionStore().get(request.sessionId);
  if (!session) {
    throw new NotFoundError('Session not found', { sessionId: request.sessionId });
  }
  return withLogContext({ sessionId: session.id }, () => applyUpdate(request, changeRequest, session));
}

async function applyUpdate(
  request: UpdateWebsiteRequest,
  changeRequest: string,
  session: Session | null
): Promise<WebsiteResult> {
  const store = getSessionStore();
  const currentHtml = request.currentHtml || session?.currentHtml;
  if (!currentHtml) {
    throw new ValidationError(UPDATE_INPUT_REQUIRED);
  }

  const originalPrompt = request.originalPrompt || session?.originalPrompt || '';
  const stylePreset = request.stylePreset || session?.stylePreset;
  const preferredSections = request.preferredSections ?? session?.preferredSections;
  const profileImage = request.profileImage || session?.profileImage;
  const uploadedImages: UploadedImages = profileImage ? { profile: profileImage } : {};

  const style = buildStyleContext(stylePreset);
  const components = buildComponentContext(originalPrompt || changeRequest, '', preferredSections ?? {});

  const prompt = buildUpdatePrompt({
    currentHtml,
    changeRequest,
    styleContext: style.context,
    componentBlueprint: components.blueprint,
  });

  logger.info('update_started', {
    sessionId: session?.id,
    stylePreset,
    currentHtmlLength: currentHtml.length,
  });

  const { text, provider } = await generateText(prompt);

  let html = await fillImages(text, { uploadedImages, styleImageHint: style.imageHint });
  html = repairHtml(html);

  let sessionId: string;
  if (session) {
    const updated = await store.recordUpdate(session.id, changeRequest, html, provider);
    if (!updated) {
      throw new NotFoundError('Session not found', { sessionId: session.id });
    }
    sessionId = session.id;
  } else {
    const created = await store.create({
      originalPrompt: originalPrompt || changeRequest,
      stylePreset,
      preferredSections,
      profileImage,
      html,
      provider,
      initialKind: 'update',
      revisionPrompt: changeRequest,
    });
    sessionId = created.id;
  }

  const { filePath } = await getPageWriter().write(sessionId, html);

  logger.info('update_completed', { sessionId, provider, htmlLength: html.length });

  return {
    sessionId,
    filePath,
    content: html,
    componentBlueprint: components.blueprint,
    componentVariants: components.selections,
    preferredSections: preferredSections ?? {},
    provider,
  };
}

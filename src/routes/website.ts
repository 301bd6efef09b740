/**
 * Page generation routes.
 *
 * POST /generate - build a page from a brief and design inputs
 * POST /update   - apply a change request to the current page
 *
 * Both accept JSON or URL-encoded bodies and answer with the page HTML, the
 * component blueprint and the session id to continue with.
 */

import { Router, type Request, type Response } from 'express';
import { parseSectionPreferences } from '../services/catalog/index.js';
import { generateWebsite, updateWebsite } from '../services/generation/index.js';
import {
  jsonField,
  parseEnhancementSelections,
  parseReferenceFiles,
  requestFields,
  stringField,
} from './fields.js';
import { sendError } from './respond.js';
import { serializeWebsiteResult } from './serializers.js';

const router = Router();

router.post('/generate', async (req: Request, res: Response) => {
  const fields = requestFields(req.body);
  const preferred = jsonField(fields, 'preferred_sections');

  try {
    const result = await generateWebsite({
      prompt: stringField(fields, 'prompt') ?? '',
      selectedTemplate: stringField(fields, 'selected_template'),
      referenceUrl: stringField(fields, 'reference_url'),
      referenceFiles: parseReferenceFiles(jsonField(fields, 'reference_files')),
      stylePreset: stringField(fields, 'style_preset'),
      preferredSections: preferred === undefined ? undefined : parseSectionPreferences(preferred),
      interactiveEnhancements: parseEnhancementSelections(jsonField(fields, 'interactive_enhancements')),
      profileImage: stringField(fields, 'profile_image'),
      profileImageUrl: stringField(fields, 'profile_image_url'),
    });
    res.json(serializeWebsiteResult(result));
  } catch (error) {
    sendError(res, error, 'generate_failed');
  }
});

router.post('/update', async (req: Request, res: Response) => {
  const fields = requestFields(req.body);
  const preferred = jsonField(fields, 'preferred_sections');

  try {
    const result = await updateWebsite({
      changeRequest: stringField(fields, 'update_prompt') ?? '',
      currentHtml: stringField(fields, 'current_html'),
      originalPrompt: stringField(fields, 'original_prompt'),
      profileImage: stringField(fields, 'profile_image_data'),
      stylePreset: stringField(fields, 'style_preset'),
      preferredSections: preferred === undefined ? undefined : parseSectionPreferences(preferred),
      sessionId: stringField(fields, 'session_id'),
    });
    res.json(serializeWebsiteResult(result));
  } catch (error) {
    sendError(res, error, 'update_failed');
  }
});

export default router;

/**
 * GET /api/catalog - design choices a client can offer: style presets,
 * component sections and variants, interactive enhancements, templates.
 */

import { Router, type Request, type Response } from 'express';
import { getCatalog } from '../services/catalog/index.js';
import { listTemplates } from '../services/reference/index.js';
import { sendError } from './respond.js';
import { serializeCatalog } from './serializers.js';

const router = Router();

router.get('/api/catalog', (_req: Request, res: Response) => {
  try {
    res.json(serializeCatalog(getCatalog(), listTemplates()));
  } catch (error) {
    sendError(res, error, 'catalog_failed');
  }
});

export default router;

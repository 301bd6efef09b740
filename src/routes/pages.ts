/**
 * @fileoverview Route for previewing generated pages.
 *
 * GET /preview/:id - Serves a session's current HTML with security headers.
 *
 * The CSP allows https images, styles and fonts; scripts may not make
 * requests and forms may not submit anywhere.
 */

import { Router, type Request, type Response } from 'express';
import { getSessionStore } from '../services/sessions/index.js';
import { createLogger } from '../utils/observability/index.js';

const router = Router();
const logger = createLogger({ domain: 'http' });

export const PREVIEW_CSP_POLICY = [
  "default-src 'none'",
  "base-uri 'none'",
  "object-src 'none'",
  "frame-ancestors 'self'",
  "script-src 'unsafe-inline'",
  "style-src 'unsafe-inline' https:",
  'font-src https: data:',
  'img-src https: data:',
  "connect-src 'none'",
  "form-action 'none'",
  "worker-src 'none'",
].join('; ');

const NOT_FOUND_PAGE = `<!DOCTYPE html>
<html>
<head><title>Not Found</title></head>
<body>
  <h1>Page not found</h1>
  <p>This session does not exist or has been deleted.</p>
</body>
</html>
`;

const ERROR_PAGE = `<!DOCTYPE html>
<html>
<head><title>Error</title></head>
<body>
  <h1>Error loading page</h1>
  <p>Something went wrong. Please try again later.</p>
</body>
</html>
`;

/**
 * Serve the current page of a session.
 *
 * Security headers applied:
 * - Content-Security-Policy: see PREVIEW_CSP_POLICY
 * - Referrer-Policy: no-referrer
 * - X-Content-Type-Options: nosniff
 * - Cross-Origin-Opener-Policy: same-origin
 * - Cache-Control: private, no-cache
 */
router.get('/preview/:id', async (req: Request<{ id: string }>, res: Response) => {
  try {
    const session = await getSessionStore().get(req.params.id);

    if (!session) {
      res.status(404).type('html').send(NOT_FOUND_PAGE);
      return;
    }

    res.setHeader('Content-Security-Policy', PREVIEW_CSP_POLICY);
    res.setHeader('Referrer-Policy', 'no-referrer');
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('Cross-Origin-Opener-Policy', 'same-origin');
    res.setHeader('Cache-Control', 'private, no-cache');

    res.type('html').send(session.currentHtml);
  } catch (error) {
    logger.error('preview_failed', { sessionId: req.params.id, error });
    res.status(500).type('html').send(ERROR_PAGE);
  }
});

export default router;

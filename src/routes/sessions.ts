/**
 * GET /sessions/:id - session metadata, current HTML and revision history.
 */

import { Router, type Request, type Response } from 'express';
import { getSessionStore } from '../services/sessions/index.js';
import { sendError } from './respond.js';
import { serializeSession } from './serializers.js';

const router = Router();

router.get('/sessions/:id', async (req: Request<{ id: string }>, res: Response) => {
  try {
    const store = getSessionStore();
    const session = await store.get(req.params.id);
    if (!session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    const revisions = await store.listRevisions(session.id);
    res.json(serializeSession(session, revisions));
  } catch (error) {
    sendError(res, error, 'session_lookup_failed');
  }
});

export default router;

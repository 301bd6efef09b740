/**
 * Request id and log context for every request.
 */

import type { NextFunction, Request, Response } from 'express';
import { createLogger, createRequestId, withLogContext } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'http' });

const CLIENT_REQUEST_ID = /^[A-Za-z0-9_-]{1,64}$/;

/**
 * Adopt a well-formed `X-Request-Id` from the client or mint one, echo it
 * back, and run the rest of the chain inside its log context.
 */
export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.get('x-request-id');
  const requestId = incoming && CLIENT_REQUEST_ID.test(incoming) ? incoming : createRequestId();
  const startedAt = Date.now();

  res.setHeader('X-Request-Id', requestId);
  res.on('finish', () => {
    logger.info('request_completed', {
      requestId,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      durationMs: Date.now() - startedAt,
    });
  });

  withLogContext({ requestId }, () => next());
}

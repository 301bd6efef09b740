/**
 * JSON error responses for the API routes.
 */

import type { NextFunction, Request, Response } from 'express';
import { AppError, errorMessage, httpStatusFor } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'http' });

/**
 * Send `{ error }` with the status the error maps to.
 * Unexpected (non-application) errors are reported without their message.
 */
export function sendError(res: Response, error: unknown, event: string): void {
  const status = httpStatusFor(error);
  const code = error instanceof AppError ? error.code : undefined;
  if (status >= 500) {
    logger.error(event, { status, code, error });
  } else {
    logger.warn(event, { status, code, error: errorMessage(error) });
  }

  const message = error instanceof AppError ? error.message : 'Internal server error';
  res.status(status).json({ error: message });
}

function bodyParserStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return null;
  }
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/**
 * Final error middleware: malformed or oversized bodies from the parsers,
 * and anything a handler passed to `next`.
 */
export function errorHandler(error: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  const status = bodyParserStatus(error);
  if (status !== null) {
    logger.warn('request_body_rejected', { status, error: errorMessage(error) });
    res.status(status).json({ error: status === 413 ? 'Request body too large' : 'Malformed request body' });
    return;
  }

  sendError(res, error, 'request_failed');
}

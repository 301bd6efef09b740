/**
 * @fileoverview Express application factory.
 *
 * Builds the app without listening so tests can drive it through supertest.
 */

import express from 'express';
import config from './config.js';
import catalogRouter from './routes/catalog.js';
import { healthHandler } from './routes/health.js';
import pagesRouter from './routes/pages.js';
import { requestContext } from './routes/request-context.js';
import { errorHandler } from './routes/respond.js';
import sessionsRouter from './routes/sessions.js';
import websiteRouter from './routes/website.js';

export interface AppOptions {
  /** Body size limit for JSON and form requests; defaults to MAX_REQUEST_BODY. */
  maxRequestBody?: string;
}

export function createApp(options: AppOptions = {}): express.Application {
  const app = express();
  const limit = options.maxRequestBody ?? config.maxRequestBody;

  // Uploaded images and reference files travel inline, hence the large limit
  app.use(express.json({ limit }));
  app.use(express.urlencoded({ extended: false, limit }));

  app.use(requestContext);

  app.get('/health', healthHandler);
  app.use(catalogRouter);
  app.use(websiteRouter);
  app.use(sessionsRouter);
  app.use(pagesRouter);

  app.use(errorHandler);

  return app;
}

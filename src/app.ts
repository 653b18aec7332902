/**
 * @fileoverview Express application factory.
 *
 * Builds the app with middleware and routes but does not listen, so the
 * same wiring serves the process entry point and integration tests.
 */

import express from 'express';
import apiRouter from './routes/emails.js';
import authRouter from './routes/auth.js';
import pagesRouter from './routes/pages.js';
import { healthHandler } from './routes/health.js';
import { createRequestId, withLogContext } from './utils/observability/index.js';

export function createApp(): express.Application {
  const app = express();

  app.use(express.json({ limit: '32kb' }));

  // Every log line of a request carries its requestId
  app.use((_req, _res, next) => {
    withLogContext({ requestId: createRequestId() }, () => next());
  });

  // Health check endpoint
  app.get('/health', healthHandler);

  app.use(apiRouter);

  // OAuth routes
  app.use(authRouter);

  // Inbox UI
  app.use(pagesRouter);

  return app;
}

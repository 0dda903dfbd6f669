import express from 'express';
import type { ApiServices } from './types/api.types';
import { createAPIRouter } from './api/router';
import { errorHandlingMiddleware } from './utils/error-handler';
import { APIErrorCode, createAPIError, sendErrorResponse } from './utils/response.formatter';

/**
 * Builds the Express application. Kept apart from index.ts so it can be
 * created without listening or reading the environment.
 */
export function createApp(services: ApiServices): express.Express {
  const app = express();

  // Middleware to parse JSON bodies
  app.use(express.json({ limit: '256kb' }));

  // Health check endpoint - validates server is running
  app.get('/api/health', (_req, res) => {
    res.json({
      ok: true,
      ts: Date.now(),
    });
  });

  app.use('/api', createAPIRouter(services));

  // Error handling for unknown routes
  app.use((req, res) => {
    sendErrorResponse(
      res,
      createAPIError(APIErrorCode.NOT_FOUND, `Route not found: ${req.method} ${req.url}`),
      APIErrorCode.NOT_FOUND
    );
  });

  // Malformed JSON bodies fail in express.json, before the API router
  app.use(errorHandlingMiddleware);

  return app;
}

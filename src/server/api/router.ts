/**
 * API Router for the generation endpoints
 *
 * Central router that handles all client-facing endpoints with middleware for:
 * - Request logging with response status and duration
 * - Async handler wrapping so rejections reach the error middleware
 * - Error handling and response formatting
 *
 * Endpoints:
 * - POST /api/generate - One ad-hoc generation attempt
 * - POST /api/batch - Batch over brain sources, optional comparison pass
 * - GET /api/sources - Brain source ids
 * - GET /api/themes - Theme table of the engine configuration
 * - GET /api/backends - Registered backend identities
 * - GET /api/stats - Session telemetry and cache counters
 * - POST /api/cache/invalidate - Drop a brain source's memory entry
 */

import express, { Request, Response, NextFunction } from 'express';
import type { ApiServices } from '../types/api.types';
import { handleBatch } from './batch.endpoint';
import { handleBackends, handleSources, handleThemes } from './catalog.endpoint';
import { handleGenerate } from './generate.endpoint';
import { handleInvalidate, handleStats } from './stats.endpoint';
import { errorHandlingMiddleware, wrapAsyncHandler } from '../utils/error-handler';
import {
  sendErrorResponse,
  APIErrorCode,
  createAPIError,
} from '../utils/response.formatter';
import { logEvent } from '../utils/logger';

export const API_ROUTES = [
  'POST /api/generate',
  'POST /api/batch',
  'GET /api/sources',
  'GET /api/themes',
  'GET /api/backends',
  'GET /api/stats',
  'POST /api/cache/invalidate',
];

/**
 * Creates and configures the API router with all endpoints and middleware.
 */
export function createAPIRouter(services: ApiServices): express.Router {
  const router = express.Router();

  // Request logging middleware
  router.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    res.on('finish', () => {
      logEvent('apiRequest', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - startTime,
      });
    });

    next();
  });

  router.post(
    '/generate',
    wrapAsyncHandler(async (req, res) => {
      await handleGenerate(req, res, services);
    })
  );

  router.post(
    '/batch',
    wrapAsyncHandler(async (req, res) => {
      // Stop the batch when the client disconnects before the response
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableEnded) {
          controller.abort();
        }
      });
      await handleBatch(req, res, services, controller.signal);
    })
  );

  router.get(
    '/sources',
    wrapAsyncHandler(async (req, res) => {
      await handleSources(req, res, services);
    })
  );

  router.get(
    '/themes',
    wrapAsyncHandler(async (req, res) => {
      await handleThemes(req, res, services);
    })
  );

  router.get('/backends', (req: Request, res: Response) => {
    handleBackends(req, res, services);
  });

  router.get('/stats', (req: Request, res: Response) => {
    handleStats(req, res, services);
  });

  router.post('/cache/invalidate', (req: Request, res: Response) => {
    handleInvalidate(req, res, services);
  });

  // Unknown API routes
  router.use((req: Request, res: Response) => {
    const apiError = createAPIError(
      APIErrorCode.NOT_FOUND,
      `API route not found: ${req.method} ${req.path}`,
      {
        availableRoutes: API_ROUTES,
      }
    );
    sendErrorResponse(res, apiError, APIErrorCode.NOT_FOUND);
  });

  router.use(errorHandlingMiddleware);

  return router;
}

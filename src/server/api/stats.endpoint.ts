/**
 * Session statistics and cache administration endpoints.
 */

import type { ApiRequest, ApiServices } from '../types/api.types';
import type { CacheStats } from '../types/generation.types';
import type { SessionSnapshot } from '../services/telemetry.service';
import { extractErrorContext, logError, toAPIError } from '../utils/error-handler';
import { logEvent } from '../utils/logger';
import {
  createRequestId,
  createValidationError,
  sendErrorResponse,
  sendSuccessResponse,
  type JsonResponse,
} from '../utils/response.formatter';
import { validateInvalidateRequest } from '../validation/api.validation';

export interface StatsResponse {
  session: SessionSnapshot;
  cache: {
    brain: CacheStats & { entries: number };
    engine: CacheStats & { entries: number };
  };
}

export interface InvalidateResponse {
  sourceId: string;
  /** False when the source had no memory entry */
  invalidated: boolean;
}

/**
 * GET /api/stats
 */
export function handleStats(
  _req: ApiRequest,
  res: JsonResponse,
  services: Pick<ApiServices, 'telemetry' | 'brainCache' | 'engineCache'>
): void {
  const response: StatsResponse = {
    session: services.telemetry.snapshot(),
    cache: {
      brain: { ...services.brainCache.stats(), entries: services.brainCache.size },
      engine: { ...services.engineCache.stats(), entries: services.engineCache.size },
    },
  };
  sendSuccessResponse(res, response, createRequestId('stats'));
}

/**
 * POST /api/cache/invalidate
 *
 * Drops the memory entry of a brain source. The persisted tier is kept, so
 * the next lookup of unchanged content is a warm hit.
 */
export function handleInvalidate(
  req: ApiRequest,
  res: JsonResponse,
  services: Pick<ApiServices, 'brainCache'>
): void {
  const requestId = createRequestId('invalidate');

  const parsed = validateInvalidateRequest(req.body);
  if (!parsed.isValid) {
    const apiError = createValidationError(parsed.errors);
    return sendErrorResponse(res, apiError, apiError.code, requestId);
  }

  try {
    const { sourceId } = parsed.value;
    const invalidated = services.brainCache.invalidate(sourceId);
    logEvent('cacheInvalidate', { sourceId, invalidated, requestId });

    const response: InvalidateResponse = { sourceId, invalidated };
    sendSuccessResponse(res, response, requestId);
  } catch (error) {
    const apiError = toAPIError(error, requestId);
    logError(error, extractErrorContext(req, requestId, 'invalidateCache'), apiError.code);
    sendErrorResponse(res, apiError, apiError.code, requestId);
  }
}

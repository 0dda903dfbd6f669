/**
 * /api/batch endpoint implementation
 *
 * Runs a batch over brain sources against one backend, optionally followed by
 * a comparison pass against a second backend, and returns the run statistics.
 *
 * - 400 with a validation code for a malformed body
 * - 400 CONFIGURATION_ERROR for an invalid engine configuration
 * - 502 BATCH_FAILED, stats in details, when every attempt failed
 */

import type { ApiRequest, ApiServices } from '../types/api.types';
import { extractErrorContext, logError, toAPIError } from '../utils/error-handler';
import {
  APIErrorCode,
  createAPIError,
  createRequestId,
  createValidationError,
  sendErrorResponse,
  sendSuccessResponse,
  type JsonResponse,
} from '../utils/response.formatter';
import { validateBatchRequest } from '../validation/api.validation';

/**
 * Handles POST /api/batch requests
 *
 * @param signal - Aborted when the client goes away; the batch then stops
 *   before its next attempt
 */
export async function handleBatch(
  req: ApiRequest,
  res: JsonResponse,
  services: ApiServices,
  signal?: AbortSignal
): Promise<void> {
  const requestId = createRequestId('batch');

  const parsed = validateBatchRequest(req.body, {
    maxBatchSize: services.batch.maxSize,
    knownBackends: services.registry.list(),
  });
  if (!parsed.isValid) {
    const apiError = createValidationError(parsed.errors);
    return sendErrorResponse(res, apiError, apiError.code, requestId);
  }

  const { sourceIds, backend, compareWith, timeoutMs, seed, reuseArtifacts } = parsed.value;

  try {
    const stats = await services.batch.runBatch(
      sourceIds,
      { primary: backend, comparison: compareWith },
      timeoutMs ?? services.defaults.timeoutMs,
      { seed, signal, reuseArtifacts, batchId: requestId }
    );

    if (stats.totalFailure) {
      const apiError = createAPIError(
        APIErrorCode.BATCH_FAILED,
        `All ${stats.attempts} attempts failed`,
        { stats }
      );
      logError(
        new Error(apiError.message),
        extractErrorContext(req, requestId, 'runBatch', { failures: stats.failures.length }),
        apiError.code
      );
      return sendErrorResponse(res, apiError, apiError.code, requestId);
    }

    sendSuccessResponse(res, { stats }, requestId);
  } catch (error) {
    const apiError = toAPIError(error, requestId);
    logError(
      error,
      extractErrorContext(req, requestId, 'runBatch', { sources: sourceIds.length, backend }),
      apiError.code
    );
    sendErrorResponse(res, apiError, apiError.code, requestId);
  }
}

/**
 * /api/generate endpoint implementation
 *
 * Runs one ad-hoc generation attempt for an intent given in the request body:
 * - Input validation (intent, style, backend, timeout, seed)
 * - Engine configuration lookup through the config cache
 * - Seeded random source so a reported seed replays the same choices
 * - Artifact persistence, which never fails the request
 *
 * Backend trouble is not an HTTP error: the response carries the FALLBACK
 * outcome with its errorKind.
 */

import { randomUUID } from 'crypto';
import type { ApiRequest, ApiServices } from '../types/api.types';
import type { EngineConfig } from '../types/engine.types';
import type { AttemptOutcome } from '../types/generation.types';
import { isConfigurationError } from '../utils/errors';
import {
  extractErrorContext,
  handleServiceFailure,
  logError,
  toAPIError,
} from '../utils/error-handler';
import {
  APIErrorCode,
  createRequestId,
  createValidationError,
  sendErrorResponse,
  sendSuccessResponse,
  type JsonResponse,
} from '../utils/response.formatter';
import { validateGenerateRequest } from '../validation/api.validation';
import { PRNG } from '../services/prng.service';

/** Source id reported for ad-hoc attempts */
export const ADHOC_SOURCE_ID = 'adhoc';

export interface GenerateResponse {
  outcome: AttemptOutcome;
  backend: string;
  /** Seed the attempt's random source was derived from */
  seed: string;
}

/**
 * Handles POST /api/generate requests
 *
 * 1. Validate the body against the registered backends
 * 2. Load the engine configuration (CONFIGURATION_ERROR when invalid)
 * 3. Run one attempt with a PRNG derived from the seed
 * 4. Record telemetry and persist the artifact
 */
export async function handleGenerate(
  req: ApiRequest,
  res: JsonResponse,
  services: ApiServices
): Promise<void> {
  const requestId = createRequestId('generate');

  const parsed = validateGenerateRequest(req.body, services.registry.list());
  if (!parsed.isValid) {
    const apiError = createValidationError(parsed.errors);
    return sendErrorResponse(res, apiError, apiError.code, requestId);
  }

  const {
    intent,
    style,
    backend = services.defaults.backend,
    timeoutMs = services.defaults.timeoutMs,
    seed = randomUUID(),
  } = parsed.value;

  try {
    let engine: EngineConfig;
    try {
      engine = await services.engineCache.get(services.engineSourceId);
    } catch (error) {
      if (isConfigurationError(error)) {
        const apiError = toAPIError(error, requestId);
        logError(error, extractErrorContext(req, requestId, 'loadEngineConfig'), apiError.code);
        return sendErrorResponse(res, apiError, apiError.code, requestId);
      }
      const failure = handleServiceFailure(
        error,
        'engineConfig',
        extractErrorContext(req, requestId, 'loadEngineConfig')
      );
      return sendErrorResponse(res, failure, APIErrorCode.SERVICE_UNAVAILABLE, requestId);
    }

    const rng = PRNG.fromHex(
      services.hashService.deriveSeed(seed, `${backend}|0|${ADHOC_SOURCE_ID}`)
    );
    const outcome = await services.generation.run(
      { intent, style },
      engine,
      services.registry.resolve(backend),
      timeoutMs,
      rng
    );
    services.telemetry.recordOutcome(outcome);

    if (services.sink && outcome.artifact) {
      try {
        await services.sink.record({
          sourceId: ADHOC_SOURCE_ID,
          backendId: backend,
          intent,
          theme: outcome.theme,
          artifact: outcome.artifact,
          status: outcome.status,
          prompt: outcome.prompt,
          rawResponse: outcome.rawResponse,
        });
      } catch (error) {
        handleServiceFailure(
          error,
          'artifactWriter',
          extractErrorContext(req, requestId, 'recordArtifact'),
          false
        );
      }
    }

    const response: GenerateResponse = { outcome, backend, seed };
    sendSuccessResponse(res, response, requestId);
  } catch (error) {
    const apiError = toAPIError(error, requestId);
    logError(error, extractErrorContext(req, requestId, 'generate', { backend }), apiError.code);
    sendErrorResponse(res, apiError, apiError.code, requestId);
  }
}

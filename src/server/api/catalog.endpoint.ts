/**
 * Read-only catalog endpoints: brain sources, themes and backends.
 */

import type { ApiRequest, ApiServices } from '../types/api.types';
import { extractErrorContext, logError, toAPIError } from '../utils/error-handler';
import {
  createRequestId,
  sendErrorResponse,
  sendSuccessResponse,
  type JsonResponse,
} from '../utils/response.formatter';

export interface SourcesResponse {
  sources: string[];
}

export interface ThemesResponse {
  version: string;
  themes: Array<{
    id: string;
    keywords: string[];
    symbolPools: string[];
    colorPools: string[];
  }>;
}

export interface BackendsResponse {
  backends: string[];
  defaultBackend: string;
}

/**
 * GET /api/sources - brain source ids a batch can name
 */
export async function handleSources(
  req: ApiRequest,
  res: JsonResponse,
  services: Pick<ApiServices, 'brainSource'>
): Promise<void> {
  const requestId = createRequestId('sources');
  try {
    const response: SourcesResponse = { sources: await services.brainSource.list() };
    sendSuccessResponse(res, response, requestId);
  } catch (error) {
    const apiError = toAPIError(error, requestId);
    logError(error, extractErrorContext(req, requestId, 'listSources'), apiError.code);
    sendErrorResponse(res, apiError, apiError.code, requestId);
  }
}

/**
 * GET /api/themes - theme table of the current engine configuration, in
 * tie-break order
 */
export async function handleThemes(
  req: ApiRequest,
  res: JsonResponse,
  services: Pick<ApiServices, 'engineCache' | 'engineSourceId'>
): Promise<void> {
  const requestId = createRequestId('themes');
  try {
    const engine = await services.engineCache.get(services.engineSourceId);
    const response: ThemesResponse = {
      version: engine.version,
      themes: engine.themes.map(theme => ({
        id: theme.id,
        keywords: [...theme.keywords],
        symbolPools: [...theme.symbolPools],
        colorPools: [...theme.colorPools],
      })),
    };
    sendSuccessResponse(res, response, requestId);
  } catch (error) {
    const apiError = toAPIError(error, requestId);
    logError(error, extractErrorContext(req, requestId, 'listThemes'), apiError.code);
    sendErrorResponse(res, apiError, apiError.code, requestId);
  }
}

/**
 * GET /api/backends
 */
export function handleBackends(
  _req: ApiRequest,
  res: JsonResponse,
  services: Pick<ApiServices, 'registry' | 'defaults'>
): void {
  const response: BackendsResponse = {
    backends: services.registry.list(),
    defaultBackend: services.defaults.backend,
  };
  sendSuccessResponse(res, response, createRequestId('backends'));
}

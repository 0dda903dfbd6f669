/**
 * Error handling utilities for the generation API.
 *
 * Provides centralized error handling with:
 * - Error classification (4xx vs 5xx)
 * - Structured error logging with request context
 * - Redaction of secret-looking fields in logged metadata
 * - Request ID tracing
 * - Critical vs non-critical service failure handling
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { isConfigurationError } from './errors';
import {
  APIErrorCode,
  createAPIError,
  createRequestId,
  getHttpStatusForError,
  sendErrorResponse,
  type APIError,
} from './response.formatter';

/**
 * Request information attached to logged errors.
 */
export interface ErrorContext {
  requestId?: string;
  method: string;
  path: string;
  /** Operation being performed */
  operation?: string;
  metadata?: Record<string, unknown>;
  /** ISO timestamp when error occurred */
  timestamp: string;
}

export enum ErrorClass {
  /** Client errors (4xx) - validation, configuration */
  CLIENT_ERROR = 'CLIENT_ERROR',
  /** Server errors (5xx) - internal failures, failed batches, service unavailable */
  SERVER_ERROR = 'SERVER_ERROR',
}

/**
 * Classifies an API error code by its HTTP status.
 */
export function classifyError(errorCode: APIErrorCode): ErrorClass {
  return getHttpStatusForError(errorCode) < 500
    ? ErrorClass.CLIENT_ERROR
    : ErrorClass.SERVER_ERROR;
}

const SENSITIVE_PATTERNS = [
  'password',
  'token',
  'secret',
  'apikey',
  'api_key',
  'authorization',
  'cookie',
];

/**
 * Redacts values whose keys look like credentials.
 */
export function sanitizeErrorDetails(
  details: Record<string, unknown>
): Record<string, unknown> {
  const sanitized = { ...details };

  for (const key of Object.keys(sanitized)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_PATTERNS.some(pattern => lowerKey.includes(pattern))) {
      sanitized[key] = '[REDACTED]';
    }
  }

  return sanitized;
}

export function extractErrorContext(
  req: Pick<Request, 'method' | 'path'>,
  requestId?: string,
  operation?: string,
  metadata?: Record<string, unknown>
): ErrorContext {
  return {
    requestId,
    method: req.method,
    path: req.path,
    operation,
    metadata: metadata ? sanitizeErrorDetails(metadata) : undefined,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Logs an error with its request context.
 *
 * - Client errors (4xx): info level, no stack
 * - Server errors (5xx): error level, with stack
 */
export function logError(
  error: unknown,
  context: ErrorContext,
  errorCode: APIErrorCode
): void {
  const errorClass = classifyError(errorCode);
  const errorStack = error instanceof Error ? error.stack : undefined;

  const logData = {
    errorCode,
    errorClass,
    message: error instanceof Error ? error.message : String(error),
    context,
    ...(errorClass === ErrorClass.SERVER_ERROR && errorStack
      ? { stack: errorStack }
      : {}),
  };

  if (errorClass === ErrorClass.CLIENT_ERROR) {
    console.log('[CLIENT_ERROR]', JSON.stringify(logData));
  } else {
    console.error('[SERVER_ERROR]', JSON.stringify(logData));
  }
}

/**
 * Handles a collaborator failure.
 *
 * Critical services (config cache, engine configuration) produce a
 * SERVICE_UNAVAILABLE error for the response. Non-critical ones (artifact
 * writer, telemetry) are logged as degradation and the request continues.
 *
 * @returns APIError for critical services, null for non-critical
 */
export function handleServiceFailure(
  error: unknown,
  serviceName: string,
  context: ErrorContext,
  critical: boolean = true
): APIError | null {
  const logData = {
    serviceName,
    critical,
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
    context,
  };

  if (!critical) {
    console.log('[SERVICE_DEGRADATION]', JSON.stringify(logData));
    return null;
  }

  console.error('[SERVICE_FAILURE]', JSON.stringify(logData));
  return createAPIError(
    APIErrorCode.SERVICE_UNAVAILABLE,
    `Service temporarily unavailable: ${serviceName}`,
    {
      service: serviceName,
      requestId: context.requestId,
    }
  );
}

/**
 * Maps a thrown value to an API error.
 *
 * - ConfigurationError → CONFIGURATION_ERROR with its issues
 * - Malformed JSON body (body-parser SyntaxError) → INVALID_TYPE
 * - Anything else → INTERNAL_ERROR
 */
export function toAPIError(error: unknown, requestId?: string): APIError {
  if (isConfigurationError(error)) {
    return createAPIError(APIErrorCode.CONFIGURATION_ERROR, error.message, {
      issues: error.issues,
      requestId,
    });
  }

  if (error instanceof SyntaxError && 'body' in error) {
    return createAPIError(APIErrorCode.INVALID_TYPE, 'Request body is not valid JSON', {
      field: 'body',
      requestId,
    });
  }

  return createAPIError(
    APIErrorCode.INTERNAL_ERROR,
    error instanceof Error && error.message ? error.message : 'An unexpected error occurred',
    { requestId }
  );
}

/**
 * Express error handling middleware. Registered last so it sees errors from
 * every route and middleware before it.
 */
export function errorHandlingMiddleware(
  error: unknown,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
): void {
  const requestId = createRequestId('error');
  const apiError = toAPIError(error, requestId);

  logError(error, extractErrorContext(req, requestId), apiError.code);
  sendErrorResponse(res, apiError, apiError.code, requestId);
}

/**
 * Wraps an async route handler so a rejection reaches the error middleware.
 *
 * @example
 * ```typescript
 * router.get('/themes', wrapAsyncHandler(async (req, res) => {
 *   await handleThemes(req, res, services);
 * }));
 * ```
 */
export function wrapAsyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(handler(req, res)).catch(next);
  };
}

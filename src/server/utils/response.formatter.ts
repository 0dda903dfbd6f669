/**
 * Response formatter utility for the generation API endpoints.
 *
 * Provides standardized response formatting for:
 * - Success responses with consistent structure
 * - Error responses with structured error codes
 * - HTTP status code mapping for different error types
 * - Response timestamps and request tracing
 */

import {
  APIErrorCode as ValidationErrorCode,
  type ValidationError,
} from '../validation/api.validation';

/**
 * API error codes beyond request validation.
 */
export enum AdditionalAPIErrorCode {
  /** Engine or brain configuration is invalid, or a batch request breaks its limits */
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  /** Every attempt of a batch failed */
  BATCH_FAILED = 'BATCH_FAILED',
  /** Route does not exist */
  NOT_FOUND = 'NOT_FOUND',
  /** Internal server error or unexpected failure */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  /** Service temporarily unavailable */
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
}

// Combine all error codes for complete coverage
export const APIErrorCode = {
  MISSING_PARAMETER: ValidationErrorCode.MISSING_PARAMETER,
  INVALID_TYPE: ValidationErrorCode.INVALID_TYPE,
  INVALID_SOURCE_IDS: ValidationErrorCode.INVALID_SOURCE_IDS,
  BATCH_SIZE_EXCEEDED: ValidationErrorCode.BATCH_SIZE_EXCEEDED,
  INVALID_TIMEOUT: ValidationErrorCode.INVALID_TIMEOUT,
  UNKNOWN_BACKEND: ValidationErrorCode.UNKNOWN_BACKEND,
  CONFIGURATION_ERROR: AdditionalAPIErrorCode.CONFIGURATION_ERROR,
  BATCH_FAILED: AdditionalAPIErrorCode.BATCH_FAILED,
  NOT_FOUND: AdditionalAPIErrorCode.NOT_FOUND,
  INTERNAL_ERROR: AdditionalAPIErrorCode.INTERNAL_ERROR,
  SERVICE_UNAVAILABLE: AdditionalAPIErrorCode.SERVICE_UNAVAILABLE,
} as const;

export type APIErrorCode = ValidationErrorCode | AdditionalAPIErrorCode;

const ALL_ERROR_CODES: ReadonlySet<string> = new Set<string>(Object.values(APIErrorCode));

export function isAPIErrorCode(value: unknown): value is APIErrorCode {
  return typeof value === 'string' && ALL_ERROR_CODES.has(value);
}

/**
 * Structured API error information.
 */
export interface APIError {
  /** Machine-readable error code for client handling */
  code: APIErrorCode;
  /** Human-readable error message */
  message: string;
  details?: {
    /** Field name that caused the error (for validation errors) */
    field?: string;
    expected?: string;
    received?: unknown;
    [key: string]: unknown;
  };
}

export interface ErrorResponseData {
  error: APIError;
  /** Unix timestamp when response was generated */
  timestamp: number;
  requestId?: string;
}

export type SuccessResponseData<T extends object> = T & {
  timestamp: number;
  requestId?: string;
};

/**
 * The part of an Express response the API writes to.
 */
export interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
}

/**
 * HTTP status code mapping for different error types.
 */
const ERROR_STATUS_MAP: Record<APIErrorCode, number> = {
  // 400 Bad Request - Client validation errors
  [APIErrorCode.MISSING_PARAMETER]: 400,
  [APIErrorCode.INVALID_TYPE]: 400,
  [APIErrorCode.INVALID_SOURCE_IDS]: 400,
  [APIErrorCode.BATCH_SIZE_EXCEEDED]: 400,
  [APIErrorCode.INVALID_TIMEOUT]: 400,
  [APIErrorCode.UNKNOWN_BACKEND]: 400,
  [APIErrorCode.CONFIGURATION_ERROR]: 400,

  // 404 Not Found
  [APIErrorCode.NOT_FOUND]: 404,

  // 500 Internal Server Error - Server errors
  [APIErrorCode.INTERNAL_ERROR]: 500,

  // 502 Bad Gateway - every backend attempt failed
  [APIErrorCode.BATCH_FAILED]: 502,

  // 503 Service Unavailable - Temporary service issues
  [APIErrorCode.SERVICE_UNAVAILABLE]: 503,
};

/**
 * Formats a successful API response. Data fields are spread into the
 * response root next to the timestamp.
 *
 * @example
 * ```typescript
 * formatSuccessResponse({ sources: ['brain_wisdom'] });
 * // { sources: ['brain_wisdom'], timestamp: 1760880000000 }
 * ```
 */
export function formatSuccessResponse<T extends object>(
  data: T,
  requestId?: string
): SuccessResponseData<T> {
  const timestamp = Date.now();
  return requestId ? { ...data, timestamp, requestId } : { ...data, timestamp };
}

/**
 * Formats an error API response.
 *
 * Accepts an APIError (used as-is), an Error or a string (wrapped with
 * defaultCode), or anything else (generic internal error).
 *
 * @example
 * ```typescript
 * formatErrorResponse(createAPIError(APIErrorCode.UNKNOWN_BACKEND, 'Unknown backend "x"'));
 * formatErrorResponse(new Error('engine config unreadable'));
 * ```
 */
export function formatErrorResponse(
  error: unknown,
  defaultCode: APIErrorCode = APIErrorCode.INTERNAL_ERROR,
  requestId?: string
): ErrorResponseData {
  let apiError: APIError;

  if (isAPIError(error)) {
    apiError = error;
  } else if (error instanceof Error) {
    apiError = {
      code: defaultCode,
      message: error.message || 'An unexpected error occurred',
    };
  } else if (typeof error === 'string') {
    apiError = {
      code: defaultCode,
      message: error || 'An unexpected error occurred',
    };
  } else {
    apiError = {
      code: APIErrorCode.INTERNAL_ERROR,
      message: 'An unexpected error occurred',
    };
  }

  const response: ErrorResponseData = {
    error: apiError,
    timestamp: Date.now(),
  };

  if (requestId) {
    response.requestId = requestId;
  }

  return response;
}

/**
 * @returns HTTP status code (500 for unknown codes)
 *
 * @example
 * ```typescript
 * getHttpStatusForError(APIErrorCode.BATCH_SIZE_EXCEEDED); // 400
 * getHttpStatusForError(APIErrorCode.BATCH_FAILED); // 502
 * ```
 */
export function getHttpStatusForError(errorCode: APIErrorCode): number {
  return ERROR_STATUS_MAP[errorCode] ?? 500;
}

export function isAPIError(error: unknown): error is APIError {
  return (
    typeof error === 'object' &&
    error !== null &&
    !(error instanceof Error) &&
    'code' in error &&
    'message' in error &&
    isAPIErrorCode(error.code) &&
    typeof error.message === 'string'
  );
}

/**
 * @example
 * ```typescript
 * createAPIError(APIErrorCode.BATCH_SIZE_EXCEEDED, 'Too many sources', {
 *   field: 'sourceIds',
 *   maxAllowed: 20,
 *   received: 25,
 * });
 * ```
 */
export function createAPIError(
  code: APIErrorCode,
  message: string,
  details?: APIError['details']
): APIError {
  const error: APIError = { code, message };

  if (details) {
    error.details = details;
  }

  return error;
}

export function sendSuccessResponse<T extends object>(
  res: JsonResponse,
  data: T,
  requestId?: string
): void {
  res.json(formatSuccessResponse(data, requestId));
}

/**
 * Formats an error, maps its code to a status and sends it.
 *
 * @example
 * ```typescript
 * sendErrorResponse(res, createAPIError(APIErrorCode.UNKNOWN_BACKEND, 'Unknown backend'));
 * // Sends 400 with { error: { code: 'UNKNOWN_BACKEND', ... }, timestamp }
 * ```
 */
export function sendErrorResponse(
  res: JsonResponse,
  error: unknown,
  defaultCode: APIErrorCode = APIErrorCode.INTERNAL_ERROR,
  requestId?: string
): void {
  const response = formatErrorResponse(error, defaultCode, requestId);
  const statusCode = getHttpStatusForError(response.error.code);

  res.status(statusCode).json(response);
}

/**
 * Request id for tracing, e.g. `batch_1760880000000_k3j9x2a`.
 */
export function createRequestId(prefix: string): string {
  return `${prefix}_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * API error for a failed request validation, carrying every field error.
 * The code is the first error's code.
 */
export function createValidationError(errors: readonly ValidationError[]): APIError {
  const [first] = errors;
  return createAPIError(
    first?.code ?? APIErrorCode.MISSING_PARAMETER,
    first?.message ?? 'Invalid request',
    {
      field: first?.field,
      errors: [...errors],
    }
  );
}

/**
 * Input validation module for the generation API endpoints.
 *
 * Provides validation for:
 * - Required and optional string fields (intent, style, seed)
 * - Source id lists for batches, including the batch size limit
 * - Timeouts (positive integer milliseconds)
 * - Backend identities against the registered backends
 *
 * Each validator returns a ValidationResult. Request validators additionally
 * return the typed request when it is valid.
 */

import { isValidSourceId } from '../services/config-source.service';

/**
 * Longest timeout a request may ask for (10 minutes).
 */
export const MAX_TIMEOUT_MS = 10 * 60 * 1000;

const MAX_INTENT_LENGTH = 2000;
const MAX_SEED_LENGTH = 256;

/**
 * Enumeration of API validation error codes.
 * These codes provide machine-readable error identification for client applications.
 */
export enum APIErrorCode {
  /** Required parameter is missing from the request */
  MISSING_PARAMETER = 'MISSING_PARAMETER',
  /** Parameter has wrong type (e.g., string instead of array) */
  INVALID_TYPE = 'INVALID_TYPE',
  /** sourceIds is empty or contains a malformed id */
  INVALID_SOURCE_IDS = 'INVALID_SOURCE_IDS',
  /** More source ids than the configured maximum */
  BATCH_SIZE_EXCEEDED = 'BATCH_SIZE_EXCEEDED',
  /** Timeout is not a positive integer within the allowed range */
  INVALID_TIMEOUT = 'INVALID_TIMEOUT',
  /** Backend identity is not registered */
  UNKNOWN_BACKEND = 'UNKNOWN_BACKEND',
}

/**
 * Detailed validation error information.
 */
export interface ValidationError {
  code: APIErrorCode;
  message: string;
  /** Field name that caused the validation error */
  field: string;
  details?: {
    expected?: string;
    received?: unknown;
    [key: string]: unknown;
  };
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}

/**
 * Validation result carrying the typed request when valid.
 */
export type ParsedRequest<T> =
  | { isValid: true; errors: []; value: T }
  | { isValid: false; errors: ValidationError[] };

export interface GenerateRequest {
  intent: string;
  style: string;
  backend?: string;
  timeoutMs?: number;
  seed?: string;
}

export interface BatchRequest {
  sourceIds: string[];
  backend: string;
  compareWith?: string;
  timeoutMs?: number;
  seed?: string;
  reuseArtifacts?: boolean;
}

export interface InvalidateRequest {
  sourceId: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function typeName(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

function result(errors: ValidationError[]): ValidationResult {
  return { isValid: errors.length === 0, errors };
}

/**
 * Validates a string field.
 *
 * @example
 * ```typescript
 * validateString(body.intent, 'intent', { required: true, maxLength: 2000 });
 * ```
 */
export function validateString(
  value: unknown,
  fieldName: string,
  { required, maxLength, allowEmpty = false }: { required: boolean; maxLength?: number; allowEmpty?: boolean }
): ValidationResult {
  if (value === undefined || value === null) {
    return result(
      required
        ? [
            {
              code: APIErrorCode.MISSING_PARAMETER,
              message: `${fieldName} is required`,
              field: fieldName,
              details: { expected: 'string', received: value },
            },
          ]
        : []
    );
  }

  if (typeof value !== 'string') {
    return result([
      {
        code: APIErrorCode.INVALID_TYPE,
        message: `${fieldName} must be a string`,
        field: fieldName,
        details: { expected: 'string', received: typeName(value) },
      },
    ]);
  }

  const errors: ValidationError[] = [];
  if (!allowEmpty && value.trim().length === 0) {
    errors.push({
      code: required ? APIErrorCode.MISSING_PARAMETER : APIErrorCode.INVALID_TYPE,
      message: `${fieldName} cannot be empty`,
      field: fieldName,
    });
  }
  if (maxLength !== undefined && value.length > maxLength) {
    errors.push({
      code: APIErrorCode.INVALID_TYPE,
      message: `${fieldName} must be at most ${maxLength} characters`,
      field: fieldName,
      details: { maxLength, received: value.length },
    });
  }
  return result(errors);
}

/**
 * Validates a list of source ids against the batch size limit.
 */
export function validateSourceIds(
  sourceIds: unknown,
  maxBatchSize: number,
  fieldName: string = 'sourceIds'
): ValidationResult {
  if (sourceIds === undefined || sourceIds === null) {
    return result([
      {
        code: APIErrorCode.MISSING_PARAMETER,
        message: `${fieldName} is required`,
        field: fieldName,
        details: { expected: 'array of source ids', received: sourceIds },
      },
    ]);
  }

  if (!Array.isArray(sourceIds)) {
    return result([
      {
        code: APIErrorCode.INVALID_TYPE,
        message: `${fieldName} must be an array`,
        field: fieldName,
        details: { expected: 'array', received: typeName(sourceIds) },
      },
    ]);
  }

  if (sourceIds.length === 0) {
    return result([
      {
        code: APIErrorCode.INVALID_SOURCE_IDS,
        message: `${fieldName} must contain at least one source id`,
        field: fieldName,
      },
    ]);
  }

  if (sourceIds.length > maxBatchSize) {
    return result([
      {
        code: APIErrorCode.BATCH_SIZE_EXCEEDED,
        message: `${fieldName} cannot contain more than ${maxBatchSize} source ids`,
        field: fieldName,
        details: { maxAllowed: maxBatchSize, received: sourceIds.length },
      },
    ]);
  }

  const errors: ValidationError[] = [];
  sourceIds.forEach((sourceId: unknown, index: number) => {
    if (typeof sourceId !== 'string' || !isValidSourceId(sourceId)) {
      errors.push({
        code: APIErrorCode.INVALID_SOURCE_IDS,
        message: `${fieldName}[${index}] is not a valid source id`,
        field: `${fieldName}[${index}]`,
        details: { expected: 'letters, digits, "_", "-" and "."', received: sourceId },
      });
    }
  });

  return result(errors);
}

/**
 * Validates an optional timeout in milliseconds.
 */
export function validateTimeout(value: unknown, fieldName: string = 'timeoutMs'): ValidationResult {
  if (value === undefined) {
    return result([]);
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0 || value > MAX_TIMEOUT_MS) {
    return result([
      {
        code: APIErrorCode.INVALID_TIMEOUT,
        message: `${fieldName} must be an integer between 1 and ${MAX_TIMEOUT_MS}`,
        field: fieldName,
        details: { expected: `1..${MAX_TIMEOUT_MS}`, received: value },
      },
    ]);
  }
  return result([]);
}

/**
 * Validates a backend identity against the registered backends.
 */
export function validateBackend(
  value: unknown,
  knownBackends: readonly string[],
  { fieldName, required }: { fieldName: string; required: boolean }
): ValidationResult {
  const base = validateString(value, fieldName, { required });
  if (!base.isValid || typeof value !== 'string') {
    return base;
  }
  if (!knownBackends.includes(value)) {
    return result([
      {
        code: APIErrorCode.UNKNOWN_BACKEND,
        message: `${fieldName} "${value}" is not a registered backend`,
        field: fieldName,
        details: { availableBackends: [...knownBackends] },
      },
    ]);
  }
  return result([]);
}

function bodyOf(body: unknown): Record<string, unknown> {
  return isRecord(body) ? body : {};
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

/**
 * Validates a POST /api/generate body.
 */
export function validateGenerateRequest(
  body: unknown,
  knownBackends: readonly string[]
): ParsedRequest<GenerateRequest> {
  const fields = bodyOf(body);
  const errors = [
    ...validateString(fields.intent, 'intent', { required: true, maxLength: MAX_INTENT_LENGTH }).errors,
    ...validateString(fields.style, 'style', { required: false, maxLength: MAX_INTENT_LENGTH, allowEmpty: true }).errors,
    ...validateBackend(fields.backend, knownBackends, { fieldName: 'backend', required: false }).errors,
    ...validateTimeout(fields.timeoutMs).errors,
    ...validateString(fields.seed, 'seed', { required: false, maxLength: MAX_SEED_LENGTH }).errors,
  ];

  if (errors.length > 0 || typeof fields.intent !== 'string') {
    return { isValid: false, errors };
  }

  return {
    isValid: true,
    errors: [],
    value: {
      intent: fields.intent.trim(),
      style: optionalString(fields.style)?.trim() ?? '',
      backend: optionalString(fields.backend),
      timeoutMs: optionalNumber(fields.timeoutMs),
      seed: optionalString(fields.seed),
    },
  };
}

/**
 * Validates a POST /api/batch body.
 */
export function validateBatchRequest(
  body: unknown,
  { maxBatchSize, knownBackends }: { maxBatchSize: number; knownBackends: readonly string[] }
): ParsedRequest<BatchRequest> {
  const fields = bodyOf(body);
  const errors = [
    ...validateSourceIds(fields.sourceIds, maxBatchSize).errors,
    ...validateBackend(fields.backend, knownBackends, { fieldName: 'backend', required: true }).errors,
    ...validateBackend(fields.compareWith, knownBackends, { fieldName: 'compareWith', required: false }).errors,
    ...validateTimeout(fields.timeoutMs).errors,
    ...validateString(fields.seed, 'seed', { required: false, maxLength: MAX_SEED_LENGTH }).errors,
  ];

  if (fields.reuseArtifacts !== undefined && typeof fields.reuseArtifacts !== 'boolean') {
    errors.push({
      code: APIErrorCode.INVALID_TYPE,
      message: 'reuseArtifacts must be a boolean',
      field: 'reuseArtifacts',
      details: { expected: 'boolean', received: typeName(fields.reuseArtifacts) },
    });
  }
  if (
    typeof fields.compareWith === 'string' &&
    fields.compareWith === fields.backend
  ) {
    errors.push({
      code: APIErrorCode.UNKNOWN_BACKEND,
      message: 'compareWith must name a different backend than backend',
      field: 'compareWith',
    });
  }

  const sourceIds = Array.isArray(fields.sourceIds)
    ? fields.sourceIds.filter((id: unknown): id is string => typeof id === 'string')
    : [];
  if (errors.length > 0 || typeof fields.backend !== 'string') {
    return { isValid: false, errors };
  }

  return {
    isValid: true,
    errors: [],
    value: {
      sourceIds,
      backend: fields.backend,
      compareWith: optionalString(fields.compareWith),
      timeoutMs: optionalNumber(fields.timeoutMs),
      seed: optionalString(fields.seed),
      reuseArtifacts: typeof fields.reuseArtifacts === 'boolean' ? fields.reuseArtifacts : undefined,
    },
  };
}

/**
 * Validates a POST /api/cache/invalidate body.
 */
export function validateInvalidateRequest(body: unknown): ParsedRequest<InvalidateRequest> {
  const fields = bodyOf(body);
  const errors = [...validateString(fields.sourceId, 'sourceId', { required: true }).errors];

  if (typeof fields.sourceId === 'string' && errors.length === 0 && !isValidSourceId(fields.sourceId)) {
    errors.push({
      code: APIErrorCode.INVALID_SOURCE_IDS,
      message: 'sourceId is not a valid source id',
      field: 'sourceId',
      details: { received: fields.sourceId },
    });
  }

  if (errors.length > 0 || typeof fields.sourceId !== 'string') {
    return { isValid: false, errors };
  }
  return { isValid: true, errors: [], value: { sourceId: fields.sourceId } };
}

/**
 * Unit tests for API validation module.
 *
 * Tests all validation functions with various input scenarios:
 * - Valid inputs (should pass)
 * - Invalid inputs (should fail with appropriate errors)
 * - Edge cases and boundary conditions
 */

import { describe, it, expect } from 'vitest';
import {
  validateString,
  validateSourceIds,
  validateTimeout,
  validateBackend,
  validateGenerateRequest,
  validateBatchRequest,
  validateInvalidateRequest,
  APIErrorCode,
  MAX_TIMEOUT_MS,
} from './api.validation';

const BACKENDS = ['qwen3:1.7b', 'llama3.2:3b'];

describe('API Validation Module', () => {
  describe('validateString', () => {
    it('should accept a non-empty string', () => {
      expect(validateString('Find peace', 'intent', { required: true })).toEqual({
        isValid: true,
        errors: [],
      });
    });

    it('should reject a missing required value', () => {
      const result = validateString(undefined, 'intent', { required: true });

      expect(result.isValid).toBe(false);
      expect(result.errors[0]).toMatchObject({
        code: APIErrorCode.MISSING_PARAMETER,
        message: 'intent is required',
        field: 'intent',
      });
    });

    it('should accept a missing optional value', () => {
      expect(validateString(null, 'style', { required: false }).isValid).toBe(true);
    });

    it('should reject non-strings', () => {
      const result = validateString(42, 'intent', { required: true });

      expect(result.errors).toEqual([
        {
          code: APIErrorCode.INVALID_TYPE,
          message: 'intent must be a string',
          field: 'intent',
          details: { expected: 'string', received: 'number' },
        },
      ]);
    });

    it('should reject blank strings unless allowed', () => {
      expect(validateString('   ', 'intent', { required: true }).errors[0]?.message).toBe(
        'intent cannot be empty'
      );
      expect(validateString('', 'style', { required: false, allowEmpty: true }).isValid).toBe(true);
    });

    it('should enforce the maximum length', () => {
      const result = validateString('abcdef', 'seed', { required: false, maxLength: 5 });

      expect(result.errors[0]?.message).toBe('seed must be at most 5 characters');
      expect(result.errors[0]?.details).toEqual({ maxLength: 5, received: 6 });
    });
  });

  describe('validateSourceIds', () => {
    it('should accept valid source ids', () => {
      expect(validateSourceIds(['brain_wisdom', 'brain_fire'], 20).isValid).toBe(true);
    });

    it('should reject a missing or non-array value', () => {
      expect(validateSourceIds(undefined, 20).errors[0]?.code).toBe(APIErrorCode.MISSING_PARAMETER);
      expect(validateSourceIds('brain_wisdom', 20).errors[0]).toMatchObject({
        code: APIErrorCode.INVALID_TYPE,
        details: { expected: 'array', received: 'string' },
      });
    });

    it('should reject an empty list', () => {
      expect(validateSourceIds([], 20).errors[0]).toMatchObject({
        code: APIErrorCode.INVALID_SOURCE_IDS,
        message: 'sourceIds must contain at least one source id',
      });
    });

    it('should enforce the batch size limit', () => {
      const ids = Array.from({ length: 3 }, (_, i) => `brain_${i}`);

      expect(validateSourceIds(ids, 3).isValid).toBe(true);
      expect(validateSourceIds([...ids, 'brain_3'], 3).errors).toEqual([
        {
          code: APIErrorCode.BATCH_SIZE_EXCEEDED,
          message: 'sourceIds cannot contain more than 3 source ids',
          field: 'sourceIds',
          details: { maxAllowed: 3, received: 4 },
        },
      ]);
    });

    it('should report each malformed id with its index', () => {
      const result = validateSourceIds(['brain_ok', '../etc/passwd', 7], 20);

      expect(result.errors.map(error => error.field)).toEqual(['sourceIds[1]', 'sourceIds[2]']);
      expect(result.errors.every(error => error.code === APIErrorCode.INVALID_SOURCE_IDS)).toBe(true);
    });
  });

  describe('validateTimeout', () => {
    it('should accept an absent timeout and integers in range', () => {
      expect(validateTimeout(undefined).isValid).toBe(true);
      expect(validateTimeout(1).isValid).toBe(true);
      expect(validateTimeout(MAX_TIMEOUT_MS).isValid).toBe(true);
    });

    it('should reject everything else', () => {
      const invalid: unknown[] = [0, -1, 1.5, MAX_TIMEOUT_MS + 1, '500', null];

      invalid.forEach(value => {
        const result = validateTimeout(value);
        expect(result.isValid).toBe(false);
        expect(result.errors[0]?.code).toBe(APIErrorCode.INVALID_TIMEOUT);
      });
    });
  });

  describe('validateBackend', () => {
    it('should accept a registered backend', () => {
      expect(validateBackend('llama3.2:3b', BACKENDS, { fieldName: 'backend', required: true }).isValid).toBe(true);
    });

    it('should reject an unknown backend and list the available ones', () => {
      const result = validateBackend('gpt-9', BACKENDS, { fieldName: 'backend', required: true });

      expect(result.errors).toEqual([
        {
          code: APIErrorCode.UNKNOWN_BACKEND,
          message: 'backend "gpt-9" is not a registered backend',
          field: 'backend',
          details: { availableBackends: BACKENDS },
        },
      ]);
    });

    it('should treat an absent optional backend as valid', () => {
      expect(validateBackend(undefined, BACKENDS, { fieldName: 'compareWith', required: false }).isValid).toBe(true);
    });
  });

  describe('validateGenerateRequest', () => {
    it('should return the trimmed request', () => {
      const result = validateGenerateRequest(
        { intent: '  Find peace ', style: ' calm ', backend: 'qwen3:1.7b', timeoutMs: 5000, seed: 'abc' },
        BACKENDS
      );

      expect(result).toEqual({
        isValid: true,
        errors: [],
        value: { intent: 'Find peace', style: 'calm', backend: 'qwen3:1.7b', timeoutMs: 5000, seed: 'abc' },
      });
    });

    it('should default the optional fields', () => {
      const result = validateGenerateRequest({ intent: 'Find peace' }, BACKENDS);

      expect(result.isValid && result.value).toEqual({
        intent: 'Find peace',
        style: '',
        backend: undefined,
        timeoutMs: undefined,
        seed: undefined,
      });
    });

    it('should collect every field error', () => {
      const result = validateGenerateRequest({ style: 3, backend: 'nope', timeoutMs: 0 }, BACKENDS);

      expect(result.isValid).toBe(false);
      expect(result.errors.map(error => error.field)).toEqual(['intent', 'style', 'backend', 'timeoutMs']);
    });

    it('should treat a non-object body as empty', () => {
      expect(validateGenerateRequest('intent=peace', BACKENDS).errors[0]?.code).toBe(
        APIErrorCode.MISSING_PARAMETER
      );
    });
  });

  describe('validateBatchRequest', () => {
    const limits = { maxBatchSize: 5, knownBackends: BACKENDS };

    it('should return the typed request', () => {
      const result = validateBatchRequest(
        {
          sourceIds: ['brain_wisdom', 'brain_fire'],
          backend: 'qwen3:1.7b',
          compareWith: 'llama3.2:3b',
          reuseArtifacts: false,
        },
        limits
      );

      expect(result).toEqual({
        isValid: true,
        errors: [],
        value: {
          sourceIds: ['brain_wisdom', 'brain_fire'],
          backend: 'qwen3:1.7b',
          compareWith: 'llama3.2:3b',
          timeoutMs: undefined,
          seed: undefined,
          reuseArtifacts: false,
        },
      });
    });

    it('should require a backend', () => {
      const result = validateBatchRequest({ sourceIds: ['brain_wisdom'] }, limits);

      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatchObject({ code: APIErrorCode.MISSING_PARAMETER, field: 'backend' });
    });

    it('should reject a comparison against the same backend', () => {
      const result = validateBatchRequest(
        { sourceIds: ['brain_wisdom'], backend: 'qwen3:1.7b', compareWith: 'qwen3:1.7b' },
        limits
      );

      expect(result.errors).toEqual([
        {
          code: APIErrorCode.UNKNOWN_BACKEND,
          message: 'compareWith must name a different backend than backend',
          field: 'compareWith',
        },
      ]);
    });

    it('should reject a non-boolean reuseArtifacts', () => {
      const result = validateBatchRequest(
        { sourceIds: ['brain_wisdom'], backend: 'qwen3:1.7b', reuseArtifacts: 'yes' },
        limits
      );

      expect(result.errors[0]).toMatchObject({ code: APIErrorCode.INVALID_TYPE, field: 'reuseArtifacts' });
    });

    it('should reject an oversized batch', () => {
      const sourceIds = Array.from({ length: 6 }, (_, i) => `brain_${i}`);
      const result = validateBatchRequest({ sourceIds, backend: 'qwen3:1.7b' }, limits);

      expect(result.errors[0]?.code).toBe(APIErrorCode.BATCH_SIZE_EXCEEDED);
    });
  });

  describe('validateInvalidateRequest', () => {
    it('should accept a valid source id', () => {
      expect(validateInvalidateRequest({ sourceId: 'brain_wisdom' })).toEqual({
        isValid: true,
        errors: [],
        value: { sourceId: 'brain_wisdom' },
      });
    });

    it('should reject a missing or malformed source id', () => {
      expect(validateInvalidateRequest({}).errors[0]?.code).toBe(APIErrorCode.MISSING_PARAMETER);
      expect(validateInvalidateRequest({ sourceId: '../brain' }).errors[0]).toMatchObject({
        code: APIErrorCode.INVALID_SOURCE_IDS,
        field: 'sourceId',
      });
    });
  });
});

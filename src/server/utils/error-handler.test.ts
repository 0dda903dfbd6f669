/**
 * Unit tests for error handling utilities.
 *
 * Tests cover:
 * - Error classification (4xx vs 5xx)
 * - Error context extraction and redaction
 * - Structured error logging
 * - Service failure handling
 * - Mapping thrown values to API errors
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  classifyError,
  extractErrorContext,
  logError,
  handleServiceFailure,
  sanitizeErrorDetails,
  toAPIError,
  ErrorClass,
} from './error-handler';
import { ConfigurationError } from './errors';
import { APIErrorCode } from './response.formatter';

describe('Error Handler', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('classifyError', () => {
    it('should classify validation and configuration errors as CLIENT_ERROR', () => {
      expect(classifyError(APIErrorCode.INVALID_SOURCE_IDS)).toBe(ErrorClass.CLIENT_ERROR);
      expect(classifyError(APIErrorCode.UNKNOWN_BACKEND)).toBe(ErrorClass.CLIENT_ERROR);
      expect(classifyError(APIErrorCode.CONFIGURATION_ERROR)).toBe(ErrorClass.CLIENT_ERROR);
      expect(classifyError(APIErrorCode.NOT_FOUND)).toBe(ErrorClass.CLIENT_ERROR);
    });

    it('should classify failed batches and internal errors as SERVER_ERROR', () => {
      expect(classifyError(APIErrorCode.BATCH_FAILED)).toBe(ErrorClass.SERVER_ERROR);
      expect(classifyError(APIErrorCode.INTERNAL_ERROR)).toBe(ErrorClass.SERVER_ERROR);
      expect(classifyError(APIErrorCode.SERVICE_UNAVAILABLE)).toBe(ErrorClass.SERVER_ERROR);
    });
  });

  describe('extractErrorContext', () => {
    it('should extract the request context', () => {
      const context = extractErrorContext(
        { method: 'POST', path: '/api/batch' },
        'batch_1',
        'runBatch',
        { sourceIds: 2 }
      );

      expect(context).toEqual({
        requestId: 'batch_1',
        method: 'POST',
        path: '/api/batch',
        operation: 'runBatch',
        metadata: { sourceIds: 2 },
        timestamp: expect.any(String),
      });
    });

    it('should redact sensitive metadata', () => {
      const context = extractErrorContext({ method: 'GET', path: '/api/stats' }, undefined, undefined, {
        redisPassword: 'test-secret',
        apiKey: 'test-key',
        backend: 'qwen3:1.7b',
      });

      expect(context.metadata).toEqual({
        redisPassword: '[REDACTED]',
        apiKey: '[REDACTED]',
        backend: 'qwen3:1.7b',
      });
    });
  });

  describe('sanitizeErrorDetails', () => {
    it('should leave the input untouched', () => {
      const details = { authorization: 'Bearer test-token' };

      expect(sanitizeErrorDetails(details)).toEqual({ authorization: '[REDACTED]' });
      expect(details.authorization).toBe('Bearer test-token');
    });
  });

  describe('logError', () => {
    const context = extractErrorContext({ method: 'POST', path: '/api/generate' }, 'gen_1');

    it('should log client errors at info level without a stack', () => {
      logError(new Error('intent is required'), context, APIErrorCode.MISSING_PARAMETER);

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      const [label, payload] = consoleLogSpy.mock.calls[0] ?? [];
      expect(label).toBe('[CLIENT_ERROR]');
      expect(typeof payload === 'string' && JSON.parse(payload)).toMatchObject({
        errorCode: 'MISSING_PARAMETER',
        errorClass: 'CLIENT_ERROR',
        message: 'intent is required',
      });
      expect(String(payload)).not.toContain('"stack"');
    });

    it('should log server errors at error level with a stack', () => {
      logError(new Error('boom'), context, APIErrorCode.INTERNAL_ERROR);

      expect(consoleErrorSpy).toHaveBeenCalledWith('[SERVER_ERROR]', expect.stringContaining('"stack"'));
    });

    it('should handle string errors', () => {
      logError('plain failure', context, APIErrorCode.BATCH_FAILED);

      expect(consoleErrorSpy).toHaveBeenCalledWith(
        '[SERVER_ERROR]',
        expect.stringContaining('"message":"plain failure"')
      );
    });
  });

  describe('handleServiceFailure', () => {
    const context = extractErrorContext({ method: 'POST', path: '/api/generate' }, 'gen_2');

    it('should return SERVICE_UNAVAILABLE for critical services', () => {
      const apiError = handleServiceFailure(new Error('redis down'), 'engineConfig', context);

      expect(apiError).toEqual({
        code: APIErrorCode.SERVICE_UNAVAILABLE,
        message: 'Service temporarily unavailable: engineConfig',
        details: { service: 'engineConfig', requestId: 'gen_2' },
      });
      expect(consoleErrorSpy).toHaveBeenCalledWith('[SERVICE_FAILURE]', expect.any(String));
    });

    it('should return null for non-critical services', () => {
      expect(handleServiceFailure(new Error('disk full'), 'artifactWriter', context, false)).toBeNull();
      expect(consoleLogSpy).toHaveBeenCalledWith('[SERVICE_DEGRADATION]', expect.any(String));
    });
  });

  describe('toAPIError', () => {
    it('should map ConfigurationError with its issues', () => {
      const error = new ConfigurationError('Invalid batch request', ['timeoutMs must be a positive number (got 0)']);

      expect(toAPIError(error, 'req_1')).toEqual({
        code: APIErrorCode.CONFIGURATION_ERROR,
        message: 'Invalid batch request: timeoutMs must be a positive number (got 0)',
        details: { issues: ['timeoutMs must be a positive number (got 0)'], requestId: 'req_1' },
      });
    });

    it('should map a malformed JSON body to INVALID_TYPE', () => {
      const error = Object.assign(new SyntaxError('Unexpected token } in JSON'), { body: '{' });

      expect(toAPIError(error).code).toBe(APIErrorCode.INVALID_TYPE);
      expect(toAPIError(error).message).toBe('Request body is not valid JSON');
    });

    it('should map anything else to INTERNAL_ERROR', () => {
      expect(toAPIError(new Error('boom')).message).toBe('boom');
      expect(toAPIError(42)).toEqual({
        code: APIErrorCode.INTERNAL_ERROR,
        message: 'An unexpected error occurred',
        details: { requestId: undefined },
      });
    });
  });
});

/**
 * Domain error types.
 *
 * Backend trouble (timeouts, process failures, malformed payloads) never
 * becomes an exception: GenerationAttempt turns it into a FALLBACK outcome.
 * ConfigurationError is the one error class that reaches callers, because it
 * means the engine cannot build even a fallback artifact.
 */

export const CONFIGURATION_ERROR_CODE = 'CONFIGURATION_ERROR';

/**
 * Raised when configuration is malformed, references missing pools, names an
 * unknown backend, or when a batch request breaks its limits.
 *
 * @example
 * ```typescript
 * throw new ConfigurationError('Invalid engine configuration', [
 *   'themes[0].symbolPools references missing pool "cosmic"',
 * ]);
 * ```
 */
export class ConfigurationError extends Error {
  readonly code = CONFIGURATION_ERROR_CODE;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Structured event logging.
 *
 * Every event is one line of JSON with an `operation` name and an ISO
 * timestamp. Failures add the error message, the stack and the inputs that
 * produced them. Debug events are emitted only when debug logging is on.
 *
 * @example
 * ```typescript
 * logEvent('runBatch', { batchId, attempts: 3 });
 * logFailure('loadEngineConfig', error, { path: 'data/engine.config.json' });
 * logDebug('selectSymbol', () => ({ theme, candidates: symbols.length }));
 * ```
 */

import { errorMessage } from './errors';

export type EventFields = Record<string, unknown>;

let debugEnabled = process.env.DEBUG_GENERATION === 'true';

/**
 * Debug logging starts from DEBUG_GENERATION and is then set from the
 * runtime configuration at startup.
 */
export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export function logEvent(operation: string, fields: EventFields = {}): void {
  console.log(
    JSON.stringify({
      operation,
      ...fields,
      timestamp: new Date().toISOString(),
    })
  );
}

export function logWarning(operation: string, fields: EventFields = {}): void {
  console.warn(
    JSON.stringify({
      operation,
      level: 'warn',
      ...fields,
      timestamp: new Date().toISOString(),
    })
  );
}

export function logFailure(
  operation: string,
  error: unknown,
  inputs: EventFields = {}
): void {
  console.error(
    JSON.stringify({
      operation,
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
      inputs,
      timestamp: new Date().toISOString(),
    })
  );
}

/**
 * Fields are built lazily so disabled debug logging costs nothing.
 */
export function logDebug(debug: string, fields: () => EventFields): void {
  if (!isDebugEnabled()) {
    return;
  }

  console.log(
    JSON.stringify({
      debug,
      ...fields(),
      timestamp: new Date().toISOString(),
    })
  );
}

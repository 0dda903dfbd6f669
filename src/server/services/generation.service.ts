/**
 * Generation Service - one end-to-end generation attempt
 *
 * START → THEME_RESOLVED → PROMPT_BUILT → BACKEND_INVOKED, then one of:
 * - VALIDATED → SUCCESS
 * - INVALID_RESPONSE → FALLBACK
 * - TIMED_OUT → FALLBACK
 * - BACKEND_ERROR → FALLBACK
 *
 * FAILED is reserved for an engine configuration that cannot support a
 * fallback; the backend is not called in that case. Backend trouble never
 * escapes as an exception: every such branch ends in a fallback artifact.
 */

import type { EngineConfig } from '../types/engine.types';
import {
  AttemptState,
  AttemptStatus,
  ErrorKind,
  type Artifact,
  type AttemptOutcome,
  type BackendResult,
  type GenerationBackend,
} from '../types/generation.types';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { logDebug, logWarning } from '../utils/logger';
import { isHexColor, parseArtifactPayload } from '../validation/artifact.validation';
import { FallbackService } from './fallback.service';
import type { RandomSource } from './prng.service';
import { PromptService, type PromptInput } from './prompt.service';
import { ThemeResolverService } from './theme-resolver.service';

export type GenerationInput = PromptInput;

export interface GenerationServiceDeps {
  resolver?: ThemeResolverService;
  prompts?: PromptService;
  fallback?: FallbackService;
  now?: () => number;
}

/**
 * Reason the engine cannot produce even a fallback artifact, or null.
 */
export function engineDefect(engine: EngineConfig): string | null {
  if (engine.themes.length === 0) {
    return 'theme table is empty';
  }
  if (engine.pools.fallbackSymbols.length === 0) {
    return 'fallback symbol pool is empty';
  }
  if (!isHexColor(engine.pools.fallbackColor)) {
    return `fallback color "${engine.pools.fallbackColor}" is not #rrggbb`;
  }
  return null;
}

/**
 * @example
 * ```typescript
 * const generation = new GenerationService();
 * const outcome = await generation.run(
 *   { intent: 'Channel the raw power of elemental fire', style: 'fierce' },
 *   engineConfig,
 *   backend,
 *   60_000,
 *   PRNG.fromHex(seedHex)
 * );
 * // outcome.status: SUCCESS | FALLBACK | FAILED
 * ```
 */
export class GenerationService {
  private readonly resolver: ThemeResolverService;
  private readonly prompts: PromptService;
  private readonly fallbackService: FallbackService;
  private readonly now: () => number;

  constructor(deps: GenerationServiceDeps = {}) {
    this.resolver = deps.resolver ?? new ThemeResolverService();
    this.prompts = deps.prompts ?? new PromptService();
    this.fallbackService = deps.fallback ?? new FallbackService();
    this.now = deps.now ?? Date.now;
  }

  /**
   * Runs one attempt. Resolves with an outcome for every backend behavior.
   *
   * @throws {ConfigurationError} If timeoutMs is not a positive finite number
   */
  async run(
    input: GenerationInput,
    engine: EngineConfig,
    backend: GenerationBackend,
    timeoutMs: number,
    rng: RandomSource
  ): Promise<AttemptOutcome> {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError('Invalid timeout', [
        `timeoutMs must be a positive number (got ${timeoutMs})`,
      ]);
    }

    const startedAt = this.now();
    const path: AttemptState[] = [AttemptState.START];

    const defect = engineDefect(engine);
    if (defect !== null) {
      path.push(AttemptState.FAILED);
      logWarning('generationAttempt:failed', { reason: defect });
      return this.finish(startedAt, path, {
        status: AttemptStatus.FAILED,
        theme: null,
        errorKind: ErrorKind.CONFIGURATION_ERROR,
        errorMessage: defect,
      });
    }

    const theme = this.resolver.resolve(input.intent, engine.themes, engine.pools);
    path.push(AttemptState.THEME_RESOLVED);

    const prompt = this.prompts.build(input, engine.prompts, rng);
    path.push(AttemptState.PROMPT_BUILT);

    path.push(AttemptState.BACKEND_INVOKED);
    const result = await this.invokeWithTimeout(backend, prompt, timeoutMs);

    let errorKind: ErrorKind;
    let message: string | undefined;
    let rawResponse: string | undefined;

    if (result.ok) {
      rawResponse = result.payload;
      const parsed = parseArtifactPayload(result.payload);
      if (parsed.valid) {
        path.push(AttemptState.VALIDATED, AttemptState.SUCCESS);
        return this.finish(startedAt, path, {
          status: AttemptStatus.SUCCESS,
          artifact: parsed.artifact,
          theme,
          prompt,
          rawResponse,
        });
      }
      path.push(AttemptState.INVALID_RESPONSE);
      errorKind = ErrorKind.INVALID_RESPONSE;
      message = parsed.reason;
    } else if (result.error.kind === ErrorKind.TIMEOUT) {
      path.push(AttemptState.TIMED_OUT);
      errorKind = ErrorKind.TIMEOUT;
      message = `backend did not answer within ${timeoutMs}ms`;
    } else {
      path.push(AttemptState.BACKEND_ERROR);
      errorKind = ErrorKind.PROCESS_ERROR;
      message = result.error.message;
    }

    const artifact: Artifact = this.fallbackService.fallback(input.intent, theme, engine, rng);
    path.push(AttemptState.FALLBACK);
    logWarning('generationAttempt:fallback', { theme, errorKind, message });

    return this.finish(startedAt, path, {
      status: AttemptStatus.FALLBACK,
      artifact,
      theme,
      errorKind,
      errorMessage: message,
      prompt,
      rawResponse,
    });
  }

  /**
   * Races the backend against a timer. The timer aborts the backend's signal;
   * anything the backend produces after that is ignored.
   */
  private async invokeWithTimeout(
    backend: GenerationBackend,
    prompt: string,
    timeoutMs: number
  ): Promise<BackendResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timedOut = new Promise<BackendResult>(resolve => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ ok: false, error: { kind: ErrorKind.TIMEOUT } });
      }, timeoutMs);
    });

    const call = Promise.resolve()
      .then(() => backend.invoke(prompt, { timeoutMs, signal: controller.signal }))
      .catch(
        (error: unknown): BackendResult => ({
          ok: false,
          error: { kind: ErrorKind.PROCESS_ERROR, message: errorMessage(error) },
        })
      );

    try {
      return await Promise.race([call, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  private finish(
    startedAt: number,
    path: AttemptState[],
    fields: Omit<AttemptOutcome, 'elapsedMs' | 'path'>
  ): AttemptOutcome {
    const outcome: AttemptOutcome = Object.freeze({
      ...fields,
      elapsedMs: Math.max(0, this.now() - startedAt),
      path: [...path],
    });

    logDebug('generationAttempt', () => ({
      status: outcome.status,
      theme: outcome.theme,
      errorKind: outcome.errorKind,
      elapsedMs: outcome.elapsedMs,
      path: outcome.path,
    }));

    return outcome;
  }
}

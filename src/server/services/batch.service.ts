/**
 * Batch Service - runs generation attempts over many brain sources
 *
 * Attempts run one after another, in the order the source ids were given.
 * With a comparison backend the whole list is run a second time against it;
 * the two passes share the config cache and nothing else.
 *
 * Failure policy:
 * - A source that cannot be loaded or parsed is recorded as a FAILED attempt
 *   with errorKind CONFIGURATION_ERROR, and the batch moves on.
 * - Backend trouble arrives as FALLBACK outcomes from GenerationService.
 * - Invalid batch parameters, an unknown backend or an invalid engine
 *   configuration throw ConfigurationError before any attempt runs.
 * - When every attempt that ran is FAILED, RunStats.totalFailure is set.
 *
 * Every attempt draws from its own PRNG seeded with
 * HMAC-SHA256(batch seed, "backend|index|sourceId"), so replaying a batch with
 * the reported seed reproduces every random choice.
 */

import { randomUUID } from 'crypto';
import type { BrainConfig, EngineConfig } from '../types/engine.types';
import {
  AttemptState,
  AttemptStatus,
  ErrorKind,
  type AttemptOutcome,
  type AttemptRecord,
  type ArtifactSink,
  type BackendSelector,
  type GenerationBackend,
  type RunStats,
} from '../types/generation.types';
import { ConfigurationError, errorMessage, isConfigurationError } from '../utils/errors';
import { logEvent, logFailure, logWarning } from '../utils/logger';
import type { BackendRegistry } from './backend.service';
import type { ConfigCache, ResolvedConfig } from './config-cache.service';
import { GenerationService } from './generation.service';
import { HashService } from './hash.service';
import { PRNG } from './prng.service';
import { RunStatsAccumulator, cacheDelta } from './run-stats.service';
import type { TelemetryService } from './telemetry.service';

export const DEFAULT_MAX_BATCH_SIZE = 20;

export interface BatchServiceDeps {
  brainCache: ConfigCache<BrainConfig>;
  engineCache: ConfigCache<EngineConfig>;
  /** Source id of the engine configuration within engineCache */
  engineSourceId: string;
  registry: BackendRegistry;
  maxBatchSize?: number;
  generation?: GenerationService;
  hashService?: HashService;
  sink?: ArtifactSink;
  telemetry?: TelemetryService;
  now?: () => number;
}

export interface BatchOptions {
  /** Seed for every attempt's random source; a fresh UUID when omitted */
  seed?: string;
  batchId?: string;
  /** Checked before each attempt; once aborted no further attempt starts */
  signal?: AbortSignal;
  /** Reuse a successful artifact for the same backend and brain content (default true) */
  reuseArtifacts?: boolean;
}

interface Pass {
  number: number;
  backendId: string;
  backend: GenerationBackend;
}

interface BatchContext {
  engine: EngineConfig;
  seed: string;
  timeoutMs: number;
  reuseArtifacts: boolean;
  /** `${backendId}|${contentHash}` → earlier SUCCESS outcome */
  reusable: Map<string, AttemptOutcome>;
}

/**
 * @example
 * ```typescript
 * const stats = await batchService.runBatch(
 *   ['brain_wisdom', 'brain_fire'],
 *   { primary: 'qwen3:1.7b', comparison: 'llama3.2:3b' },
 *   60_000
 * );
 * console.log(stats.counts, stats.successRate);
 * ```
 */
export class BatchService {
  private readonly maxBatchSize: number;
  private readonly generation: GenerationService;
  private readonly hashService: HashService;
  private readonly now: () => number;

  constructor(private readonly deps: BatchServiceDeps) {
    this.maxBatchSize = deps.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE;
    this.generation = deps.generation ?? new GenerationService();
    this.hashService = deps.hashService ?? new HashService();
    this.now = deps.now ?? Date.now;
  }

  get maxSize(): number {
    return this.maxBatchSize;
  }

  /**
   * @throws {ConfigurationError} On invalid parameters, an unknown backend or
   *   an invalid engine configuration
   */
  async runBatch(
    sourceIds: readonly string[],
    selector: BackendSelector,
    timeoutMs: number,
    options: BatchOptions = {}
  ): Promise<RunStats> {
    this.validate(sourceIds, selector, timeoutMs);

    const passes: Pass[] = [
      { number: 1, backendId: selector.primary, backend: this.deps.registry.resolve(selector.primary) },
    ];
    if (selector.comparison !== undefined) {
      passes.push({
        number: 2,
        backendId: selector.comparison,
        backend: this.deps.registry.resolve(selector.comparison),
      });
    }

    const engine = await this.deps.engineCache.get(this.deps.engineSourceId);

    const batchId = options.batchId ?? randomUUID();
    const context: BatchContext = {
      engine,
      seed: options.seed ?? randomUUID(),
      timeoutMs,
      reuseArtifacts: options.reuseArtifacts ?? true,
      reusable: new Map(),
    };

    const cacheBefore = this.deps.brainCache.stats();
    const accumulator = new RunStatsAccumulator({
      batchId,
      seed: context.seed,
      backends: passes.map(pass => pass.backendId),
      sourceIds: [...sourceIds],
      startedAt: new Date(this.now()),
    });

    logEvent('batchStart', {
      batchId,
      seed: context.seed,
      sources: sourceIds.length,
      backends: passes.map(pass => pass.backendId),
      timeoutMs,
    });

    run: for (const pass of passes) {
      for (const [index, sourceId] of sourceIds.entries()) {
        if (options.signal?.aborted) {
          accumulator.markCancelled();
          logWarning('batchCancelled', { batchId, attemptsRun: accumulator.attempts });
          break run;
        }

        const record = await this.runOne(pass, index, sourceId, context);
        accumulator.record(record);
      }
    }

    const stats = accumulator.finish(
      cacheDelta(cacheBefore, this.deps.brainCache.stats()),
      new Date(this.now())
    );
    this.deps.telemetry?.recordBatch(stats.totalFailure);

    logEvent('batchComplete', {
      batchId,
      attempts: stats.attempts,
      counts: stats.counts,
      cacheHitRate: stats.cacheHitRate,
      successRate: stats.successRate,
      cancelled: stats.cancelled,
    });
    if (stats.totalFailure) {
      logWarning('batchTotalFailure', { batchId, failures: stats.failures });
    }

    return stats;
  }

  private validate(
    sourceIds: readonly string[],
    selector: BackendSelector,
    timeoutMs: number
  ): void {
    const issues: string[] = [];

    if (sourceIds.length === 0) {
      issues.push('sourceIds must contain at least one source id');
    }
    if (sourceIds.length > this.maxBatchSize) {
      issues.push(
        `batch of ${sourceIds.length} sources exceeds the maximum of ${this.maxBatchSize}`
      );
    }
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      issues.push(`timeoutMs must be a positive number (got ${timeoutMs})`);
    }
    if (selector.comparison !== undefined && selector.comparison === selector.primary) {
      issues.push('comparison backend must differ from the primary backend');
    }

    if (issues.length > 0) {
      throw new ConfigurationError('Invalid batch request', issues);
    }
  }

  private async runOne(
    pass: Pass,
    index: number,
    sourceId: string,
    context: BatchContext
  ): Promise<AttemptRecord> {
    const startedAt = this.now();
    const toRecord = (outcome: AttemptOutcome): AttemptRecord => ({
      sourceId,
      backendId: pass.backendId,
      pass: pass.number,
      index,
      outcome,
    });

    let resolved: ResolvedConfig<BrainConfig>;
    try {
      resolved = await this.deps.brainCache.resolve(sourceId);
    } catch (error) {
      if (!isConfigurationError(error)) {
        throw error;
      }
      logWarning('batchSourceFailed', { sourceId, error: error.message });
      const outcome: AttemptOutcome = Object.freeze({
        status: AttemptStatus.FAILED,
        theme: null,
        elapsedMs: Math.max(0, this.now() - startedAt),
        errorKind: ErrorKind.CONFIGURATION_ERROR,
        errorMessage: error.message,
        path: [AttemptState.START, AttemptState.FAILED],
      });
      const record = toRecord(outcome);
      await this.report(record, null);
      return record;
    }

    const { config: brain, contentHash } = resolved;
    const reuseKey = `${pass.backendId}|${contentHash}`;
    const earlier = context.reuseArtifacts ? context.reusable.get(reuseKey) : undefined;
    if (earlier?.artifact) {
      const outcome: AttemptOutcome = Object.freeze({
        status: AttemptStatus.CACHE_HIT,
        artifact: earlier.artifact,
        theme: earlier.theme,
        elapsedMs: Math.max(0, this.now() - startedAt),
        path: [AttemptState.START, AttemptState.SUCCESS],
        prompt: earlier.prompt,
      });
      const record = toRecord(outcome);
      await this.report(record, brain);
      return record;
    }

    const rng = PRNG.fromHex(
      this.hashService.deriveSeed(context.seed, `${pass.backendId}|${index}|${sourceId}`)
    );
    const generated = await this.generation.run(
      brain,
      context.engine,
      pass.backend,
      context.timeoutMs,
      rng
    );
    if (generated.status === AttemptStatus.SUCCESS) {
      context.reusable.set(reuseKey, generated);
    }

    // elapsedMs includes the brain config lookup
    const outcome: AttemptOutcome = Object.freeze({
      ...generated,
      elapsedMs: Math.max(generated.elapsedMs, this.now() - startedAt),
    });
    const record = toRecord(outcome);
    await this.report(record, brain);
    return record;
  }

  /**
   * Hands an attempt to telemetry and the artifact sink. Their failures are
   * logged and never fail the attempt.
   */
  private async report(record: AttemptRecord, brain: BrainConfig | null): Promise<void> {
    const { outcome } = record;
    this.deps.telemetry?.recordOutcome(outcome);

    if (!this.deps.sink || !brain || !outcome.artifact) {
      return;
    }

    try {
      await this.deps.sink.record({
        sourceId: record.sourceId,
        backendId: record.backendId,
        intent: brain.intent,
        theme: outcome.theme,
        artifact: outcome.artifact,
        status: outcome.status,
        prompt: outcome.prompt,
        rawResponse: outcome.rawResponse,
      });
    } catch (error) {
      logFailure('artifactSink', error, {
        sourceId: record.sourceId,
        backendId: record.backendId,
        message: errorMessage(error),
      });
    }
  }
}

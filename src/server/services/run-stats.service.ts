/**
 * Run statistics accumulator, owned by one batch run and discarded after it.
 */

import {
  AttemptStatus,
  type AttemptRecord,
  type CacheStats,
  type ErrorKind,
  type FailureRecord,
  type RunStats,
} from '../types/generation.types';

export interface RunStatsInit {
  batchId: string;
  seed: string;
  backends: string[];
  sourceIds: string[];
  startedAt: Date;
}

/**
 * Difference between two cache stat readings.
 */
export function cacheDelta(before: CacheStats, after: CacheStats): CacheStats {
  return {
    hits: after.hits - before.hits,
    warmHits: after.warmHits - before.warmHits,
    misses: after.misses - before.misses,
    corruptions: after.corruptions - before.corruptions,
  };
}

function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

export class RunStatsAccumulator {
  private readonly results: AttemptRecord[] = [];
  private readonly counts: Record<AttemptStatus, number> = {
    [AttemptStatus.CACHE_HIT]: 0,
    [AttemptStatus.SUCCESS]: 0,
    [AttemptStatus.FALLBACK]: 0,
    [AttemptStatus.FAILED]: 0,
  };
  private readonly errorKinds: ErrorKind[] = [];
  private readonly failures: FailureRecord[] = [];
  private totalElapsedMs = 0;
  private cancelled = false;

  constructor(private readonly init: RunStatsInit) {}

  record(record: AttemptRecord): void {
    const { outcome } = record;
    this.results.push(record);
    this.counts[outcome.status]++;
    this.totalElapsedMs += outcome.elapsedMs;

    if (outcome.errorKind !== undefined) {
      this.errorKinds.push(outcome.errorKind);
      this.failures.push({
        sourceId: record.sourceId,
        backendId: record.backendId,
        errorKind: outcome.errorKind,
        message: outcome.errorMessage,
      });
    }
  }

  markCancelled(): void {
    this.cancelled = true;
  }

  get attempts(): number {
    return this.results.length;
  }

  finish(cache: CacheStats, finishedAt: Date): RunStats {
    const attempts = this.results.length;
    const lookups = cache.hits + cache.warmHits + cache.misses;

    return {
      batchId: this.init.batchId,
      seed: this.init.seed,
      backends: [...this.init.backends],
      sourceIds: [...this.init.sourceIds],
      attempts,
      counts: { ...this.counts },
      totalElapsedMs: this.totalElapsedMs,
      errorKinds: [...this.errorKinds],
      failures: [...this.failures],
      cache: { ...cache },
      cacheHitRate: ratio(cache.hits + cache.warmHits, lookups),
      successRate: ratio(
        this.counts[AttemptStatus.SUCCESS] + this.counts[AttemptStatus.CACHE_HIT],
        attempts
      ),
      results: [...this.results],
      cancelled: this.cancelled,
      totalFailure: attempts > 0 && this.counts[AttemptStatus.FAILED] === attempts,
      startedAt: this.init.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
    };
  }
}

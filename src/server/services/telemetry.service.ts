/**
 * Telemetry Service for Session Statistics
 *
 * Tracks, for the lifetime of the process:
 * - Attempt counters per status and per error kind
 * - Themes explored (distinct theme ids with their visit counts)
 * - Latency samples for p95 calculation (most recent 1000)
 * - Batches run and batches that ended in total failure
 *
 * Recording never throws: a telemetry failure must not fail an attempt.
 */

import {
  AttemptStatus,
  type AttemptOutcome,
  type ErrorKind,
} from '../types/generation.types';
import { logFailure } from '../utils/logger';

const MAX_P95_SAMPLES = 1000;

export interface SessionSnapshot {
  startedAt: string;
  uptimeMs: number;
  attempts: number;
  counts: Record<AttemptStatus, number>;
  errorKinds: Partial<Record<ErrorKind, number>>;
  /** Theme id → number of attempts that resolved to it */
  themesExplored: Record<string, number>;
  batches: number;
  totalFailures: number;
  p95LatencyMs: number;
  latencySamples: number;
}

function zeroCounts(): Record<AttemptStatus, number> {
  return {
    [AttemptStatus.CACHE_HIT]: 0,
    [AttemptStatus.SUCCESS]: 0,
    [AttemptStatus.FALLBACK]: 0,
    [AttemptStatus.FAILED]: 0,
  };
}

/**
 * @example
 * ```typescript
 * const telemetry = new TelemetryService();
 * telemetry.recordOutcome(outcome);
 * telemetry.recordBatch(stats.totalFailure);
 * const snapshot = telemetry.snapshot();
 * console.log(snapshot.p95LatencyMs);
 * ```
 */
export class TelemetryService {
  private readonly startedAtMs: number;
  private counts = zeroCounts();
  private errorKinds: Partial<Record<ErrorKind, number>> = {};
  private themes = new Map<string, number>();
  private latencies: number[] = [];
  private batches = 0;
  private totalFailures = 0;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAtMs = now();
  }

  /**
   * Records one attempt outcome.
   */
  recordOutcome(outcome: AttemptOutcome): void {
    try {
      this.counts[outcome.status]++;

      if (outcome.errorKind !== undefined) {
        this.errorKinds[outcome.errorKind] = (this.errorKinds[outcome.errorKind] ?? 0) + 1;
      }
      if (outcome.theme !== null) {
        this.themes.set(outcome.theme, (this.themes.get(outcome.theme) ?? 0) + 1);
      }

      this.recordLatency(outcome.elapsedMs);
    } catch (error) {
      // Telemetry failures should not crash the app
      logFailure('telemetryRecordOutcome', error, { status: outcome.status });
    }
  }

  recordBatch(totalFailure: boolean): void {
    this.batches++;
    if (totalFailure) {
      this.totalFailures++;
    }
  }

  /**
   * Keeps only the most recent samples (FIFO).
   */
  recordLatency(latencyMs: number): void {
    if (!Number.isFinite(latencyMs) || latencyMs < 0) {
      return;
    }
    this.latencies.push(latencyMs);
    if (this.latencies.length > MAX_P95_SAMPLES) {
      this.latencies.splice(0, this.latencies.length - MAX_P95_SAMPLES);
    }
  }

  /**
   * Calculates the 95th percentile from an array of latency samples.
   * Returns 0 if the samples array is empty.
   *
   * @example
   * ```typescript
   * telemetry.calculateP95([10, 20, 30, 40, 50, 60, 70, 80, 90, 100]); // 100
   * ```
   */
  calculateP95(samples: readonly number[]): number {
    if (samples.length === 0) {
      return 0;
    }

    const sorted = [...samples].sort((a, b) => a - b);
    const index = Math.ceil(sorted.length * 0.95) - 1;

    return sorted[index] ?? 0;
  }

  snapshot(): SessionSnapshot {
    const attempts = Object.values(this.counts).reduce((sum, count) => sum + count, 0);
    return {
      startedAt: new Date(this.startedAtMs).toISOString(),
      uptimeMs: Math.max(0, this.now() - this.startedAtMs),
      attempts,
      counts: { ...this.counts },
      errorKinds: { ...this.errorKinds },
      themesExplored: Object.fromEntries(this.themes),
      batches: this.batches,
      totalFailures: this.totalFailures,
      p95LatencyMs: this.calculateP95(this.latencies),
      latencySamples: this.latencies.length,
    };
  }

  reset(): void {
    this.counts = zeroCounts();
    this.errorKinds = {};
    this.themes = new Map();
    this.latencies = [];
    this.batches = 0;
    this.totalFailures = 0;
  }
}

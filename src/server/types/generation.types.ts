/**
 * TypeScript type definitions for generation attempts, backends and batch runs.
 */

/**
 * The four-field result of one generation attempt.
 *
 * @example
 * {
 *   symbol: "∞",
 *   phrase: "The dream continues beyond understanding.",
 *   color: "#7f8c8d",
 *   reasoning: "When symbols fail, the infinite persists."
 * }
 */
export interface Artifact {
  readonly symbol: string;
  readonly phrase: string;
  /** Hex color matching #rrggbb (case-insensitive) */
  readonly color: string;
  readonly reasoning: string;
}

/**
 * Classification of one attempt.
 */
export enum AttemptStatus {
  /** Artifact reused from an earlier successful attempt in the same batch */
  CACHE_HIT = 'CACHE_HIT',
  /** Backend returned a valid artifact */
  SUCCESS = 'SUCCESS',
  /** Backend failed and the fallback policy produced the artifact */
  FALLBACK = 'FALLBACK',
  /** No artifact could be produced (configuration error) */
  FAILED = 'FAILED',
}

/**
 * Why an attempt did not succeed on the backend.
 */
export enum ErrorKind {
  /** Backend exceeded its time bound */
  TIMEOUT = 'TIMEOUT',
  /** Backend failed to run at all */
  PROCESS_ERROR = 'PROCESS_ERROR',
  /** Payload failed structural or format validation */
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  /** Engine or brain configuration cannot support an attempt */
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

/**
 * States visited by a generation attempt, in order.
 */
export enum AttemptState {
  START = 'START',
  THEME_RESOLVED = 'THEME_RESOLVED',
  PROMPT_BUILT = 'PROMPT_BUILT',
  BACKEND_INVOKED = 'BACKEND_INVOKED',
  VALIDATED = 'VALIDATED',
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  TIMED_OUT = 'TIMED_OUT',
  BACKEND_ERROR = 'BACKEND_ERROR',
  SUCCESS = 'SUCCESS',
  FALLBACK = 'FALLBACK',
  FAILED = 'FAILED',
}

/**
 * Immutable record of one attempt.
 */
export interface AttemptOutcome {
  status: AttemptStatus;
  /** Absent only when status is FAILED */
  artifact?: Artifact;
  /** Resolved theme id, null when no theme matched */
  theme: string | null;
  /** Wall time of the whole attempt in milliseconds */
  elapsedMs: number;
  /** Cause of a FALLBACK or FAILED outcome */
  errorKind?: ErrorKind;
  /** Human-readable detail for errorKind */
  errorMessage?: string;
  /** States visited, START first */
  path: AttemptState[];
  /** Prompt sent to the backend (absent when the attempt failed before building it) */
  prompt?: string;
  /** Raw backend payload, when one arrived in time */
  rawResponse?: string;
}

/**
 * Error signal returned by a backend collaborator.
 */
export type BackendError =
  | { kind: ErrorKind.TIMEOUT }
  | { kind: ErrorKind.PROCESS_ERROR; message: string };

/**
 * Result of one backend invocation: raw text or an error signal.
 */
export type BackendResult =
  | { ok: true; payload: string }
  | { ok: false; error: BackendError };

export interface BackendInvokeOptions {
  timeoutMs: number;
  /** Aborted when the caller stops waiting */
  signal: AbortSignal;
}

/**
 * External text-generation service.
 */
export interface GenerationBackend {
  invoke(prompt: string, options: BackendInvokeOptions): Promise<BackendResult>;
}

/**
 * Which backend identities a batch runs against.
 * `comparison`, when set, triggers a second full pass over the same sources.
 */
export interface BackendSelector {
  primary: string;
  comparison?: string;
}

/**
 * One attempt as reported by a batch run.
 */
export interface AttemptRecord {
  sourceId: string;
  backendId: string;
  /** 1 for the primary pass, 2 for the comparison pass */
  pass: number;
  /** Position of the source in the batch (0-based) */
  index: number;
  outcome: AttemptOutcome;
}

/**
 * Failure entry listed in RunStats.
 */
export interface FailureRecord {
  sourceId: string;
  backendId: string;
  errorKind: ErrorKind;
  message?: string;
}

/**
 * Counters kept by a config cache.
 */
export interface CacheStats {
  hits: number;
  warmHits: number;
  misses: number;
  corruptions: number;
}

/**
 * Aggregate statistics of one batch run.
 */
export interface RunStats {
  batchId: string;
  /** Seed every attempt's random source was derived from */
  seed: string;
  backends: string[];
  sourceIds: string[];
  attempts: number;
  counts: Record<AttemptStatus, number>;
  totalElapsedMs: number;
  errorKinds: ErrorKind[];
  failures: FailureRecord[];
  /** Brain config cache activity during this batch */
  cache: CacheStats;
  /** (hits + warmHits) / lookups for this batch, 0 when nothing was looked up */
  cacheHitRate: number;
  /** (SUCCESS + CACHE_HIT) / attempts, 0 when nothing ran */
  successRate: number;
  results: AttemptRecord[];
  cancelled: boolean;
  /** Every attempt that ran is FAILED */
  totalFailure: boolean;
  startedAt: string;
  finishedAt: string;
}

/**
 * Data handed to the artifact persistence collaborator after each attempt.
 */
export interface ArtifactRecord {
  sourceId: string;
  backendId: string;
  intent: string;
  theme: string | null;
  artifact: Artifact;
  status: AttemptStatus;
  prompt?: string;
  rawResponse?: string;
}

/**
 * Artifact persistence collaborator.
 */
export interface ArtifactSink {
  record(entry: ArtifactRecord): Promise<void>;
}

/**
 * TypeScript type definitions shared by the API endpoints.
 */

import type { BackendRegistry } from '../services/backend.service';
import type { BatchService } from '../services/batch.service';
import type { ConfigCache } from '../services/config-cache.service';
import type { ConfigSource } from '../services/config-source.service';
import type { GenerationService } from '../services/generation.service';
import type { HashService } from '../services/hash.service';
import type { TelemetryService } from '../services/telemetry.service';
import type { BrainConfig, EngineConfig } from './engine.types';
import type { ArtifactSink } from './generation.types';

/**
 * The part of an Express request the endpoints read.
 */
export interface ApiRequest {
  method: string;
  path: string;
  body?: unknown;
}

/**
 * Services the endpoints are built from. Created once in index.ts.
 */
export interface ApiServices {
  engineCache: ConfigCache<EngineConfig>;
  engineSourceId: string;
  brainCache: ConfigCache<BrainConfig>;
  brainSource: ConfigSource;
  registry: BackendRegistry;
  generation: GenerationService;
  batch: BatchService;
  hashService: HashService;
  telemetry: TelemetryService;
  sink?: ArtifactSink;
  defaults: {
    /** Backend used when a request names none */
    backend: string;
    timeoutMs: number;
  };
}

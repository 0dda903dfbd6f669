/**
 * Shared test fixtures: a small engine configuration, in-memory config
 * sources and stores, and scripted backends. Nothing here touches the
 * network or spawns a process.
 */

import { vi } from 'vitest';
import { BackendRegistry } from '../src/server/services/backend.service';
import { BatchService } from '../src/server/services/batch.service';
import { ConfigCache } from '../src/server/services/config-cache.service';
import type { ConfigSource } from '../src/server/services/config-source.service';
import { GenerationService } from '../src/server/services/generation.service';
import { HashService } from '../src/server/services/hash.service';
import type { PersistedStore } from '../src/server/services/persisted-store.service';
import type { RandomSource } from '../src/server/services/prng.service';
import { TelemetryService } from '../src/server/services/telemetry.service';
import type { ApiServices } from '../src/server/types/api.types';
import type { EngineConfig } from '../src/server/types/engine.types';
import {
  ErrorKind,
  type Artifact,
  type ArtifactRecord,
  type ArtifactSink,
  type BackendInvokeOptions,
  type BackendResult,
  type GenerationBackend,
} from '../src/server/types/generation.types';
import { ConfigurationError } from '../src/server/utils/errors';
import {
  brainConfigParser,
  engineConfigParser,
} from '../src/server/validation/config.validation';
import type { JsonResponse } from '../src/server/utils/response.formatter';

/**
 * Always draws the first candidate.
 */
export const firstChoice: RandomSource = { nextFloat: () => 0 };

/**
 * Engine configuration used across tests. Returns a fresh object each call.
 */
export function engineFixture(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    version: 'test-v1',
    model: 'stub-a',
    themes: [
      {
        id: 'wisdom',
        keywords: ['wisdom', 'ancient', 'knowledge'],
        symbolPools: ['ancient', 'sacred'],
        colorPools: ['mystical'],
      },
      {
        id: 'elemental',
        keywords: ['fire', 'water', 'storm'],
        symbolPools: ['elemental'],
        colorPools: ['fire'],
      },
      {
        id: 'harmony',
        keywords: ['peace', 'harmony', 'flow'],
        symbolPools: ['flow'],
        colorPools: ['water'],
      },
    ],
    pools: {
      symbols: {
        ancient: ['☥', 'ᚱ'],
        sacred: ['✧'],
        elemental: ['🜂', '🜄'],
        flow: ['≋'],
      },
      colors: {
        mystical: ['#6c3483', '#8e44ad'],
        fire: ['#e74c3c'],
        water: ['#1abc9c'],
      },
      fallbackSymbols: ['∞', '◊'],
      fallbackColor: '#7f8c8d',
    },
    fallbackTemplates: [
      { phrase: 'Default phrase.', reasoning: 'Default reasoning.' },
      { phrase: 'Wisdom phrase.', reasoning: 'Wisdom reasoning.', themes: ['wisdom'] },
    ],
    prompts: {
      base: 'Intent: {intent}\nStyle: {style}',
      variations: [],
    },
    ...overrides,
  };
}

export function artifactPayload(artifact: Partial<Artifact> = {}): string {
  return JSON.stringify({
    symbol: '✺',
    phrase: 'Light gathers at the edge.',
    color: '#123abc',
    reasoning: 'The star marks the intent.',
    ...artifact,
  });
}

/**
 * ConfigSource backed by a Map of source id to file text.
 */
export class MemoryConfigSource implements ConfigSource {
  private readonly files = new Map<string, string>();
  reads = 0;

  constructor(files: Record<string, string> = {}) {
    for (const [id, text] of Object.entries(files)) {
      this.files.set(id, text);
    }
  }

  set(sourceId: string, text: string): void {
    this.files.set(sourceId, text);
  }

  async read(sourceId: string): Promise<Buffer> {
    this.reads++;
    const text = this.files.get(sourceId);
    if (text === undefined) {
      throw new ConfigurationError(`Configuration source "${sourceId}" not found`);
    }
    return Buffer.from(text, 'utf8');
  }

  async list(): Promise<string[]> {
    return [...this.files.keys()].sort();
  }
}

/**
 * PersistedStore backed by a Map.
 */
export class MemoryPersistedStore implements PersistedStore {
  readonly entries = new Map<string, string>();
  failWrites = false;

  async read(contentHash: string): Promise<string | null> {
    return this.entries.get(contentHash) ?? null;
  }

  async write(contentHash: string, serialized: string): Promise<void> {
    if (this.failWrites) {
      throw new Error('disk full');
    }
    this.entries.set(contentHash, serialized);
  }
}

type Responder = (
  prompt: string,
  options: BackendInvokeOptions
) => BackendResult | Promise<BackendResult>;

/**
 * Backend whose answers are scripted by a responder function. Records every
 * prompt it receives.
 */
export class StubBackend implements GenerationBackend {
  readonly prompts: string[] = [];

  constructor(private readonly respond: Responder) {}

  async invoke(prompt: string, options: BackendInvokeOptions): Promise<BackendResult> {
    this.prompts.push(prompt);
    return this.respond(prompt, options);
  }

  get calls(): number {
    return this.prompts.length;
  }
}

export function succeedingBackend(payload: string = artifactPayload()): StubBackend {
  return new StubBackend(() => ({ ok: true, payload }));
}

export function failingBackend(message: string = 'stub backend failure'): StubBackend {
  return new StubBackend(() => ({
    ok: false,
    error: { kind: ErrorKind.PROCESS_ERROR, message },
  }));
}

/**
 * Answers only after the caller has aborted, so the attempt's timer always
 * wins the race.
 */
export function lateAnswer(payload: string = artifactPayload()): Responder {
  return (_prompt, { signal }) =>
    new Promise<BackendResult>(resolve => {
      signal.addEventListener('abort', () => {
        setTimeout(() => resolve({ ok: true, payload }), 5);
      });
    });
}

export function hangingBackend(): StubBackend {
  return new StubBackend(lateAnswer());
}

export function brainJson(intent: string, style: string = 'calm'): string {
  return JSON.stringify({ intent, style });
}

/**
 * Records what an endpoint sends. Status defaults to 200 like Express.
 */
export class FakeResponse implements JsonResponse {
  statusCode = 200;
  body: unknown = undefined;

  readonly status = vi.fn((code: number): FakeResponse => {
    this.statusCode = code;
    return this;
  });

  readonly json = vi.fn((body: unknown): FakeResponse => {
    this.body = body;
    return this;
  });
}

/**
 * ArtifactSink that keeps every record. The callback runs after the record
 * is kept; throwing from it makes the sink fail.
 */
export class RecordingSink implements ArtifactSink {
  readonly entries: ArtifactRecord[] = [];

  constructor(private readonly onRecord: (entry: ArtifactRecord) => void = () => {}) {}

  async record(entry: ArtifactRecord): Promise<void> {
    this.entries.push(entry);
    this.onRecord(entry);
  }
}

export interface TestServiceOptions {
  backends?: Record<string, GenerationBackend>;
  engineSource?: ConfigSource;
  sink?: ArtifactSink;
  maxBatchSize?: number;
}

/**
 * API services over three brain sources (brain_ok, brain_peace and the
 * malformed brain_broken) and, by default, a succeeding "stub-a" and a
 * failing "stub-b" backend.
 */
export function createTestServices(options: TestServiceOptions = {}): ApiServices {
  const backends = options.backends ?? { 'stub-a': succeedingBackend(), 'stub-b': failingBackend() };
  const registry = new BackendRegistry();
  for (const [id, backend] of Object.entries(backends)) {
    registry.register(id, backend);
  }

  const brainSource = new MemoryConfigSource({
    brain_ok: brainJson('Seek ancient wisdom'),
    brain_peace: brainJson('Find peace'),
    brain_broken: '{not json',
  });
  const engineSource =
    options.engineSource ?? new MemoryConfigSource({ engine: JSON.stringify(engineFixture()) });

  const brainCache = new ConfigCache(brainSource, brainConfigParser, { name: 'brain' });
  const engineCache = new ConfigCache(engineSource, engineConfigParser, { name: 'engine' });
  const telemetry = new TelemetryService();
  const generation = new GenerationService();
  const hashService = new HashService();

  return {
    engineCache,
    engineSourceId: 'engine',
    brainCache,
    brainSource,
    registry,
    generation,
    batch: new BatchService({
      brainCache,
      engineCache,
      engineSourceId: 'engine',
      registry,
      generation,
      hashService,
      telemetry,
      sink: options.sink,
      maxBatchSize: options.maxBatchSize,
    }),
    hashService,
    telemetry,
    sink: options.sink,
    defaults: { backend: registry.list()[0] ?? 'stub-a', timeoutMs: 1000 },
  };
}

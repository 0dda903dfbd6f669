// Load environment variables from .env file
import dotenv from 'dotenv';
dotenv.config();

import type { Server } from 'http';
import { createClient } from 'redis';
import { createApp } from './app';
import { loadRuntimeConfig, type RuntimeConfig } from './config/runtime.config';
import { ArtifactWriterService } from './services/artifact-writer.service';
import { BackendRegistry } from './services/backend.service';
import { BatchService } from './services/batch.service';
import { ConceptService } from './services/concept.service';
import { ConfigCache } from './services/config-cache.service';
import { FileConfigSource } from './services/config-source.service';
import { GenerationService } from './services/generation.service';
import { HashService } from './services/hash.service';
import { FilePersistedStore, type PersistedStore } from './services/persisted-store.service';
import { RedisPersistedStore, redisClientOptions } from './services/redis-store.service';
import { TelemetryService } from './services/telemetry.service';
import type { ApiServices } from './types/api.types';
import { brainConfigParser, engineConfigParser } from './validation/config.validation';
import { errorMessage, isConfigurationError } from './utils/errors';
import { logEvent, logFailure, setDebugEnabled } from './utils/logger';

let config: RuntimeConfig;
try {
  config = loadRuntimeConfig();
  setDebugEnabled(config.debug);
  // eslint-disable-next-line no-console
  console.log('✓ Environment variable validation passed');
} catch (error) {
  // eslint-disable-next-line no-console
  console.error('✗ Configuration error:', errorMessage(error));
  // eslint-disable-next-line no-console
  console.error('Server cannot start without required configuration.');
  process.exit(1);
}

async function createStore(runtime: RuntimeConfig): Promise<PersistedStore> {
  if (runtime.cacheBackend === 'file' || !runtime.redisUrl) {
    return new FilePersistedStore(runtime.cacheDir);
  }

  const client = createClient(redisClientOptions(runtime.redisUrl));
  client.on('error', error => {
    logFailure('redisClient', error, { url: runtime.redisUrl });
  });
  await client.connect();

  return new RedisPersistedStore({
    get: key => client.get(key),
    set: (key, value, ttlSeconds) => client.set(key, value, { EX: ttlSeconds }),
  });
}

async function createServices(runtime: RuntimeConfig): Promise<ApiServices> {
  const hashService = new HashService();
  const store = await createStore(runtime);

  const brainSource = new FileConfigSource(runtime.brainDir);
  const brainCache = new ConfigCache(brainSource, brainConfigParser, {
    name: 'brain',
    store,
    hashService,
  });

  const engineFile = FileConfigSource.forFile(runtime.engineConfigPath);
  const engineCache = new ConfigCache(engineFile.source, engineConfigParser, {
    name: 'engine',
    store,
    hashService,
  });

  // Fail at startup, not on the first request
  const engine = await engineCache.get(engineFile.sourceId);

  const registry = BackendRegistry.forModels(runtime.models, { bin: runtime.ollamaBin });
  const sink = new ArtifactWriterService(
    runtime.outputDir,
    ConceptService.fromFile(runtime.conceptsPath)
  );
  const telemetry = new TelemetryService();
  const generation = new GenerationService();
  const batch = new BatchService({
    brainCache,
    engineCache,
    engineSourceId: engineFile.sourceId,
    registry,
    maxBatchSize: runtime.maxBatchSize,
    generation,
    hashService,
    sink,
    telemetry,
  });

  logEvent('servicesReady', {
    engineVersion: engine.version,
    themes: engine.themes.length,
    backends: registry.list(),
    cacheBackend: runtime.cacheBackend,
  });

  return {
    engineCache,
    engineSourceId: engineFile.sourceId,
    brainCache,
    brainSource,
    registry,
    generation,
    batch,
    hashService,
    telemetry,
    sink,
    defaults: {
      backend: runtime.models[0] ?? engine.model,
      timeoutMs: runtime.generationTimeoutMs,
    },
  };
}

// Create and start the server
async function startServer(runtime: RuntimeConfig): Promise<Server> {
  const services = await createServices(runtime);
  const app = createApp(services);

  return new Promise(resolve => {
    const server = app.listen(runtime.port, () => {
      // eslint-disable-next-line no-console
      console.log(`Server listening on port ${runtime.port}`);
      resolve(server);
    });
  });
}

const serverPromise = startServer(config);

serverPromise.catch(error => {
  if (isConfigurationError(error)) {
    // eslint-disable-next-line no-console
    console.error('✗ Configuration error:', error.message);
  } else {
    logFailure('startServer', error);
  }
  process.exit(1);
});

export default serverPromise;

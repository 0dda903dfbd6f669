/**
 * Runtime configuration from environment variables.
 *
 * Every variable has a default except REDIS_URL, which is required only with
 * CACHE_BACKEND=redis. All problems are collected and reported together in one
 * ConfigurationError. Relative paths resolve against the working directory.
 */

import path from 'path';
import { ConfigurationError } from '../utils/errors';

export type CacheBackendKind = 'file' | 'redis';

export interface RuntimeConfig {
  port: number;
  engineConfigPath: string;
  conceptsPath: string;
  brainDir: string;
  outputDir: string;
  cacheBackend: CacheBackendKind;
  cacheDir: string;
  redisUrl?: string;
  ollamaBin: string;
  /** Backend identities; the first is the default */
  models: string[];
  generationTimeoutMs: number;
  maxBatchSize: number;
  debug: boolean;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function readPositiveInt(env: Env, name: string, fallback: number, issues: string[]): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    issues.push(`${name} must be a positive integer (got "${raw}")`);
    return fallback;
  }
  return Number(raw);
}

function resolvePath(cwd: string, value: string): string {
  return path.resolve(cwd, value);
}

/**
 * @throws {ConfigurationError} Listing every invalid variable
 *
 * @example
 * ```typescript
 * const config = loadRuntimeConfig({ MODELS: 'qwen3:1.7b,llama3.2:3b', PORT: '8080' });
 * config.models; // ['qwen3:1.7b', 'llama3.2:3b']
 * ```
 */
export function loadRuntimeConfig(
  env: Env = process.env,
  cwd: string = process.cwd()
): RuntimeConfig {
  const issues: string[] = [];

  const port = readPositiveInt(env, 'PORT', 3000, issues);
  if (port > 65535) {
    issues.push(`PORT must be at most 65535 (got ${port})`);
  }

  const cacheBackendRaw = readString(env, 'CACHE_BACKEND', 'file');
  let cacheBackend: CacheBackendKind = 'file';
  if (cacheBackendRaw === 'file' || cacheBackendRaw === 'redis') {
    cacheBackend = cacheBackendRaw;
  } else {
    issues.push(`CACHE_BACKEND must be "file" or "redis" (got "${cacheBackendRaw}")`);
  }

  const redisUrl = env.REDIS_URL?.trim() || undefined;
  if (cacheBackend === 'redis' && !redisUrl) {
    issues.push('REDIS_URL is required when CACHE_BACKEND=redis');
  }

  const models = readString(env, 'MODELS', 'qwen3:1.7b')
    .split(',')
    .map(model => model.trim())
    .filter(model => model.length > 0);
  if (models.length === 0) {
    issues.push('MODELS must name at least one model');
  }

  const generationTimeoutMs = readPositiveInt(env, 'GENERATION_TIMEOUT_MS', 60_000, issues);
  const maxBatchSize = readPositiveInt(env, 'MAX_BATCH_SIZE', 20, issues);

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid environment configuration', issues);
  }

  return {
    port,
    engineConfigPath: resolvePath(cwd, readString(env, 'ENGINE_CONFIG_PATH', 'data/engine.config.json')),
    conceptsPath: resolvePath(cwd, readString(env, 'CONCEPTS_PATH', 'data/concepts.json')),
    brainDir: resolvePath(cwd, readString(env, 'BRAIN_DIR', 'brains')),
    outputDir: resolvePath(cwd, readString(env, 'OUTPUT_DIR', 'output')),
    cacheBackend,
    cacheDir: resolvePath(cwd, readString(env, 'CACHE_DIR', '.cache/configs')),
    redisUrl,
    ollamaBin: readString(env, 'OLLAMA_BIN', 'ollama'),
    models,
    generationTimeoutMs,
    maxBatchSize,
    debug: env.DEBUG_GENERATION === 'true',
  };
}

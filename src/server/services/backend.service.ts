/**
 * Backend Service - text-generation backends and their registry
 *
 * A backend identity is a model name ("qwen3:1.7b"). OllamaCliBackend runs
 * `<bin> run <model> <prompt>` as a child process and reports the outcome as
 * a BackendResult; it never throws for process trouble.
 */

import { spawn } from 'child_process';
import type { Readable } from 'stream';
import {
  ErrorKind,
  type BackendInvokeOptions,
  type BackendResult,
  type GenerationBackend,
} from '../types/generation.types';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { logDebug } from '../utils/logger';

export type ProcessResult =
  | { kind: 'exited'; code: number; stdout: string; stderr: string }
  | { kind: 'timedOut' }
  | { kind: 'spawnFailed'; message: string };

/**
 * Runs a command to completion, killing it on timeout or abort.
 */
export type ProcessRunner = (
  command: string,
  args: string[],
  options: BackendInvokeOptions
) => Promise<ProcessResult>;

/**
 * The parts of a spawned child the runner uses.
 */
export interface ChildHandle {
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal: NodeJS.Signals): boolean;
  on(event: 'error', listener: (error: Error) => void): this;
  on(event: 'close', listener: (code: number | null) => void): this;
}

export type SpawnChild = (command: string, args: string[]) => ChildHandle;

/** Time a child gets to exit after SIGTERM before it is sent SIGKILL */
export const KILL_GRACE_MS = 2000;

const spawnPiped: SpawnChild = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

export function createProcessRunner(
  spawnChild: SpawnChild = spawnPiped,
  killGraceMs: number = KILL_GRACE_MS
): ProcessRunner {
  return (command, args, { timeoutMs, signal }) =>
    new Promise<ProcessResult>(resolve => {
      let stdout = '';
      let stderr = '';
      let killed = false;
      let settled = false;
      let escalation: NodeJS.Timeout | undefined;

      let child: ChildHandle;
      try {
        child = spawnChild(command, args);
      } catch (error) {
        resolve({ kind: 'spawnFailed', message: errorMessage(error) });
        return;
      }

      const finish = (result: ProcessResult): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        clearTimeout(escalation);
        signal.removeEventListener('abort', kill);
        resolve(result);
      };

      function kill(): void {
        if (killed) {
          return;
        }
        killed = true;
        escalation = setTimeout(() => {
          if (!settled) {
            child.kill('SIGKILL');
            finish({ kind: 'timedOut' });
          }
        }, killGraceMs);
        child.kill('SIGTERM');
      }

      child.stdout.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.setEncoding('utf8');
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', error => finish({ kind: 'spawnFailed', message: error.message }));
      child.on('close', code =>
        finish(
          killed
            ? { kind: 'timedOut' }
            : { kind: 'exited', code: code ?? -1, stdout, stderr }
        )
      );

      const timer = setTimeout(kill, timeoutMs);

      if (signal.aborted) {
        kill();
      } else {
        signal.addEventListener('abort', kill, { once: true });
      }
    });
}

export const spawnProcess: ProcessRunner = createProcessRunner();

export interface OllamaCliBackendOptions {
  /** Executable, default "ollama" */
  bin?: string;
  runner?: ProcessRunner;
}

/**
 * @example
 * ```typescript
 * const backend = new OllamaCliBackend('qwen3:1.7b');
 * const result = await backend.invoke(prompt, { timeoutMs: 60_000, signal });
 * if (result.ok) console.log(result.payload);
 * ```
 */
export class OllamaCliBackend implements GenerationBackend {
  private readonly bin: string;
  private readonly runner: ProcessRunner;

  constructor(
    readonly model: string,
    options: OllamaCliBackendOptions = {}
  ) {
    this.bin = options.bin ?? 'ollama';
    this.runner = options.runner ?? spawnProcess;
  }

  async invoke(prompt: string, options: BackendInvokeOptions): Promise<BackendResult> {
    const result = await this.runner(this.bin, ['run', this.model, prompt], options);

    logDebug('backendInvoke', () => ({
      model: this.model,
      result: result.kind,
      exitCode: result.kind === 'exited' ? result.code : undefined,
    }));

    switch (result.kind) {
      case 'timedOut':
        return { ok: false, error: { kind: ErrorKind.TIMEOUT } };
      case 'spawnFailed':
        return {
          ok: false,
          error: {
            kind: ErrorKind.PROCESS_ERROR,
            message: `failed to start ${this.bin}: ${result.message}`,
          },
        };
      case 'exited':
        if (result.code !== 0) {
          const detail = result.stderr.trim();
          return {
            ok: false,
            error: {
              kind: ErrorKind.PROCESS_ERROR,
              message: `${this.bin} exited with code ${result.code}${detail ? `: ${detail}` : ''}`,
            },
          };
        }
        return { ok: true, payload: result.stdout.trim() };
    }
  }
}

/**
 * Backend identities known to the process.
 */
export class BackendRegistry {
  private readonly backends = new Map<string, GenerationBackend>();

  register(id: string, backend: GenerationBackend): this {
    if (id.trim().length === 0) {
      throw new ConfigurationError('Invalid backend identity', ['id must be non-empty']);
    }
    this.backends.set(id, backend);
    return this;
  }

  has(id: string): boolean {
    return this.backends.has(id);
  }

  /**
   * @throws {ConfigurationError} If no backend is registered under the id
   */
  resolve(id: string): GenerationBackend {
    const backend = this.backends.get(id);
    if (!backend) {
      throw new ConfigurationError(`Unknown backend "${id}"`, [
        `available backends: ${this.list().join(', ') || '(none)'}`,
      ]);
    }
    return backend;
  }

  list(): string[] {
    return [...this.backends.keys()];
  }

  /**
   * One OllamaCliBackend per model name.
   */
  static forModels(models: readonly string[], options: OllamaCliBackendOptions = {}): BackendRegistry {
    const registry = new BackendRegistry();
    for (const model of models) {
      registry.register(model, new OllamaCliBackend(model, options));
    }
    return registry;
  }
}

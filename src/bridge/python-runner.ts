/**
 * Python Runtime Process Manager
 *
 * Manages the lifecycle of the Python mlx-lm runtime process:
 * - Spawns python/runtime.py and waits for its readiness probe
 * - Exposes the JSON-RPC transport once ready
 * - Graceful shutdown with a SIGKILL fallback
 *
 * There is no restart logic: a runtime that dies takes the current
 * benchmark worker with it, which is what the harness isolates.
 *
 * The runtime answers requests in order, so while one is in flight a
 * `shutdown` request would queue behind it. `stop()` then goes straight
 * to signals.
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { isAbsolute, join } from 'node:path';
import type { Logger } from 'pino';
import { JsonRpcTransport } from './jsonrpc-transport.js';
import { RuntimeInfoResponseSchema, ShutdownResponseSchema, type RuntimeInfoResponse } from './serializers.js';
import { getConfig, findPackageRoot } from '../config/loader.js';
import { BenchError } from '../api/errors.js';

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => ChildProcess;

export interface PythonRunnerOptions {
  /**
   * Path to Python executable (defaults to config python_runtime.python_path)
   */
  pythonPath?: string;

  /**
   * Path to runtime.py script
   */
  runtimePath?: string;

  /**
   * Timeout for process startup, including the readiness probe (ms)
   */
  startupTimeout?: number;

  /**
   * Time allowed for a graceful exit before SIGKILL (ms)
   */
  shutdownTimeout?: number;

  /**
   * Default JSON-RPC request timeout (ms)
   */
  requestTimeout?: number;

  logger?: Logger;

  /**
   * Process factory, replaced in tests
   */
  spawnProcess?: SpawnFunction;
}

export type RuntimeStatus = 'stopped' | 'starting' | 'ready' | 'error';

/**
 * Resolve a configured path against the package root unless it is a bare
 * command name (looked up on PATH) or already absolute.
 */
function resolveFromPackageRoot(path: string, bareCommandAllowed: boolean): string {
  if (isAbsolute(path)) {
    return path;
  }
  if (bareCommandAllowed && !path.includes('/') && !path.includes('\\')) {
    return path;
  }
  return join(findPackageRoot(), path);
}

export class PythonRunner {
  private child: ChildProcess | null = null;
  private transport: JsonRpcTransport | null = null;
  private status: RuntimeStatus = 'stopped';
  private stopping: Promise<void> | null = null;
  private readonly pythonPath: string;
  private readonly runtimePath: string;
  private readonly startupTimeout: number;
  private readonly shutdownTimeout: number;
  private readonly requestTimeout: number;
  private readonly logger?: Logger;
  private readonly spawnProcess: SpawnFunction;

  constructor(options: PythonRunnerOptions = {}) {
    const config = getConfig();

    this.pythonPath =
      options.pythonPath ?? resolveFromPackageRoot(config.python_runtime.python_path, true);
    this.runtimePath =
      options.runtimePath ?? resolveFromPackageRoot(config.python_runtime.runtime_path, false);
    this.startupTimeout = options.startupTimeout ?? config.python_runtime.startup_timeout_ms;
    this.shutdownTimeout = options.shutdownTimeout ?? config.python_runtime.shutdown_timeout_ms;
    this.requestTimeout = options.requestTimeout ?? config.python_runtime.request_timeout_ms;
    this.logger = options.logger;
    this.spawnProcess = options.spawnProcess ?? spawn;
  }

  /**
   * Start the Python runtime process and wait until it answers
   * `runtime/info`.
   */
  public async start(): Promise<RuntimeInfoResponse> {
    if (this.child !== null || this.status === 'starting') {
      throw new BenchError('RuntimeError', 'Python runtime is already running or starting');
    }

    this.status = 'starting';

    const child = this.spawnProcess(this.pythonPath, [this.runtimePath], {
      stdio: ['pipe', 'pipe', 'pipe'],
      env: {
        ...process.env,
        PYTHONUNBUFFERED: '1', // Disable Python output buffering
      },
    });
    this.child = child;

    const failedToStart = new Promise<never>((_, reject) => {
      child.once('error', (err) => {
        reject(
          new BenchError('BackendUnavailable', `Failed to spawn ${this.pythonPath}: ${err.message}`, {
            pythonPath: this.pythonPath,
          })
        );
      });
      child.once('exit', (code) => {
        reject(
          new BenchError('BackendUnavailable', `Python runtime exited during startup (code ${code})`, {
            exitCode: code,
          })
        );
      });
    });

    child.on('error', (err) => {
      this.logger?.error({ err }, 'Python runtime process error');
    });

    child.once('exit', (code, signal) => {
      this.logger?.info({ code, signal }, 'Python runtime exited');
      this.transport?.close();
      this.transport = null;
      this.child = null;
      this.status = 'stopped';
    });

    if (!child.stdin || !child.stdout) {
      await this.stop();
      this.status = 'error';
      throw new BenchError('BackendUnavailable', 'Python runtime has no stdio pipes');
    }

    this.logger?.info({ pid: child.pid, runtimePath: this.runtimePath }, 'Python runtime process spawned');

    const transport = new JsonRpcTransport({
      stdin: child.stdin,
      stdout: child.stdout,
      stderr: child.stderr ?? undefined,
      logger: this.logger,
      defaultTimeout: this.requestTimeout,
    });
    this.transport = transport;

    try {
      const info = await Promise.race([
        transport.request('runtime/info', undefined, RuntimeInfoResponseSchema, {
          timeout: this.startupTimeout,
        }),
        failedToStart,
      ]);

      this.status = 'ready';
      this.logger?.info({ runtimeInfo: info }, 'Python runtime is ready');
      return info;
    } catch (error) {
      await this.stop();
      this.status = 'error';

      if (error instanceof BenchError && error.code === 'BackendUnavailable') {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new BenchError('BackendUnavailable', `Python runtime failed to start: ${message}`);
    }
  }

  /**
   * Get transport instance (for making JSON-RPC requests)
   */
  public getTransport(): JsonRpcTransport | null {
    return this.status === 'ready' ? this.transport : null;
  }

  public getStatus(): RuntimeStatus {
    return this.status;
  }

  /**
   * Stop the runtime: ask politely when it is idle, then SIGTERM, then
   * SIGKILL after the shutdown timeout. Concurrent calls share one stop.
   */
  public stop(): Promise<void> {
    if (this.stopping === null) {
      this.stopping = this.terminate().finally(() => {
        this.stopping = null;
      });
    }
    return this.stopping;
  }

  private async terminate(): Promise<void> {
    const child = this.child;
    if (child === null) {
      return;
    }

    this.logger?.debug('Stopping Python runtime...');

    const transport = this.transport;
    const pending = transport?.pendingCount() ?? 0;
    if (pending > 0) {
      this.logger?.warn({ pending }, 'Python runtime is busy; terminating without a shutdown request');
    } else if (this.status === 'ready' && transport?.isReady()) {
      try {
        await transport.request('shutdown', undefined, ShutdownResponseSchema, {
          timeout: this.shutdownTimeout,
        });
      } catch (error) {
        this.logger?.debug({ error }, 'Shutdown request failed; falling back to signals');
      }
    }

    await new Promise<void>((resolve) => {
      // No pid means the spawn itself failed and there is nothing to reap
      if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) {
        resolve();
        return;
      }

      const timeout = setTimeout(() => {
        this.logger?.warn('Force killing Python process');
        child.kill('SIGKILL');
        resolve();
      }, this.shutdownTimeout);

      child.once('exit', () => {
        clearTimeout(timeout);
        resolve();
      });

      child.kill('SIGTERM');
    });

    transport?.close();
    this.transport = null;
    this.child = null;
    this.status = 'stopped';
  }
}

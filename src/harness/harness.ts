/**
 * Benchmark Harness
 *
 * Runs the worker in a child process and decides where the metrics of an
 * invocation come from:
 * - exit 0 with a valid document: `real`
 * - anything else: `synthetic` via the fallback strategy, or a fatal
 *   WorkerFailure in strict mode
 *
 * The worker is never retried. A timeout or an abort kills it (SIGTERM,
 * then SIGKILL after the grace period) and counts as a failure.
 */

import { EventEmitter } from 'eventemitter3';
import { execa } from 'execa';
import type { Logger } from 'pino';
import type { BenchmarkConfig, HarnessOutcome, WorkerParams, WorkerResult } from '../types/benchmark.js';
import { BenchmarkConfigSchema } from '../types/schemas/benchmark.js';
import { BenchError, zodErrorToBenchError } from '../api/errors.js';
import { getConfig } from '../config/loader.js';
import { decodeWorkerResult } from './worker-protocol.js';
import { SyntheticFallbackGenerator, type FallbackStrategy } from './synthetic-fallback.js';
import { buildWorkerCommand, type WorkerCommand } from './worker-launcher.js';

export interface BenchmarkHarnessOptions {
  logger?: Logger;
  fallback?: FallbackStrategy;
  /** Hard limit on the worker process (ms); defaults to harness.worker_timeout_ms */
  workerTimeoutMs?: number;
  /** SIGTERM to SIGKILL delay (ms); defaults to harness.kill_grace_ms */
  killGraceMs?: number;
  /** Override how the worker is launched */
  buildCommand?: (params: WorkerParams) => WorkerCommand;
}

export interface HarnessRunOptions {
  signal?: AbortSignal;
}

export type HarnessEvents = {
  spawn: (command: WorkerCommand) => void;
  fallback: (error: BenchError) => void;
};

/** Keep failure details readable in logs */
const STDERR_TAIL_CHARS = 2000;

export class BenchmarkHarness extends EventEmitter<HarnessEvents> {
  private readonly logger?: Logger;
  private readonly fallback: FallbackStrategy;
  private readonly workerTimeoutMs: number;
  private readonly killGraceMs: number;
  private readonly buildCommand: (params: WorkerParams) => WorkerCommand;

  constructor(options: BenchmarkHarnessOptions = {}) {
    super();
    const config = getConfig();

    this.logger = options.logger;
    this.fallback = options.fallback ?? new SyntheticFallbackGenerator();
    this.workerTimeoutMs = options.workerTimeoutMs ?? config.harness.worker_timeout_ms;
    this.killGraceMs = options.killGraceMs ?? config.harness.kill_grace_ms;
    this.buildCommand = options.buildCommand ?? ((params) => buildWorkerCommand(params));
  }

  /**
   * Validate `config`, run the worker and return the metrics to persist.
   *
   * @throws BenchError `UsageError` before anything is spawned when the
   *   config is invalid; `WorkerFailure` in strict mode; `Cancelled` when
   *   `signal` aborts
   */
  public async run(config: BenchmarkConfig, options: HarnessRunOptions = {}): Promise<HarnessOutcome> {
    const validated = BenchmarkConfigSchema.safeParse(config);
    if (!validated.success) {
      throw zodErrorToBenchError(validated.error, 'UsageError');
    }
    const { model, prompt, runs, maxTokens, temperature, strict } = validated.data;

    try {
      const result = await this.runWorker({ model, prompt, runs, maxTokens, temperature }, options.signal);
      if (result.estimationFailures !== undefined && result.estimationFailures > 0) {
        this.logger?.warn(
          { estimationFailures: result.estimationFailures, runs },
          'Tokenizer failed for some runs; their new-token estimate is 0'
        );
      }
      return { mode: 'real', loadSeconds: result.loadSeconds, rows: result.rows };
    } catch (error) {
      if (!(error instanceof BenchError) || error.code !== 'WorkerFailure' || strict) {
        throw error;
      }

      // The worker's own stderr (pino JSON) only goes out at debug level
      this.logger?.warn(
        { error: { code: error.code, message: error.message }, fallback: this.fallback.name },
        'Worker failed; using fallback'
      );
      this.logger?.debug({ details: error.details }, 'Worker failure details');
      this.emit('fallback', error);
      const fallback = this.fallback.generate(runs, maxTokens);
      return { mode: 'synthetic', loadSeconds: fallback.loadSeconds, rows: fallback.rows };
    }
  }

  /**
   * Spawn the worker and decode its document.
   *
   * @throws BenchError `WorkerFailure` for every outcome but a clean exit
   *   with a valid document, `Cancelled` when `signal` aborted
   */
  private async runWorker(params: WorkerParams, signal?: AbortSignal): Promise<WorkerResult> {
    if (signal?.aborted) {
      throw new BenchError('Cancelled', 'Benchmark cancelled before the worker started');
    }

    const command = this.buildCommand(params);
    this.logger?.debug({ file: command.file, args: command.args }, 'Spawning worker');
    this.emit('spawn', command);

    const result = await execa(command.file, command.args, {
      reject: false,
      stdin: 'ignore',
      timeout: this.workerTimeoutMs,
      killSignal: 'SIGTERM',
      forceKillAfterTimeout: this.killGraceMs,
      signal,
    });

    if (signal?.aborted || result.isCanceled) {
      throw new BenchError('Cancelled', 'Benchmark cancelled; worker terminated');
    }

    const stderrTail = result.stderr.slice(-STDERR_TAIL_CHARS);

    if (result.timedOut) {
      throw new BenchError('WorkerFailure', `Worker timed out after ${this.workerTimeoutMs}ms`, {
        timeoutMs: this.workerTimeoutMs,
        stderr: stderrTail,
      });
    }

    if (result.failed || result.exitCode !== 0) {
      throw new BenchError('WorkerFailure', `Worker exited with code ${String(result.exitCode)}`, {
        exitCode: result.exitCode,
        signal: result.signal,
        stderr: stderrTail,
      });
    }

    try {
      return decodeWorkerResult(result.stdout, params.runs);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new BenchError('WorkerFailure', `Worker output rejected: ${reason}`, {
        exitCode: result.exitCode,
        stderr: stderrTail,
      });
    }
  }
}

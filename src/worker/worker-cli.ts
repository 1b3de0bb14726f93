/**
 * Worker command line
 *
 * Parses the launch flags the harness passes, runs the benchmark and
 * prints exactly one result document on stdout. On failure nothing is
 * printed on stdout and the exit code is 1.
 *
 * When `signal` aborts (the harness terminating the worker) the backend
 * is closed at once, which stops the Python runtime and fails the
 * request in flight, so the runtime never outlives the worker.
 */

import type { Logger } from 'pino';
import type { InferenceBackend } from '../types/engine.js';
import { WorkerParamsSchema } from '../types/schemas/benchmark.js';
import { createProgram, parseNumber, parseProgram, processIo, type CliIo } from '../cli/program.js';
import { MlxLmBackend } from '../bridge/mlx-backend.js';
import { encodeWorkerResult } from '../harness/worker-protocol.js';
import { runWorkerBenchmark } from './benchmark-worker.js';
import { createLogger } from '../utils/logger.js';
import { describeError } from '../utils/logger-helpers.js';
import { BenchError, toBenchError, zodErrorToBenchError } from '../api/errors.js';

type WorkerCliOptions = {
  model: string;
  prompt: string;
  runs: number;
  maxTokens: number;
  temperature: number;
};

export interface WorkerCliDeps {
  io?: CliIo;
  logger?: Logger;
  createBackend?: (logger: Logger) => InferenceBackend;
  now?: () => number;
  /** Aborted on SIGTERM/SIGINT by the entry point */
  signal?: AbortSignal;
}

export async function runWorkerCli(argv: readonly string[], deps: WorkerCliDeps = {}): Promise<number> {
  const io = deps.io ?? processIo;
  const { signal } = deps;

  const program = createProgram('mlx-bench-worker', 'Isolated mlx-lm benchmark worker', io)
    .requiredOption('--model <id>', 'model identifier')
    .requiredOption('--prompt <text>', 'prompt for every run')
    .requiredOption('--runs <n>', 'number of timed runs', parseNumber)
    .requiredOption('--max-tokens <n>', 'max new tokens per run', parseNumber)
    .requiredOption('--temperature <t>', 'sampling temperature', parseNumber);

  const parsed = parseProgram<WorkerCliOptions>(program, argv);
  if (!parsed.ok) {
    return parsed.exitCode === 0 ? 0 : 1;
  }

  const params = WorkerParamsSchema.safeParse(parsed.options);
  if (!params.success) {
    io.err(zodErrorToBenchError(params.error).message);
    return 1;
  }

  let logger = deps.logger;
  let backend: InferenceBackend | undefined;
  let exitCode = 1;

  let closing: Promise<void> | undefined;
  const closeBackend = (): Promise<void> => {
    if (closing === undefined) {
      closing = (async () => {
        try {
          await backend?.close();
        } catch (error) {
          logger?.warn({ error: describeError(error) }, 'Failed to close backend');
        }
      })();
    }
    return closing;
  };
  const onAbort = (): void => {
    logger?.warn('Worker terminated; stopping backend');
    void closeBackend();
  };

  try {
    if (signal?.aborted) {
      throw new BenchError('Cancelled', 'Worker terminated before start');
    }
    logger = logger ?? createLogger('mlx-bench-worker');
    backend = deps.createBackend?.(logger) ?? new MlxLmBackend({ logger });
    signal?.addEventListener('abort', onAbort, { once: true });

    const result = await runWorkerBenchmark(backend, params.data, { logger, now: deps.now });
    if (signal?.aborted) {
      throw new BenchError('Cancelled', 'Worker terminated');
    }
    io.out(encodeWorkerResult(result));
    exitCode = 0;
  } catch (error) {
    const benchError = signal?.aborted ? new BenchError('Cancelled', 'Worker terminated') : toBenchError(error);
    logger?.error({ error: benchError.toObject() }, 'Worker failed');
    io.err(`worker failed: ${benchError.message}`);
  } finally {
    signal?.removeEventListener('abort', onAbort);
    await closeBackend();
  }
  return exitCode;
}

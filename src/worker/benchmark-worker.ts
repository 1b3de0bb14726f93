/**
 * Benchmark worker
 *
 * Loads a model once and times `runs` generations of the same prompt.
 * Runs inside the worker process (see ./worker-main.ts); the harness only
 * ever sees the document produced by {@link toWorkerDocument}.
 */

import { performance } from 'node:perf_hooks';
import type { Logger } from 'pino';
import type { InferenceBackend, ModelSession } from '../types/engine.js';
import type { RunMetric, WorkerParams, WorkerResult } from '../types/benchmark.js';
import { safeDivide } from '../utils/math-helpers.js';
import { describeError } from '../utils/logger-helpers.js';

export interface TokenEstimate {
  newTokens: number;
  /** False when the tokenizer threw and the estimate fell back to 0 */
  ok: boolean;
}

export interface WorkerRunOptions {
  logger?: Logger;
  /** Monotonic clock in milliseconds, replaced in tests */
  now?: () => number;
}

/**
 * Tokens the model added: encoded length of the generated text minus the
 * encoded length of the prompt, floored at 0.
 */
export async function estimateNewTokens(
  session: ModelSession,
  prompt: string,
  generated: string,
  logger?: Logger
): Promise<TokenEstimate> {
  try {
    const promptTokens = await session.encode(prompt);
    const generatedTokens = await session.encode(generated);
    return { newTokens: Math.max(0, generatedTokens.length - promptTokens.length), ok: true };
  } catch (error) {
    logger?.warn({ error: describeError(error) }, 'Token estimate failed; counting 0 new tokens');
    return { newTokens: 0, ok: false };
  }
}

/**
 * Run one full benchmark against `backend`.
 *
 * Load and generation errors propagate; the caller decides how the process
 * exits.
 */
export async function runWorkerBenchmark(
  backend: InferenceBackend,
  params: WorkerParams,
  options: WorkerRunOptions = {}
): Promise<WorkerResult> {
  const now = options.now ?? (() => performance.now());
  const { logger } = options;

  const loadStart = now();
  const session = await backend.load(params.model);
  const loadSeconds = (now() - loadStart) / 1000;
  logger?.info({ model: params.model, loadSeconds }, 'Model loaded');

  const rows: RunMetric[] = [];
  let estimationFailures = 0;

  for (let run = 1; run <= params.runs; run++) {
    const start = now();
    const generated = await session.generate(params.prompt, {
      maxTokens: params.maxTokens,
      temperature: params.temperature,
    });
    const latencySeconds = (now() - start) / 1000;

    const estimate = await estimateNewTokens(session, params.prompt, generated, logger);
    if (!estimate.ok) {
      estimationFailures++;
    }

    rows.push({
      run,
      latencySeconds,
      estimatedNewTokens: estimate.newTokens,
      estimatedTokensPerSecond: safeDivide(estimate.newTokens, latencySeconds),
    });
    logger?.debug({ run, latencySeconds, newTokens: estimate.newTokens }, 'Run complete');
  }

  return { loadSeconds, rows, estimationFailures };
}

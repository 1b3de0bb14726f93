/**
 * Synthetic fallback
 *
 * Placeholder metrics used when the worker cannot produce real ones, so
 * the CSV, summary and plot steps still run on machines without a usable
 * MLX backend.
 */

import type { RunMetric, WorkerResult } from '../types/benchmark.js';
import { safeDivide } from '../utils/math-helpers.js';

/**
 * Produces a complete result without running a model.
 */
export interface FallbackStrategy {
  readonly name: string;
  generate(runs: number, maxTokens: number): WorkerResult;
}

const BASE_LATENCY_SECONDS = 0.06;
const LATENCY_STEP_SECONDS = 0.01;

/**
 * Latency grows linearly with the run index; every run "generates"
 * `maxTokens` tokens. Pure: identical inputs give identical rows.
 */
export class SyntheticFallbackGenerator implements FallbackStrategy {
  public readonly name = 'synthetic';

  public generate(runs: number, maxTokens: number): WorkerResult {
    const rows: RunMetric[] = [];
    for (let run = 1; run <= runs; run++) {
      const latencySeconds = BASE_LATENCY_SECONDS + run * LATENCY_STEP_SECONDS;
      rows.push({
        run,
        latencySeconds,
        estimatedNewTokens: maxTokens,
        estimatedTokensPerSecond: safeDivide(maxTokens, latencySeconds),
      });
    }
    return { loadSeconds: 0, rows };
  }
}

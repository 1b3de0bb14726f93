/**
 * Worker result protocol
 *
 * The worker prints one JSON document on stdout:
 *
 * ```json
 * { "load_seconds": 1.2, "latency_avg_seconds": 0.4,
 *   "rows": [{ "run": 1, "latency_seconds": 0.4,
 *              "estimated_new_tokens": 30, "estimated_tokens_per_second": 75 }],
 *   "estimation_failures": 0 }
 * ```
 *
 * Decoding is all or nothing: a document that fails the schema, or whose
 * rows do not cover runs 1..N in order, is rejected as a whole.
 */

import type { RunMetric, WorkerResult } from '../types/benchmark.js';
import {
  WorkerResultPayloadSchema,
  type RunMetricPayload,
  type WorkerResultPayload,
} from '../types/schemas/benchmark.js';
import { BenchError } from '../api/errors.js';
import { safeAverage } from '../utils/math-helpers.js';

function toPayloadRow(row: RunMetric): RunMetricPayload {
  return {
    run: row.run,
    latency_seconds: row.latencySeconds,
    estimated_new_tokens: row.estimatedNewTokens,
    estimated_tokens_per_second: row.estimatedTokensPerSecond,
  };
}

function fromPayloadRow(row: RunMetricPayload): RunMetric {
  return {
    run: row.run,
    latencySeconds: row.latency_seconds,
    estimatedNewTokens: row.estimated_new_tokens,
    estimatedTokensPerSecond: row.estimated_tokens_per_second,
  };
}

/**
 * Serialize a worker result as the single-line stdout document.
 */
export function encodeWorkerResult(result: WorkerResult): string {
  const payload: WorkerResultPayload = {
    load_seconds: result.loadSeconds,
    latency_avg_seconds: safeAverage(result.rows.map((row) => row.latencySeconds)),
    rows: result.rows.map(toPayloadRow),
  };
  if (result.estimationFailures !== undefined) {
    payload.estimation_failures = result.estimationFailures;
  }
  return JSON.stringify(payload);
}

/**
 * Decode the captured stdout of a worker.
 *
 * @throws BenchError `ProtocolError` for anything but a complete document
 *   with exactly `expectedRuns` rows
 */
export function decodeWorkerResult(stdout: string, expectedRuns: number): WorkerResult {
  const text = stdout.trim();
  if (text.length === 0) {
    throw new BenchError('ProtocolError', 'Worker produced no output');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new BenchError('ProtocolError', 'Worker output is not valid JSON', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = WorkerResultPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BenchError('ProtocolError', 'Worker output does not match the result schema', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`),
    });
  }

  const { rows } = parsed.data;
  if (rows.length !== expectedRuns) {
    throw new BenchError(
      'ProtocolError',
      `Worker reported ${rows.length} rows, expected ${expectedRuns}`,
      { expected: expectedRuns, actual: rows.length }
    );
  }
  rows.forEach((row, index) => {
    if (row.run !== index + 1) {
      throw new BenchError('ProtocolError', `Worker row ${index} has run ${row.run}, expected ${index + 1}`);
    }
  });

  return {
    loadSeconds: parsed.data.load_seconds,
    rows: rows.map(fromPayloadRow),
    estimationFailures: parsed.data.estimation_failures,
  };
}

/**
 * Benchmark Zod schemas
 *
 * Validation at the three boundaries of a benchmark: the CLI config,
 * the worker's stdout document and the CSV artifact read back for plotting.
 */

import { z } from 'zod';
import {
  IntegerCell,
  NonEmptyString,
  NonNegativeInteger,
  NonNegativeNumber,
  NumericCell,
  PositiveInteger,
  Temperature,
} from './common.js';

/**
 * Benchmark configuration schema
 * Mirrors: src/types/benchmark.ts:BenchmarkConfig
 */
export const BenchmarkConfigSchema = z
  .object({
    model: NonEmptyString,
    prompt: z.string(),
    runs: z.number().int('--runs must be an integer').min(1, '--runs must be >= 1'),
    maxTokens: PositiveInteger,
    temperature: Temperature,
    output: NonEmptyString,
    strict: z.boolean(),
  })
  .readonly();

/**
 * Worker launch parameters schema
 * Mirrors: src/types/benchmark.ts:WorkerParams
 */
export const WorkerParamsSchema = z.object({
  model: NonEmptyString,
  prompt: z.string(),
  runs: PositiveInteger,
  maxTokens: PositiveInteger,
  temperature: Temperature,
});

/**
 * One row of the worker document (wire names)
 */
export const RunMetricPayloadSchema = z.object({
  run: PositiveInteger,
  latency_seconds: NonNegativeNumber,
  estimated_new_tokens: NonNegativeInteger,
  estimated_tokens_per_second: NonNegativeNumber,
});

export type RunMetricPayload = z.infer<typeof RunMetricPayloadSchema>;

/**
 * The single document a worker writes to stdout.
 *
 * `latency_avg_seconds` is informational; the harness recomputes it.
 */
export const WorkerResultPayloadSchema = z.object({
  load_seconds: NonNegativeNumber,
  latency_avg_seconds: NonNegativeNumber,
  rows: z.array(RunMetricPayloadSchema),
  estimation_failures: NonNegativeInteger.optional(),
});

export type WorkerResultPayload = z.infer<typeof WorkerResultPayloadSchema>;

/**
 * The columns of an artifact row the plot renderer needs. Other columns
 * are ignored.
 */
export const PlotRowSchema = z.object({
  run: IntegerCell,
  latency_seconds: NumericCell,
  estimated_tokens_per_second: NumericCell,
});

/**
 * Aggregation of harness output into persisted records and summary stats.
 */

import type {
  BenchmarkConfig,
  BenchmarkMode,
  BenchmarkRecord,
  RunMetric,
  SummaryStats,
} from '../types/benchmark.js';
import { BenchError } from '../api/errors.js';
import { safeAverage, safeMax, safeMin } from '../utils/math-helpers.js';

export interface FinalizedBenchmark {
  records: BenchmarkRecord[];
  summary: SummaryStats;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local wall-clock time as `YYYY-MM-DDTHH:MM:SS`, no offset.
 */
export function formatLocalTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Mean/min/max latency and mean throughput over `rows`.
 *
 * @throws BenchError when `rows` is empty; a summary of nothing is never
 *   reported
 */
export function computeSummary(rows: readonly RunMetric[]): SummaryStats {
  if (rows.length === 0) {
    throw new BenchError('RuntimeError', 'Cannot summarize an empty record set');
  }

  const latencies = rows.map((row) => row.latencySeconds);
  return {
    latencyMean: safeAverage(latencies),
    latencyMin: safeMin(latencies),
    latencyMax: safeMax(latencies),
    throughputMean: safeAverage(rows.map((row) => row.estimatedTokensPerSecond)),
  };
}

/**
 * Build one self-contained record per run and summarize them.
 *
 * @param clock - read once; every record carries the same timestamp
 */
export function finalize(
  mode: BenchmarkMode,
  loadSeconds: number,
  rows: readonly RunMetric[],
  config: Pick<BenchmarkConfig, 'model' | 'maxTokens' | 'temperature'>,
  clock: () => Date = () => new Date()
): FinalizedBenchmark {
  const timestamp = formatLocalTimestamp(clock());
  const records = rows.map(
    (row): BenchmarkRecord => ({
      timestamp,
      run: row.run,
      mode,
      model: config.model,
      maxTokens: config.maxTokens,
      temperature: config.temperature,
      latencySeconds: row.latencySeconds,
      estimatedNewTokens: row.estimatedNewTokens,
      estimatedTokensPerSecond: row.estimatedTokensPerSecond,
      loadSeconds,
    })
  );

  return { records, summary: computeSummary(records) };
}

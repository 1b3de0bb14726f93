/**
 * Operator-facing console lines for a benchmark invocation.
 */

import type { BenchmarkMode, BenchmarkRecord, SummaryStats } from '../types/benchmark.js';

export interface SummaryContext {
  runs: number;
  mode: BenchmarkMode;
  loadSeconds: number;
  outputPath: string;
}

/**
 * `run=1 mode=real latency=0.123s estimated_new_tokens=10 tok/s=81.30`
 */
export function formatRunLine(record: BenchmarkRecord): string {
  return (
    `run=${record.run} mode=${record.mode} latency=${record.latencySeconds.toFixed(3)}s ` +
    `estimated_new_tokens=${record.estimatedNewTokens} tok/s=${record.estimatedTokensPerSecond.toFixed(2)}`
  );
}

/**
 * The summary block, preceded by a blank line.
 */
export function formatSummary(summary: SummaryStats, context: SummaryContext): string[] {
  return [
    '',
    '=== Summary ===',
    `runs: ${context.runs}`,
    `mode: ${context.mode}`,
    `load_seconds: ${context.loadSeconds.toFixed(3)}`,
    `latency_avg_seconds: ${summary.latencyMean.toFixed(3)}`,
    `latency_min_seconds: ${summary.latencyMin.toFixed(3)}`,
    `latency_max_seconds: ${summary.latencyMax.toFixed(3)}`,
    `tokens_per_second_avg: ${summary.throughputMean.toFixed(2)}`,
    `wrote_csv: ${context.outputPath}`,
  ];
}

import { describe, it, expect } from 'vitest';
import { formatRunLine, formatSummary } from '../../../src/reporting/console-report.js';

describe('formatRunLine', () => {
  it('prints latency with 3 decimals and throughput with 2', () => {
    expect(
      formatRunLine({
        timestamp: '2026-01-02T03:04:05',
        run: 1,
        mode: 'real',
        model: 'test-org/tiny',
        maxTokens: 32,
        temperature: 0.2,
        latencySeconds: 0.123,
        estimatedNewTokens: 10,
        estimatedTokensPerSecond: 10 / 0.123,
        loadSeconds: 1,
      })
    ).toBe('run=1 mode=real latency=0.123s estimated_new_tokens=10 tok/s=81.30');
  });
});

describe('formatSummary', () => {
  it('prints the summary block', () => {
    expect(
      formatSummary(
        { latencyMean: 0.5, latencyMin: 0.25, latencyMax: 0.75, throughputMean: 6 },
        { runs: 3, mode: 'real', loadSeconds: 1.23456, outputPath: 'results/out.csv' }
      )
    ).toEqual([
      '',
      '=== Summary ===',
      'runs: 3',
      'mode: real',
      'load_seconds: 1.235',
      'latency_avg_seconds: 0.500',
      'latency_min_seconds: 0.250',
      'latency_max_seconds: 0.750',
      'tokens_per_second_avg: 6.00',
      'wrote_csv: results/out.csv',
    ]);
  });
});

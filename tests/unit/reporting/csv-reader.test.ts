import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parsePlotCsv, readPlotCsv } from '../../../src/reporting/csv-reader.js';
import { renderCsv } from '../../../src/reporting/csv-writer.js';
import { finalize } from '../../../src/reporting/aggregator.js';
import { SyntheticFallbackGenerator } from '../../../src/harness/synthetic-fallback.js';

const HEADER =
  'timestamp,run,mode,model,max_tokens,temperature,latency_seconds,estimated_new_tokens,estimated_tokens_per_second,load_seconds';

describe('parsePlotCsv', () => {
  it('reads run, latency and throughput and skips malformed rows', () => {
    const content = [
      HEADER,
      't,1,real,m,32,0.2,0.100000,10,100.000000,1.000000',
      't,x,real,m,32,0.2,0.100000,10,100.000000,1.000000',
      't,2,real,m,32,0.2,0.120000,10,95.000000,1.000000',
      't,3,real',
      '',
    ].join('\n');

    expect(parsePlotCsv(content)).toEqual({
      points: [
        { run: 1, latencySeconds: 0.1, tokensPerSecond: 100 },
        { run: 2, latencySeconds: 0.12, tokensPerSecond: 95 },
      ],
      skipped: 2,
    });
  });

  it('accepts a minimal three-column file', () => {
    const { points } = parsePlotCsv('run,latency_seconds,estimated_tokens_per_second\n1,0.10,100.0\n2,0.12,95.0\n');
    expect(points).toEqual([
      { run: 1, latencySeconds: 0.1, tokensPerSecond: 100 },
      { run: 2, latencySeconds: 0.12, tokensPerSecond: 95 },
    ]);
  });

  it('returns no points for a header-only or empty file', () => {
    expect(parsePlotCsv(`${HEADER}\n`).points).toEqual([]);
    expect(parsePlotCsv('').points).toEqual([]);
  });

  it('returns no points when the needed columns are missing', () => {
    expect(parsePlotCsv('a,b\n1,2\n')).toEqual({ points: [], skipped: 1 });
  });

  it('raises DataFormatError for unreadable CSV', () => {
    let caught: unknown;
    try {
      parsePlotCsv('run,latency_seconds\n"1,0.1\n');
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ code: 'DataFormatError' });
  });
});

describe('readPlotCsv', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'mlx-bench-plot-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads back an artifact written by the benchmark', async () => {
    const fallback = new SyntheticFallbackGenerator().generate(3, 32);
    const { records } = finalize('synthetic', 0, fallback.rows, {
      model: 'test-org/tiny',
      maxTokens: 32,
      temperature: 0.2,
    });
    const path = join(dir, 'bench.csv');
    writeFileSync(path, renderCsv(records));

    const { points, skipped } = await readPlotCsv(path);

    expect(skipped).toBe(0);
    expect(points.map((point) => point.run)).toEqual([1, 2, 3]);
    expect(points.map((point) => point.latencySeconds)).toEqual([0.07, 0.08, 0.09]);
  });
});

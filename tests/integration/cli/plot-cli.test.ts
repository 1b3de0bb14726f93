import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pino } from 'pino';
import { main } from '../../../src/cli/plot-results.js';
import { resetConfig } from '../../../src/config/loader.js';
import { BenchError } from '../../../src/api/errors.js';
import type { ChartRenderer, ChartRequest } from '../../../src/plot/chart-renderer.js';

const logger = pino({ level: 'silent' });

const HEADER =
  'timestamp,run,mode,model,max_tokens,temperature,latency_seconds,estimated_new_tokens,estimated_tokens_per_second,load_seconds';

const captureIo = () => {
  const out: string[] = [];
  const err: string[] = [];
  return { io: { out: (line: string) => out.push(line), err: (line: string) => err.push(line) }, out, err };
};

describe('mlx-plot', () => {
  let dir: string;
  let input: string;
  let output: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'mlx-plot-cli-'));
    input = join(dir, 'bench.csv');
    output = join(dir, 'charts', 'bench.png');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('renders the parseable rows and writes the image', async () => {
    writeFileSync(
      input,
      [
        HEADER,
        '2026-01-02T03:04:05,1,real,test-org/tiny,32,0.2,0.500000,20,40.000000,1.000000',
        '2026-01-02T03:04:05,2,real,test-org/tiny,32,0.2,,20,,1.000000',
        '2026-01-02T03:04:05,3,real,test-org/tiny,32,0.2,0.250000,20,80.000000,1.000000',
        '',
      ].join('\n')
    );
    const requests: ChartRequest[] = [];
    const renderer: ChartRenderer = {
      render: async (chart) => {
        requests.push(chart);
        return Buffer.from('fake-png');
      },
    };
    const { io, out, err } = captureIo();

    const code = await main(['--input', input, '--output', output, '--title', 'Tiny model'], {
      io,
      logger,
      loadRenderer: async () => renderer,
    });

    expect(code).toBe(0);
    expect(err).toEqual([]);
    expect(out).toEqual([`Wrote plot: ${output}`]);
    expect(requests).toEqual([
      {
        title: 'Tiny model',
        points: [
          { run: 1, latencySeconds: 0.5, tokensPerSecond: 40 },
          { run: 3, latencySeconds: 0.25, tokensPerSecond: 80 },
        ],
      },
    ]);
    expect(readFileSync(output, 'utf8')).toBe('fake-png');
  });

  it('exits 1 with the reason when the config file cannot be parsed', async () => {
    const configPath = join(dir, 'benchmark.yaml');
    writeFileSync(configPath, 'logging: [unclosed\n');
    vi.stubEnv('MLX_BENCH_CONFIG', configPath);
    resetConfig();
    const { io, err } = captureIo();

    try {
      const code = await main(['--input', input, '--output', output], { io });

      expect(code).toBe(1);
      expect(err).toHaveLength(1);
      expect(err[0]?.startsWith('Failed to load configuration: YAMLException')).toBe(true);
      expect(existsSync(output)).toBe(false);
    } finally {
      vi.unstubAllEnvs();
      resetConfig();
    }
  });

  it('exits 2 when the input is missing', async () => {
    const loadRenderer = vi.fn();
    const { io, err } = captureIo();

    const code = await main(['--input', input, '--output', output], { io, logger, loadRenderer });

    expect(code).toBe(2);
    expect(err).toEqual([`Input CSV not found: ${input}`]);
    expect(loadRenderer).not.toHaveBeenCalled();
  });

  it('exits 3 without an image when no row is plottable', async () => {
    writeFileSync(input, `${HEADER}\n2026-01-02T03:04:05,1,real,test-org/tiny,32,0.2,n/a,20,n/a,1.000000\n`);
    const loadRenderer = vi.fn();
    const { io, err } = captureIo();

    const code = await main(['--input', input, '--output', output], { io, logger, loadRenderer });

    expect(code).toBe(3);
    expect(err).toEqual(['No plottable rows found in input CSV.']);
    expect(loadRenderer).not.toHaveBeenCalled();
    expect(existsSync(output)).toBe(false);
  });

  it('exits 3 for a header-only file', async () => {
    writeFileSync(input, `${HEADER}\n`);
    const { io } = captureIo();

    expect(await main(['--input', input, '--output', output], { io, logger })).toBe(3);
    expect(existsSync(output)).toBe(false);
  });

  it('exits 1 with a hint when the rendering stack cannot be loaded', async () => {
    writeFileSync(input, `${HEADER}\n2026-01-02T03:04:05,1,real,test-org/tiny,32,0.2,0.5,20,40,1.0\n`);
    const { io, err } = captureIo();

    const code = await main(['--input', input, '--output', output], {
      io,
      logger,
      loadRenderer: async () => {
        throw new BenchError('RenderUnavailable', 'Chart rendering libraries could not be loaded: missing vega');
      },
    });

    expect(code).toBe(1);
    expect(err).toEqual([
      'Failed to load the chart rendering libraries. Did you install dependencies?',
      'Error: Chart rendering libraries could not be loaded: missing vega',
    ]);
    expect(existsSync(output)).toBe(false);
  });
});

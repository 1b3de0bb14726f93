import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import { loadConfig, validateConfig, getConfig, resetConfig } from '../../../src/config/loader.js';
import { BenchError } from '../../../src/api/errors.js';

describe('Config Loader', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'mlx-bench-config-'));
    resetConfig();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.unstubAllEnvs();
    resetConfig();
  });

  const writeYaml = (document: unknown): string => {
    const path = join(dir, 'benchmark.yaml');
    writeFileSync(path, yaml.dump(document));
    return path;
  };

  it('fills keys missing from the file with defaults', () => {
    const path = writeYaml({ logging: { level: 'debug' } });

    const config = loadConfig(path, 'development');

    expect(config.logging.level).toBe('debug');
    expect(config.python_runtime.python_path).toBe('python3');
    expect(config.python_runtime.runtime_path).toBe('python/runtime.py');
    expect(config.harness.worker_timeout_ms).toBe(1_800_000);
    expect(config.harness.kill_grace_ms).toBe(5_000);
    expect(config.results.root_dir).toBe('results');
  });

  it('applies the override of the selected environment only', () => {
    const path = writeYaml({
      harness: { worker_timeout_ms: 60_000 },
      environments: {
        test: { harness: { kill_grace_ms: 10 }, logging: { level: 'silent' } },
        production: { logging: { level: 'warn' } },
      },
    });

    const config = loadConfig(path, 'test');

    expect(config.harness).toEqual({ worker_timeout_ms: 60_000, kill_grace_ms: 10 });
    expect(config.logging.level).toBe('silent');
    expect(config).not.toHaveProperty('environments');
  });

  it('reads the file named by MLX_BENCH_CONFIG when no path is given', () => {
    vi.stubEnv('MLX_BENCH_CONFIG', writeYaml({ results: { root_dir: '/tmp/bench-results' } }));

    expect(getConfig().results.root_dir).toBe('/tmp/bench-results');
  });

  it('throws ConfigError for a missing file', () => {
    const missing = join(dir, 'nope.yaml');

    expect(() => loadConfig(missing)).toThrow(BenchError);
    expect(() => loadConfig(missing)).toThrow(`Configuration file not found: ${missing}`);
  });

  it('throws ConfigError for invalid values', () => {
    const path = writeYaml({ harness: { worker_timeout_ms: -5 } });

    try {
      loadConfig(path, 'development');
      expect.unreachable('loadConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(BenchError);
      expect(error).toMatchObject({ code: 'ConfigError' });
      expect((error as Error).message).toBe(
        'Configuration validation failed:\nharness.worker_timeout_ms must be positive'
      );
    }
  });

  it('rejects an unknown log level', () => {
    expect(() =>
      validateConfig({
        python_runtime: {
          python_path: 'python3',
          runtime_path: 'python/runtime.py',
          startup_timeout_ms: 60_000,
          shutdown_timeout_ms: 5_000,
          request_timeout_ms: 600_000,
        },
        harness: { worker_timeout_ms: 1_000, kill_grace_ms: 0 },
        results: { root_dir: 'results' },
        logging: { level: 'loud' },
      })
    ).toThrow('logging.level must be one of: fatal, error, warn, info, debug, trace, silent');
  });

  it('loads the packaged config with the test environment', () => {
    const config = getConfig();

    expect(config.logging.level).toBe('silent');
    expect(config.harness.worker_timeout_ms).toBe(10_000);
    expect(config.harness.kill_grace_ms).toBe(100);
    expect(getConfig()).toBe(config);
  });
});

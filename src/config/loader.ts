/**
 * Configuration Loader
 *
 * Loads configuration from config/benchmark.yaml (or the file named by
 * MLX_BENCH_CONFIG) with environment-specific overrides. Keys missing from
 * the file fall back to ./defaults.ts.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { RuntimeConfigSchema, type RuntimeConfig } from '../types/schemas/config.js';
import { BenchError } from '../api/errors.js';
import { HARNESS, LOG_LEVEL, PYTHON_RUNTIME, RESULTS } from './defaults.js';

export type Config = RuntimeConfig;

export type ConfigEnvironment = 'production' | 'development' | 'test';

type PlainObject = Record<string, unknown>;

const DEFAULT_CONFIG: Config = {
  python_runtime: {
    python_path: PYTHON_RUNTIME.DEFAULT_PYTHON_PATH,
    runtime_path: PYTHON_RUNTIME.DEFAULT_RUNTIME_PATH,
    startup_timeout_ms: PYTHON_RUNTIME.STARTUP_TIMEOUT_MS,
    shutdown_timeout_ms: PYTHON_RUNTIME.SHUTDOWN_TIMEOUT_MS,
    request_timeout_ms: PYTHON_RUNTIME.REQUEST_TIMEOUT_MS,
  },
  harness: {
    worker_timeout_ms: HARNESS.WORKER_TIMEOUT_MS,
    kill_grace_ms: HARNESS.KILL_GRACE_MS,
  },
  results: {
    root_dir: RESULTS.ROOT_DIR,
  },
  logging: {
    level: LOG_LEVEL,
  },
};

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
export function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

/**
 * Load configuration from YAML file
 */
export function loadConfig(configPath?: string, environment?: ConfigEnvironment): Config {
  const finalPath =
    configPath || process.env.MLX_BENCH_CONFIG || join(findPackageRoot(), 'config', 'benchmark.yaml');

  let document: unknown;
  try {
    document = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new BenchError('ConfigError', `Configuration file not found: ${finalPath}`, {
        path: finalPath,
      });
    }
    throw new BenchError('ConfigError', `Failed to load configuration: ${String(error)}`, {
      path: finalPath,
    });
  }

  const base = isPlainObject(document) ? document : {};
  const { environments, ...fileConfig } = base;

  let merged = deepMerge(DEFAULT_CONFIG, fileConfig);

  const env = environment ?? process.env.NODE_ENV ?? 'development';
  if (isPlainObject(environments)) {
    const envConfig = environments[env];
    if (isPlainObject(envConfig)) {
      merged = deepMerge(merged, envConfig);
    }
  }

  return validateConfig(merged);
}

/**
 * Validate configuration values
 */
export function validateConfig(config: unknown): Config {
  const parseResult = RuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new BenchError('ConfigError', `Configuration validation failed:\n${errors.join('\n')}`);
  }
  return parseResult.data;
}

/**
 * Global configuration instance
 */
let globalConfig: Config | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: ConfigEnvironment): Config {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): Config {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

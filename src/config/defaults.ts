/**
 * Default Configuration Constants
 *
 * Values used when config/benchmark.yaml leaves a key out, plus the CLI
 * defaults for a benchmark invocation.
 */

/**
 * Python Runtime Configuration
 */
export const PYTHON_RUNTIME = {
  /** Default Python executable path */
  DEFAULT_PYTHON_PATH: 'python3',

  /** Default runtime script path (relative to the package root) */
  DEFAULT_RUNTIME_PATH: 'python/runtime.py',

  /** Process startup timeout (ms); covers importing mlx_lm */
  STARTUP_TIMEOUT_MS: 60_000,

  /** Graceful shutdown timeout (ms) */
  SHUTDOWN_TIMEOUT_MS: 5_000,

  /** Per-request timeout (ms); model downloads happen inside load_model */
  REQUEST_TIMEOUT_MS: 600_000,
} as const;

/**
 * Harness Configuration
 */
export const HARNESS = {
  /** Hard limit on one worker process (ms) */
  WORKER_TIMEOUT_MS: 1_800_000, // 30 minutes

  /** Delay between SIGTERM and SIGKILL when the worker is stopped (ms) */
  KILL_GRACE_MS: 5_000,
} as const;

/**
 * Artifact locations
 */
export const RESULTS = {
  /** Relative outputs without this path segment are placed under it */
  ROOT_DIR: 'results',
} as const;

/**
 * CLI defaults for a benchmark invocation
 */
export const BENCHMARK_DEFAULTS = {
  MODEL: 'mlx-community/Qwen2.5-0.5B-Instruct-4bit',
  PROMPT: 'Summarize why small smoke tests are useful.',
  SINGLE_SHOT_PROMPT: 'Write one sentence about Apple Silicon efficiency.',
  RUNS: 3,
  MAX_TOKENS: 32,
  TEMPERATURE: 0.2,
  OUTPUT: 'results/benchmark_latest.csv',
  PLOT_OUTPUT: 'results/benchmark_latest.png',
  PLOT_TITLE: 'MLX-LM Benchmark',
} as const;

export const LOG_LEVEL = 'info' as const;

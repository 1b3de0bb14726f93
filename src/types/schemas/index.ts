/**
 * Zod schemas for every boundary of a benchmark: CLI options, the worker
 * result document, CSV rows read for plotting and config/benchmark.yaml.
 *
 * @example
 * ```typescript
 * import { BenchmarkConfigSchema } from 'mlx-bench';
 *
 * const result = BenchmarkConfigSchema.safeParse({ ...options, runs: 0 });
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

export * from './common.js';
export * from './benchmark.js';
export * from './config.js';

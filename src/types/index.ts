/**
 * Main type exports for mlx-bench
 */

export * from './benchmark.js';
export * from './engine.js';

/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating config/benchmark.yaml.
 *
 * @module schemas/config
 */

import { z } from 'zod';

/**
 * Python Runtime Configuration
 */
export const PythonRuntimeConfigSchema = z.object({
  python_path: z.string().min(1, 'Python path cannot be empty'),
  runtime_path: z.string().min(1, 'Runtime path cannot be empty'),
  startup_timeout_ms: z.number().int().min(1000, 'must be >= 1000ms'),
  shutdown_timeout_ms: z.number().int().positive('must be positive'),
  request_timeout_ms: z.number().int().positive('must be positive'),
});

/**
 * Harness Configuration
 */
export const HarnessConfigSchema = z.object({
  worker_timeout_ms: z.number().int().positive('must be positive'),
  kill_grace_ms: z.number().int().min(0, 'must be >= 0'),
});

/**
 * Results Configuration
 */
export const ResultsConfigSchema = z.object({
  root_dir: z.string().min(1, 'Results directory cannot be empty'),
});

/**
 * Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'], {
    errorMap: () => ({
      message: 'must be one of: fatal, error, warn, info, debug, trace, silent',
    }),
  }),
});

/**
 * Complete Runtime Configuration Schema
 *
 * Matches the structure of config/benchmark.yaml after environment
 * overrides have been merged and removed.
 */
export const RuntimeConfigSchema = z.object({
  python_runtime: PythonRuntimeConfigSchema,
  harness: HarnessConfigSchema,
  results: ResultsConfigSchema,
  logging: LoggingConfigSchema,
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

/**
 * mlx-run: one generation with mlx-lm, printed with its timing.
 */

import { performance } from 'node:perf_hooks';
import type { Logger } from 'pino';
import type { InferenceBackend } from '../types/engine.js';
import { WorkerParamsSchema } from '../types/schemas/benchmark.js';
import { BENCHMARK_DEFAULTS } from '../config/defaults.js';
import { MlxLmBackend } from '../bridge/mlx-backend.js';
import { createLogger } from '../utils/logger.js';
import { describeError } from '../utils/logger-helpers.js';
import { exitCodeFor, toBenchError, zodErrorToBenchError } from '../api/errors.js';
import { createProgram, parseNumber, parseProgram, processIo, type CliIo } from './program.js';

type RunModelCliOptions = {
  model: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
};

export interface RunModelCliDeps {
  io?: CliIo;
  logger?: Logger;
  createBackend?: (logger: Logger) => InferenceBackend;
  /** Monotonic clock in milliseconds */
  now?: () => number;
}

export async function main(argv: readonly string[], deps: RunModelCliDeps = {}): Promise<number> {
  const io = deps.io ?? processIo;
  const now = deps.now ?? (() => performance.now());

  const program = createProgram('mlx-run', 'Run local generation with mlx-lm.', io)
    .option('--model <id>', 'HF model repo compatible with mlx-lm', BENCHMARK_DEFAULTS.MODEL)
    .option('--prompt <text>', 'prompt text', BENCHMARK_DEFAULTS.SINGLE_SHOT_PROMPT)
    .option('--max-tokens <n>', 'max new tokens', parseNumber, BENCHMARK_DEFAULTS.MAX_TOKENS)
    .option('--temperature <t>', 'sampling temperature', parseNumber, BENCHMARK_DEFAULTS.TEMPERATURE);

  const parsed = parseProgram<RunModelCliOptions>(program, argv);
  if (!parsed.ok) {
    return parsed.exitCode;
  }

  const validated = WorkerParamsSchema.safeParse({ ...parsed.options, runs: 1 });
  if (!validated.success) {
    io.err(zodErrorToBenchError(validated.error).message);
    return 2;
  }
  const { model, prompt, maxTokens, temperature } = validated.data;

  let logger = deps.logger;
  let backend: InferenceBackend | undefined;

  try {
    logger = logger ?? createLogger('mlx-run');
    backend = deps.createBackend?.(logger) ?? new MlxLmBackend({ logger });

    io.out(`Loading model: ${model}`);
    const loadStart = now();
    const session = await backend.load(model);
    const loadSeconds = (now() - loadStart) / 1000;

    io.out(`Generating (max_tokens=${maxTokens}, temperature=${temperature})...`);
    const generationStart = now();
    const text = await session.generate(prompt, { maxTokens, temperature });
    const generationSeconds = (now() - generationStart) / 1000;

    for (const line of [
      '',
      '=== Prompt ===',
      prompt,
      '',
      '=== Output ===',
      text,
      '',
      '=== Timing ===',
      `load_seconds: ${loadSeconds.toFixed(3)}`,
      `generation_seconds: ${generationSeconds.toFixed(3)}`,
    ]) {
      io.out(line);
    }
    return 0;
  } catch (error) {
    const benchError = toBenchError(error);
    logger?.error({ error: benchError.toObject() }, 'Generation failed');
    if (benchError.code === 'BackendUnavailable') {
      io.err('Failed to start the mlx-lm runtime. Is mlx-lm installed for the configured Python?');
    }
    io.err(`Error: ${benchError.message}`);
    return exitCodeFor(benchError);
  } finally {
    try {
      await backend?.close();
    } catch (error) {
      logger?.warn({ error: describeError(error) }, 'Failed to close backend');
    }
  }
}

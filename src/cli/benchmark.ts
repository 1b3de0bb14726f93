/**
 * mlx-bench: benchmark mlx-lm generation and write a CSV artifact.
 *
 * Exit codes: 0 success, 1 fatal failure (strict worker failure, write
 * error), 2 usage error, 130 cancelled.
 */

import type { Logger } from 'pino';
import type { BenchmarkConfig } from '../types/benchmark.js';
import { BenchmarkConfigSchema } from '../types/schemas/benchmark.js';
import { BENCHMARK_DEFAULTS } from '../config/defaults.js';
import { getConfig } from '../config/loader.js';
import { BenchmarkHarness } from '../harness/harness.js';
import { finalize } from '../reporting/aggregator.js';
import { resolveOutputPath, writeBenchmarkCsv } from '../reporting/csv-writer.js';
import { formatRunLine, formatSummary } from '../reporting/console-report.js';
import { createLogger } from '../utils/logger.js';
import { exitCodeFor, toBenchError, zodErrorToBenchError } from '../api/errors.js';
import { createProgram, parseNumber, parseProgram, processIo, type CliIo } from './program.js';

type BenchmarkCliOptions = {
  model: string;
  prompt: string;
  runs: number;
  maxTokens: number;
  temperature: number;
  output: string;
  strict: boolean;
};

export interface BenchmarkCliDeps {
  io?: CliIo;
  logger?: Logger;
  harness?: BenchmarkHarness;
  signal?: AbortSignal;
  clock?: () => Date;
}

export async function main(argv: readonly string[], deps: BenchmarkCliDeps = {}): Promise<number> {
  const io = deps.io ?? processIo;

  const program = createProgram('mlx-bench', 'Benchmark mlx-lm local generation.', io)
    .option('--model <id>', 'HF model repo compatible with mlx-lm', BENCHMARK_DEFAULTS.MODEL)
    .option('--prompt <text>', 'prompt text for each run', BENCHMARK_DEFAULTS.PROMPT)
    .option('--runs <n>', 'number of timed runs', parseNumber, BENCHMARK_DEFAULTS.RUNS)
    .option('--max-tokens <n>', 'max new tokens', parseNumber, BENCHMARK_DEFAULTS.MAX_TOKENS)
    .option('--temperature <t>', 'sampling temperature', parseNumber, BENCHMARK_DEFAULTS.TEMPERATURE)
    .option('--output <path>', 'CSV output path', BENCHMARK_DEFAULTS.OUTPUT)
    .option('--strict', 'fail instead of falling back to synthetic benchmark data', false);

  const parsed = parseProgram<BenchmarkCliOptions>(program, argv);
  if (!parsed.ok) {
    return parsed.exitCode;
  }

  const validated = BenchmarkConfigSchema.safeParse(parsed.options);
  if (!validated.success) {
    io.err(zodErrorToBenchError(validated.error).message);
    return 2;
  }
  const config: BenchmarkConfig = validated.data;

  // Config and logger setup can fail on a broken config/benchmark.yaml
  let logger = deps.logger;
  let harness: BenchmarkHarness | undefined;
  const onFallback = (): void => {
    io.err('mlx-lm worker failed; using synthetic fallback benchmark data.');
  };

  try {
    logger = logger ?? createLogger('mlx-bench');
    const outputPath = resolveOutputPath(config.output, getConfig().results.root_dir);
    harness = deps.harness ?? new BenchmarkHarness({ logger });
    harness.on('fallback', onFallback);

    io.out(`Loading model: ${config.model}`);
    io.out(`Running ${config.runs} benchmark iterations...`);

    const outcome = await harness.run(config, { signal: deps.signal });
    const { records, summary } = finalize(outcome.mode, outcome.loadSeconds, outcome.rows, config, deps.clock);

    for (const record of records) {
      io.out(formatRunLine(record));
    }

    await writeBenchmarkCsv(outputPath, records);
    logger.info({ path: outputPath, rows: records.length, mode: outcome.mode }, 'Wrote benchmark CSV');

    for (const line of formatSummary(summary, {
      runs: config.runs,
      mode: outcome.mode,
      loadSeconds: outcome.loadSeconds,
      outputPath,
    })) {
      io.out(line);
    }
    return 0;
  } catch (error) {
    const benchError = toBenchError(error);
    logger?.error({ error: { code: benchError.code, message: benchError.message } }, 'Benchmark failed');

    if (benchError.code === 'WorkerFailure') {
      io.err(
        'mlx-lm worker failed (possibly no available Metal device). ' +
          'Re-run without --strict to allow fallback.'
      );
    } else {
      io.err(benchError.message);
    }
    return exitCodeFor(benchError);
  } finally {
    harness?.off('fallback', onFallback);
  }
}

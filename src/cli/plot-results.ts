/**
 * mlx-plot: render a benchmark CSV to a PNG chart.
 *
 * Exit codes: 0 success, 1 rendering stack unavailable or render error,
 * 2 missing input, 3 no plottable rows (no image is written).
 */

import { existsSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Logger } from 'pino';
import { BENCHMARK_DEFAULTS } from '../config/defaults.js';
import { readPlotCsv, type PlotDataset } from '../reporting/csv-reader.js';
import { loadChartRenderer, type ChartRenderer } from '../plot/chart-renderer.js';
import { createLogger } from '../utils/logger.js';
import { exitCodeFor, toBenchError } from '../api/errors.js';
import { createProgram, parseProgram, processIo, type CliIo } from './program.js';

type PlotCliOptions = {
  input: string;
  output: string;
  title: string;
};

export interface PlotCliDeps {
  io?: CliIo;
  logger?: Logger;
  loadRenderer?: () => Promise<ChartRenderer>;
}

export async function main(argv: readonly string[], deps: PlotCliDeps = {}): Promise<number> {
  const io = deps.io ?? processIo;

  const program = createProgram('mlx-plot', 'Plot benchmark CSV results.', io)
    .option('--input <path>', 'input CSV produced by mlx-bench', BENCHMARK_DEFAULTS.OUTPUT)
    .option('--output <path>', 'output PNG path', BENCHMARK_DEFAULTS.PLOT_OUTPUT)
    .option('--title <text>', 'plot title', BENCHMARK_DEFAULTS.PLOT_TITLE);

  const parsed = parseProgram<PlotCliOptions>(program, argv);
  if (!parsed.ok) {
    return parsed.exitCode;
  }
  const { input, output, title } = parsed.options;

  let logger: Logger;
  try {
    logger = deps.logger ?? createLogger('mlx-plot');
  } catch (error) {
    const benchError = toBenchError(error);
    io.err(benchError.message);
    return exitCodeFor(benchError);
  }

  if (!existsSync(input)) {
    io.err(`Input CSV not found: ${input}`);
    return 2;
  }

  let dataset: PlotDataset;
  try {
    dataset = await readPlotCsv(input);
  } catch (error) {
    const benchError = toBenchError(error, 'DataFormatError');
    logger.error({ error: benchError.toObject() }, 'Failed to read input CSV');
    io.err(benchError.message);
    return benchError.code === 'DataFormatError' ? 3 : 1;
  }

  if (dataset.skipped > 0) {
    logger.warn({ skipped: dataset.skipped }, 'Skipped malformed rows');
  }
  if (dataset.points.length === 0) {
    io.err('No plottable rows found in input CSV.');
    return 3;
  }

  try {
    const renderer = await (deps.loadRenderer ?? loadChartRenderer)();
    const png = await renderer.render({ title, points: dataset.points });
    await mkdir(dirname(output), { recursive: true });
    await writeFile(output, png);
  } catch (error) {
    const benchError = toBenchError(error);
    logger.error({ error: benchError.toObject() }, 'Failed to render chart');
    if (benchError.code === 'RenderUnavailable') {
      io.err('Failed to load the chart rendering libraries. Did you install dependencies?');
    }
    io.err(`Error: ${benchError.message}`);
    return 1;
  }

  io.out(`Wrote plot: ${output}`);
  return 0;
}

export { BenchmarkHarness, type BenchmarkHarnessOptions, type HarnessRunOptions, type HarnessEvents } from './harness/harness.js';
export { SyntheticFallbackGenerator, type FallbackStrategy } from './harness/synthetic-fallback.js';
export { encodeWorkerResult, decodeWorkerResult } from './harness/worker-protocol.js';
export { buildWorkerArgs, buildWorkerCommand, resolveWorkerEntry, type WorkerCommand } from './harness/worker-launcher.js';
export { runWorkerBenchmark, estimateNewTokens, type TokenEstimate, type WorkerRunOptions } from './worker/benchmark-worker.js';
export { finalize, computeSummary, formatLocalTimestamp, type FinalizedBenchmark } from './reporting/aggregator.js';
export { CSV_COLUMNS, renderCsv, resolveOutputPath, toCsvRow, writeBenchmarkCsv, type CsvColumn } from './reporting/csv-writer.js';
export { parsePlotCsv, readPlotCsv, type PlotDataset } from './reporting/csv-reader.js';
export { formatRunLine, formatSummary, type SummaryContext } from './reporting/console-report.js';
export { buildChartSpec, loadChartRenderer, type ChartRenderer, type ChartRequest } from './plot/chart-renderer.js';
export { MlxLmBackend, type MlxLmBackendOptions } from './bridge/mlx-backend.js';
export { PythonRunner, type PythonRunnerOptions, type RuntimeStatus } from './bridge/python-runner.js';
export { BenchError, toBenchError, zodErrorToBenchError, exitCodeFor, type BenchErrorCode } from './api/errors.js';
export { loadConfig, getConfig, initializeConfig, resetConfig, type Config } from './config/loader.js';
export { createLogger } from './utils/logger.js';

export * from './types/index.js';
export * from './types/schemas/index.js';

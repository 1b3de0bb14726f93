/**
 * Benchmark domain types
 *
 * Shapes shared by the worker, the harness and the reporting layer.
 * Runtime validation for the ones crossing a process or file boundary
 * lives in ./schemas/benchmark.ts.
 */

/**
 * Where the metrics of an invocation came from.
 */
export type BenchmarkMode = 'real' | 'synthetic';

/**
 * Options for one benchmark invocation.
 *
 * Created once per invocation and never mutated.
 */
export interface BenchmarkConfig {
  readonly model: string;
  readonly prompt: string;
  readonly runs: number;
  readonly maxTokens: number;
  readonly temperature: number;
  readonly output: string;
  readonly strict: boolean;
}

/**
 * The subset of {@link BenchmarkConfig} the worker process receives.
 */
export type WorkerParams = Pick<
  BenchmarkConfig,
  'model' | 'prompt' | 'runs' | 'maxTokens' | 'temperature'
>;

/**
 * Timing of a single generation.
 */
export interface RunMetric {
  /** 1-based run index */
  run: number;
  latencySeconds: number;
  estimatedNewTokens: number;
  /** 0 when latency is 0 */
  estimatedTokensPerSecond: number;
}

/**
 * Everything a worker reports back for one invocation.
 */
export interface WorkerResult {
  loadSeconds: number;
  rows: RunMetric[];
  /**
   * Runs whose token estimate fell back to 0 because the tokenizer threw.
   */
  estimationFailures?: number;
}

/**
 * Result of {@link BenchmarkHarness.run}.
 */
export interface HarnessOutcome {
  mode: BenchmarkMode;
  loadSeconds: number;
  rows: RunMetric[];
}

/**
 * One persisted CSV row. Each row repeats the invocation context so it
 * stands on its own.
 */
export interface BenchmarkRecord extends RunMetric {
  timestamp: string;
  mode: BenchmarkMode;
  model: string;
  maxTokens: number;
  temperature: number;
  loadSeconds: number;
}

/**
 * Derived over all records of an invocation; never persisted.
 */
export interface SummaryStats {
  latencyMean: number;
  latencyMin: number;
  latencyMax: number;
  throughputMean: number;
}

/**
 * Row read back from an artifact for plotting.
 */
export interface PlotPoint {
  run: number;
  latencySeconds: number;
  tokensPerSecond: number;
}

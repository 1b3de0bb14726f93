/**
 * CSV artifact writer
 *
 * Column order is fixed; the plot renderer and any downstream tooling read
 * columns by header name.
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, isAbsolute, join } from 'node:path';
import { stringify } from 'csv-stringify/sync';
import type { BenchmarkRecord } from '../types/benchmark.js';
import { BenchError } from '../api/errors.js';
import { RESULTS } from '../config/defaults.js';

export const CSV_COLUMNS = [
  'timestamp',
  'run',
  'mode',
  'model',
  'max_tokens',
  'temperature',
  'latency_seconds',
  'estimated_new_tokens',
  'estimated_tokens_per_second',
  'load_seconds',
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

const FLOAT_DIGITS = 6;

export function toCsvRow(record: BenchmarkRecord): Record<CsvColumn, string> {
  return {
    timestamp: record.timestamp,
    run: String(record.run),
    mode: record.mode,
    model: record.model,
    max_tokens: String(record.maxTokens),
    temperature: String(record.temperature),
    latency_seconds: record.latencySeconds.toFixed(FLOAT_DIGITS),
    estimated_new_tokens: String(record.estimatedNewTokens),
    estimated_tokens_per_second: record.estimatedTokensPerSecond.toFixed(FLOAT_DIGITS),
    load_seconds: record.loadSeconds.toFixed(FLOAT_DIGITS),
  };
}

/**
 * A relative path without a `rootDir` segment is placed under `rootDir`.
 *
 * @example
 * resolveOutputPath('bench.csv')            // => 'results/bench.csv'
 * resolveOutputPath('results/bench.csv')    // => 'results/bench.csv'
 */
export function resolveOutputPath(output: string, rootDir: string = RESULTS.ROOT_DIR): string {
  if (isAbsolute(output)) {
    return output;
  }
  const segments = output.split(/[\\/]+/);
  return segments.includes(rootDir) ? output : join(rootDir, output);
}

export function renderCsv(records: readonly BenchmarkRecord[]): string {
  return stringify(records.map(toCsvRow), {
    header: true,
    columns: [...CSV_COLUMNS],
  });
}

/**
 * Write all records or none: the CSV goes to a temporary file beside
 * `path` and is renamed over it.
 */
export async function writeBenchmarkCsv(path: string, records: readonly BenchmarkRecord[]): Promise<void> {
  if (records.length === 0) {
    throw new BenchError('RuntimeError', 'Refusing to write an artifact without rows', { path });
  }

  const content = renderCsv(records);
  const directory = dirname(path);
  await mkdir(directory, { recursive: true });

  const tempPath = join(directory, `.${basename(path)}.${process.pid}.tmp`);
  try {
    await writeFile(tempPath, content, 'utf8');
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

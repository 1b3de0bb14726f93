/**
 * Reads a benchmark artifact back for plotting.
 *
 * Only `run`, `latency_seconds` and `estimated_tokens_per_second` are
 * used; a row missing any of them, or holding something that is not a
 * number there, is skipped.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import type { PlotPoint } from '../types/benchmark.js';
import { PlotRowSchema } from '../types/schemas/benchmark.js';
import { BenchError } from '../api/errors.js';

export interface PlotDataset {
  points: PlotPoint[];
  skipped: number;
}

export function parsePlotCsv(content: string): PlotDataset {
  let records: unknown;
  try {
    records = parse(content, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new BenchError('DataFormatError', `Unreadable CSV: ${error instanceof Error ? error.message : String(error)}`);
  }

  const points: PlotPoint[] = [];
  let skipped = 0;

  for (const record of Array.isArray(records) ? records : []) {
    const row = PlotRowSchema.safeParse(record);
    if (!row.success) {
      skipped++;
      continue;
    }
    points.push({
      run: row.data.run,
      latencySeconds: row.data.latency_seconds,
      tokensPerSecond: row.data.estimated_tokens_per_second,
    });
  }

  return { points, skipped };
}

export async function readPlotCsv(path: string): Promise<PlotDataset> {
  return parsePlotCsv(await readFile(path, 'utf8'));
}

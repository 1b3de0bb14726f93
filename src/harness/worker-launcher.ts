/**
 * Worker launch command
 *
 * The worker runs under the same Node binary and loader flags as the
 * current process, so `tsx` sources launch `.ts` entries and a build
 * launches `.js` ones.
 */

import { extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { WorkerParams } from '../types/benchmark.js';

export interface WorkerCommand {
  file: string;
  args: string[];
}

/**
 * Absolute path of worker-main beside this module, with this module's
 * extension.
 */
export function resolveWorkerEntry(): string {
  const extension = extname(fileURLToPath(import.meta.url));
  return fileURLToPath(new URL(`../worker/worker-main${extension}`, import.meta.url));
}

/**
 * Flags for the worker CLI. `--flag=value` keeps prompts that start with
 * a dash from being read as options.
 */
export function buildWorkerArgs(params: WorkerParams): string[] {
  return [
    `--model=${params.model}`,
    `--prompt=${params.prompt}`,
    `--runs=${params.runs}`,
    `--max-tokens=${params.maxTokens}`,
    `--temperature=${params.temperature}`,
  ];
}

export function buildWorkerCommand(params: WorkerParams, entry: string = resolveWorkerEntry()): WorkerCommand {
  return {
    file: process.execPath,
    args: [...process.execArgv, entry, ...buildWorkerArgs(params)],
  };
}

#!/usr/bin/env node

/**
 * Worker process entry point, spawned by the benchmark harness.
 *
 * SIGTERM/SIGINT abort the run instead of killing the process outright,
 * so the Python runtime is stopped before the worker exits.
 */

import { runWorkerCli } from './worker-cli.js';

const controller = new AbortController();
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => controller.abort());
}

process.exitCode = await runWorkerCli(process.argv.slice(2), { signal: controller.signal });

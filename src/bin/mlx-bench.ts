#!/usr/bin/env node

import { main } from '../cli/benchmark.js';

const controller = new AbortController();
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => controller.abort());
}

process.exitCode = await main(process.argv.slice(2), { signal: controller.signal });

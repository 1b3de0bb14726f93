#!/usr/bin/env node

import { main } from '../cli/plot-results.js';

process.exitCode = await main(process.argv.slice(2));

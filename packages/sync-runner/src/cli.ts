#!/usr/bin/env tsx
/**
 * CLI entry point
 *
 * Usage:
 *   geosync            (configuration comes from the environment)
 */

import { runSync } from './run.js';

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    process.stderr.write(`Received ${signal}, exiting\n`);
    process.exit(1);
  });
}

process.exitCode = await runSync(process.env);

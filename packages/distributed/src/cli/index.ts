#!/usr/bin/env node
/**
 * logfleet CLI
 *
 * Usage:
 *   logfleet coordinator --source /var/log/app.log --chunk-count 8
 *   logfleet worker --id w1 --port 8001 --coordinator http://127.0.0.1:8000
 *
 * Flags fall back to LOGFLEET_* environment variables (a `.env` file is read first).
 */

import dotenv from 'dotenv';
import { program } from 'commander';
import { isCoordinatorError } from '@logfleet/core';
import { coordinatorCommand } from './commands/coordinator.js';
import { workerCommand } from './commands/worker.js';

dotenv.config();

program.name('logfleet').description('Distributed log analysis: one coordinator, many workers').version('0.1.0');

program.addCommand(coordinatorCommand);
program.addCommand(workerCommand);

program.parseAsync().catch((err: unknown) => {
  if (isCoordinatorError(err)) {
    process.stderr.write(`${err.code}: ${err.message}\n`);
  } else {
    process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
  }
  process.exitCode = 1;
});

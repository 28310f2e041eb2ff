#!/usr/bin/env node
import { createProgram } from './cli.js';
import { TimetableError } from './errors.js';
import { logger } from './logger.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    if (err instanceof TimetableError) {
      console.error(`❌ ${err.name}: ${err.message}`);
    } else {
      console.error('❌ Unexpected error:', err);
    }
    process.exitCode = 1;
  })
  .finally(() => logger.endSession());

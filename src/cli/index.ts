#!/usr/bin/env node
/**
 * chartwright CLI entry point
 */

import { describeError, error } from './output.js';
import { createProgram } from './program.js';

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (err) {
    error(describeError(err));
    process.exitCode = 1;
  }
}

await main();

#!/usr/bin/env node
/**
 * gitglance CLI entry point
 */

import chalk from 'chalk';
import { createProgram } from '../program.js';
import { isCommandRuntimeError, renderCommandRuntimeError } from '../lib/command-runtime.js';

async function main(): Promise<void> {
  const program = createProgram({ stdout: process.stdout, env: process.env });
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (isCommandRuntimeError(error)) {
      renderCommandRuntimeError(error);
      process.exitCode = error.exitCode;
      return;
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  console.error(chalk.red(`✗ ${error instanceof Error ? error.stack ?? error.message : String(error)}`));
  process.exitCode = 1;
});

/**
 * Logger implementation for CLI
 *
 * Everything goes to stderr: stdout carries the table.
 */

import chalk from 'chalk';
import type { Logger } from '@gitglance/core';

export interface LoggerOptions {
  verbose?: boolean;
  /** Custom output function — routes all log output through this instead of console.error. */
  output?: (msg: string) => void;
}

/**
 * Create a logger instance
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const { verbose = false, output } = opts;
  const write = output ?? ((msg: string) => console.error(msg));

  return {
    debug(msg: string, data?: Record<string, unknown>) {
      if (verbose) {
        const dataStr = data ? ` ${JSON.stringify(data)}` : '';
        write(chalk.gray(`[debug] ${msg}${dataStr}`));
      }
    },

    info(msg: string, data?: Record<string, unknown>) {
      const dataStr = data && verbose ? ` ${JSON.stringify(data)}` : '';
      write(chalk.blue(`[info] ${msg}${dataStr}`));
    },

    warn(msg: string, data?: Record<string, unknown>) {
      const dataStr = data ? ` ${JSON.stringify(data)}` : '';
      write(chalk.yellow(`[warn] ${msg}${dataStr}`));
    },

    error(msg: string, data?: Record<string, unknown>) {
      const dataStr = data ? ` ${JSON.stringify(data)}` : '';
      write(chalk.red(`[error] ${msg}${dataStr}`));
    },
  };
}

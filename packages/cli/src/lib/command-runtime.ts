import chalk from 'chalk';

interface ExitCommandErrorOptions {
  json?: boolean;
  message: string;
  exitCode?: number;
  humanDetails?: string[];
}

export class CommandRuntimeError extends Error {
  readonly json: boolean;
  readonly exitCode: number;
  readonly humanDetails?: string[];

  constructor(options: ExitCommandErrorOptions) {
    super(options.message);
    this.name = 'CommandRuntimeError';
    this.json = options.json ?? false;
    this.exitCode = options.exitCode ?? 1;
    this.humanDetails = options.humanDetails;
  }
}

export function isCommandRuntimeError(error: unknown): error is CommandRuntimeError {
  return error instanceof CommandRuntimeError;
}

export interface ErrorWriters {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleWriters: ErrorWriters = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function renderCommandRuntimeError(
  error: CommandRuntimeError,
  writers: ErrorWriters = consoleWriters,
): void {
  if (error.json) {
    writers.out(JSON.stringify({ error: error.message }));
    return;
  }

  writers.err(chalk.red(`✗ ${error.message}`));

  for (const detail of error.humanDetails ?? []) {
    writers.err(detail);
  }
}

export function exitCommandError(options: ExitCommandErrorOptions): never {
  throw new CommandRuntimeError(options);
}

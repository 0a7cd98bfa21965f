/**
 * Git command execution
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFilePromise = promisify(execFile);

/** Runs `git <args>` in `cwd` and resolves to stdout; rejects on non-zero exit. */
export type GitRunner = (args: string[], cwd: string) => Promise<string>;

export class GitCommandError extends Error {
  constructor(
    readonly args: string[],
    readonly cwd: string,
    readonly stderr: string,
    cause?: unknown,
  ) {
    super(`git ${args.join(' ')} failed in ${cwd}${stderr ? `: ${stderr.trim()}` : ''}`, { cause });
    this.name = 'GitCommandError';
  }
}

function stderrOf(error: unknown): string {
  if (error && typeof error === 'object' && 'stderr' in error) {
    const { stderr } = error;
    return typeof stderr === 'string' ? stderr : '';
  }
  return '';
}

/**
 * Async git execution — does not block the event loop, so many
 * repositories can be inspected at once.
 */
export async function gitExec(args: string[], cwd: string): Promise<string> {
  try {
    const result = await execFilePromise('git', args, {
      cwd,
      encoding: 'utf-8',
      maxBuffer: 10 * 1024 * 1024,
      // Never stop to ask for credentials while fetching
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
    });
    return result.stdout;
  } catch (error) {
    throw new GitCommandError(args, cwd, stderrOf(error), error);
  }
}

/**
 * Run git, resolving to null instead of rejecting when the command fails.
 * For probes where a non-zero exit is an answer, not an error.
 */
export async function gitTry(git: GitRunner, args: string[], cwd: string): Promise<string | null> {
  try {
    return await git(args, cwd);
  } catch {
    return null;
  }
}

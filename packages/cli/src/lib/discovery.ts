/**
 * Repository discovery — folders directly inside the target that hold a
 * `.git` directory and that git accepts as a working tree.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  DETACHED_LABEL,
  Entity,
  WorkerPool,
  silentLogger,
  type Logger,
} from '@gitglance/core';
import { currentBranch } from './git-facts.js';
import { gitExec, gitTry, type GitRunner } from './git.js';

export interface DiscoverOptions {
  git?: GitRunner;
  logger?: Logger;
  /** Concurrent validation calls. */
  degree?: number;
}

/**
 * Sorted names of sub-folders containing a `.git` directory. Symlinked
 * folders count: `statSync` follows links.
 */
export function listCandidates(root: string): string[] {
  return fs
    .readdirSync(root)
    .filter((name) => {
      try {
        return fs.statSync(path.join(root, name, '.git')).isDirectory();
      } catch {
        return false;
      }
    })
    .sort();
}

function samePath(a: string, b: string): boolean {
  try {
    return fs.realpathSync(a) === fs.realpathSync(b);
  } catch {
    return false;
  }
}

/**
 * Whether `location` is the top of its own working tree. Git walks up to
 * parent folders, so a broken `.git` inside another repository would
 * otherwise report the parent's state.
 */
async function isWorkTreeRoot(git: GitRunner, location: string): Promise<boolean> {
  const toplevel = await gitTry(git, ['rev-parse', '--show-toplevel'], location);
  const trimmed = toplevel?.trim();
  return trimmed ? samePath(trimmed, location) : false;
}

/**
 * Build one entity per valid repository, in name order.
 * Candidates git rejects are left out without failing the run.
 */
export async function discoverRepos(root: string, opts: DiscoverOptions = {}): Promise<Entity[]> {
  const git = opts.git ?? gitExec;
  const logger = opts.logger ?? silentLogger;
  const pool = new WorkerPool(opts.degree);

  const found = await Promise.all(
    listCandidates(root).map((name) =>
      pool.submit(async () => {
        const location = path.join(root, name);
        if (!(await isWorkTreeRoot(git, location))) {
          logger.debug('Skipping invalid repository', { name, location });
          return null;
        }
        const branch = await currentBranch(git, location);
        return new Entity(name, branch ?? DETACHED_LABEL, location);
      }),
    ),
  );

  return found.filter((entity): entity is Entity => entity !== null);
}

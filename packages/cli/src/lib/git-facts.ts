/**
 * Fact provider backed by the git binary.
 *
 * Holds no state between calls, so the scheduler may inspect different
 * repositories from several workers at once.
 */

import type {
  Entity,
  FactProvider,
  LocalChangeFlags,
  LocalFacts,
  RemoteFacts,
  TrackingRef,
} from '@gitglance/core';
import { gitExec, gitTry, type GitRunner } from './git.js';

/**
 * Read change flags from `git status --porcelain` output.
 * Only the two XY status columns matter.
 */
export function parsePorcelainStatus(output: string): LocalChangeFlags {
  const flags: LocalChangeFlags = {
    untracked: false,
    newFiles: false,
    unstagedModifications: false,
    stagedModifications: false,
    renamed: false,
  };

  for (const line of output.split('\n')) {
    if (line.length < 2) continue;
    const x = line[0];
    const y = line[1];
    if (x === '?' && y === '?') {
      flags.untracked = true;
      continue;
    }
    if (x === 'A') flags.newFiles = true;
    if (x === 'M') flags.stagedModifications = true;
    if (x === 'R') flags.renamed = true;
    if (y === 'M') flags.unstagedModifications = true;
  }

  return flags;
}

export async function currentBranch(git: GitRunner, cwd: string): Promise<string | null> {
  const out = await gitTry(git, ['symbolic-ref', '--short', '-q', 'HEAD'], cwd);
  const branch = out?.trim();
  return branch ? branch : null;
}

async function configValue(git: GitRunner, key: string, cwd: string): Promise<string | null> {
  const out = await gitTry(git, ['config', '--get', key], cwd);
  const value = out?.trim();
  return value ? value : null;
}

export async function findTrackingRef(git: GitRunner, cwd: string): Promise<TrackingRef | null> {
  const branch = await currentBranch(git, cwd);
  if (!branch) return null;

  const remoteName = await configValue(git, `branch.${branch}.remote`, cwd);
  const merge = await configValue(git, `branch.${branch}.merge`, cwd);
  if (!remoteName || !merge) return null;

  return { remoteName, remoteBranch: merge.replace(/^refs\/heads\//, '') };
}

async function countCommits(git: GitRunner, range: string, cwd: string): Promise<number> {
  const out = await git(['rev-list', '--count', range], cwd);
  return Number.parseInt(out.trim(), 10) || 0;
}

export interface GitFactProviderOptions {
  git?: GitRunner;
}

export class GitFactProvider implements FactProvider {
  private readonly git: GitRunner;

  constructor(opts: GitFactProviderOptions = {}) {
    this.git = opts.git ?? gitExec;
  }

  async computeLocal(entity: Entity): Promise<LocalFacts> {
    const cwd = entity.location;
    const head = await gitTry(this.git, ['rev-parse', '--verify', '--quiet', 'HEAD'], cwd);
    if (head === null) {
      return { kind: 'no-baseline' };
    }

    const status = await this.git(['status', '--porcelain'], cwd);
    return { kind: 'inspected', ...parsePorcelainStatus(status) };
  }

  async computeRemote(entity: Entity, fetch: boolean): Promise<RemoteFacts> {
    const cwd = entity.location;
    const tracking = await findTrackingRef(this.git, cwd);
    if (!tracking) {
      return { kind: 'no-upstream' };
    }

    if (fetch) {
      try {
        await this.git(['fetch', tracking.remoteName], cwd);
      } catch (error) {
        return {
          kind: 'refresh-failed',
          ...tracking,
          error: error instanceof Error ? error.message : String(error),
        };
      }
    }

    const upstream = `${tracking.remoteName}/${tracking.remoteBranch}`;
    const exists = await gitTry(this.git, ['rev-parse', '--verify', '--quiet', upstream], cwd);
    if (exists === null) {
      return { kind: 'gone', ...tracking };
    }

    const unpulled = (await countCommits(this.git, `HEAD..${upstream}`, cwd)) > 0;
    const unpushed = (await countCommits(this.git, `${upstream}..HEAD`, cwd)) > 0;
    return { kind: 'tracked', ...tracking, unpulled, unpushed };
  }
}

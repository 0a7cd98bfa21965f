import { GitCommandError, type GitRunner } from '../../lib/git.js';

/** Canned answer for one git invocation; an Error makes the call fail. */
export type FakeAnswer = string | Error;

/**
 * In-process stand-in for the git binary. Answers are keyed by folder and
 * the joined argument list; anything not scripted fails like a non-zero
 * exit would.
 */
export class FakeGit {
  readonly calls: Array<{ cwd: string; args: string[] }> = [];
  private readonly answers = new Map<string, FakeAnswer>();

  on(cwd: string, command: string, answer: FakeAnswer): this {
    this.answers.set(`${cwd}|${command}`, answer);
    return this;
  }

  /** Script a healthy repository on `branch` with a clean tree. */
  repo(cwd: string, branch = 'main'): this {
    return this.on(cwd, 'rev-parse --show-toplevel', `${cwd}\n`)
      .on(cwd, 'symbolic-ref --short -q HEAD', `${branch}\n`)
      .on(cwd, 'rev-parse --verify --quiet HEAD', 'abc123\n')
      .on(cwd, 'status --porcelain', '');
  }

  /** Script `branch` tracking `remote/remoteBranch` with the given counts. */
  upstream(cwd: string, branch: string, remote: string, remoteBranch: string, behind = 0, ahead = 0): this {
    const ref = `${remote}/${remoteBranch}`;
    return this.on(cwd, `config --get branch.${branch}.remote`, `${remote}\n`)
      .on(cwd, `config --get branch.${branch}.merge`, `refs/heads/${remoteBranch}\n`)
      .on(cwd, `rev-parse --verify --quiet ${ref}`, 'def456\n')
      .on(cwd, `rev-list --count HEAD..${ref}`, `${behind}\n`)
      .on(cwd, `rev-list --count ${ref}..HEAD`, `${ahead}\n`);
  }

  readonly run: GitRunner = async (args, cwd) => {
    this.calls.push({ cwd, args });
    const answer = this.answers.get(`${cwd}|${args.join(' ')}`);
    if (answer === undefined) {
      throw new GitCommandError(args, cwd, 'fatal: not scripted');
    }
    if (answer instanceof Error) {
      throw answer;
    }
    return answer;
  };

  commands(): string[] {
    return this.calls.map((call) => call.args.join(' '));
  }
}

import { Command } from 'commander';
import {
  LOCAL_FAILED_CODE,
  NO_BASELINE_CODE,
  NO_UPSTREAM_CODE,
  REFRESH_FAILED_CODE,
  STATUS_DESCRIPTIONS,
  SUMMARY_PRECEDENCE,
  UPSTREAM_GONE_CODE,
  type SummaryStatus,
} from '@gitglance/core';
import { REPOS_PATH_ENV_VAR, type CliFlags } from './lib/config.js';
import { runSummary, type SummaryDeps } from './lib/summary.js';

export const VERSION = '1.0.0';

const COLOR_NAMES: Record<SummaryStatus, string> = {
  clean: 'Green',
  'local-dirty': 'Red',
  'no-upstream': 'Yellow',
  'remote-dirty': 'Cyan',
  'refresh-failed': 'Magenta',
  'no-baseline': 'Inverted yellow',
};

export function buildEpilog(): string {
  const colors = SUMMARY_PRECEDENCE
    .map((status) => `    ${COLOR_NAMES[status].padEnd(17)}${STATUS_DESCRIPTIONS[status]}`)
    .join('\n');

  return `
Every folder inside PATH that holds a git repo becomes one row of the table.
PATH may also come from the ${REPOS_PATH_ENV_VAR} env var or ~/.gitglance/config.json.

State codes:

    ?  untracked files
    +  new (staged) files
    m  unstaged modifications to files
    M  staged modifications to files
    R  renamed files
    v  unpulled commits
    ^  unpushed commits

    ${NO_BASELINE_CODE}    no commits in repo yet
    ${LOCAL_FAILED_CODE}    local state could not be read
         ${NO_UPSTREAM_CODE}  no remote tracking branch
         ${UPSTREAM_GONE_CODE}  tracking branch is gone on remote
         ${REFRESH_FAILED_CODE}  error fetching from remote

Colors:

${colors}

Cells are filled in as results arrive, using ANSI cursor addressing. When
output is redirected or piped, --simple is implied and rows are written in
order instead.
`;
}

export function createProgram(deps: SummaryDeps): Command {
  const program = new Command();

  program
    .name('gitglance')
    .description('Summarise the git repositories in a folder')
    .version(VERSION)
    .argument('[path]', `folder containing repos (default: $${REPOS_PATH_ENV_VAR})`)
    .option('-t, --tracking', 'display tracking branch name')
    .option('-f, --fetch', "run a 'git fetch' on each repo before reporting its remote state (slow)")
    .option('-m, --monochrome', "don't use colors in output")
    .option('-s, --simple', 'write rows sequentially instead of in place; implies -m')
    .option('-c, --clear', 'always clear the screen before drawing the table')
    .option('-S, --sequential', 'inspect repos one at a time instead of concurrently')
    .option('-j, --jobs <n>', 'number of concurrent git inspections')
    .option('--json', 'print a JSON summary once every repo is inspected')
    .option('-v, --verbose', 'log debug details to stderr')
    .addHelpText('after', buildEpilog())
    .action(async (pathArg: string | undefined, options: CliFlags) => {
      await runSummary(pathArg, options, deps);
    });

  return program;
}

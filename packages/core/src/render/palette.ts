import chalk, { type ChalkInstance } from 'chalk';
import type { SummaryStatus } from '../entity/status.js';

type Style = (c: ChalkInstance) => ChalkInstance;

/** Colours suited to a dark background. */
export const STATUS_STYLES: Record<SummaryStatus, Style> = {
  clean: (c) => c.green,
  'local-dirty': (c) => c.red,
  'no-upstream': (c) => c.yellow,
  'remote-dirty': (c) => c.cyan,
  'refresh-failed': (c) => c.magenta,
  'no-baseline': (c) => c.black.bgYellow,
};

export const STATUS_DESCRIPTIONS: Record<SummaryStatus, string> = {
  clean: 'Everything good',
  'local-dirty': 'Local has uncommitted changes',
  'no-upstream': 'Local good but branch has no remote (or not fetched yet)',
  'remote-dirty': 'Local good but unpulled/unpushed commits',
  'refresh-failed': 'Local good but tried and failed to refresh from remote',
  'no-baseline': 'Repo has no commits yet',
};

export function colorize(
  text: string,
  status: SummaryStatus | undefined,
  c: ChalkInstance = chalk,
): string {
  if (!status) return text;
  return STATUS_STYLES[status](c)(text);
}

import type { Entity } from './shared.js';

export type SummaryStatus =
  | 'no-baseline'
  | 'local-dirty'
  | 'no-upstream'
  | 'refresh-failed'
  | 'remote-dirty'
  | 'clean';

/** Highest precedence first. */
export const SUMMARY_PRECEDENCE: readonly SummaryStatus[] = [
  'no-baseline',
  'local-dirty',
  'no-upstream',
  'refresh-failed',
  'remote-dirty',
  'clean',
];

const STATUS_TESTS: Record<SummaryStatus, (entity: Entity) => boolean> = {
  'no-baseline': (entity) => !entity.hasBaseline(),
  'local-dirty': (entity) => entity.isLocalDirty(),
  // also covers remote facts that have not arrived yet
  'no-upstream': (entity) => !entity.hasUpstream(),
  'refresh-failed': (entity) => entity.remoteFacts?.kind === 'refresh-failed',
  'remote-dirty': (entity) => entity.isRemoteDirty(),
  clean: () => true,
};

/**
 * Best known summary for an entity: the first status in
 * SUMMARY_PRECEDENCE whose condition holds, or undefined before its local
 * facts arrive. Re-evaluated on every phase event; later facts only refine it.
 */
export function summaryStatus(entity: Entity): SummaryStatus | undefined {
  if (!entity.hasLocalFacts) return undefined;
  return SUMMARY_PRECEDENCE.find((status) => STATUS_TESTS[status](entity));
}

/**
 * Compact state codes shown in the `state` column.
 *
 * Each table is an ordered list of (code, predicate) pairs so the rendered
 * string always has the same shape: one character per fact, a space where
 * the fact does not hold.
 */

import type { LocalChangeFlags, LocalFacts, RemoteFacts } from './shared.js';

type FactTable<T> = ReadonlyArray<readonly [code: string, holds: (facts: T) => boolean]>;

export const LOCAL_FACT_CODES: FactTable<LocalChangeFlags> = [
  ['?', (f) => f.untracked],
  ['+', (f) => f.newFiles],
  ['m', (f) => f.unstagedModifications],
  ['M', (f) => f.stagedModifications],
  ['R', (f) => f.renamed],
];

interface RemoteChangeFlags {
  unpulled: boolean;
  unpushed: boolean;
}

export const REMOTE_FACT_CODES: FactTable<RemoteChangeFlags> = [
  ['v', (f) => f.unpulled],
  ['^', (f) => f.unpushed],
];

export const LOCAL_CODE_WIDTH = LOCAL_FACT_CODES.length;
export const REMOTE_CODE_WIDTH = REMOTE_FACT_CODES.length;
/** Width of the whole `state` column: local code followed by remote code. */
export const STATE_CODE_WIDTH = LOCAL_CODE_WIDTH + REMOTE_CODE_WIDTH;

export const NO_BASELINE_CODE = '00000';
export const LOCAL_FAILED_CODE = 'XXXXX';
export const NO_UPSTREAM_CODE = '--';
export const UPSTREAM_GONE_CODE = '@@';
export const REFRESH_FAILED_CODE = 'XX';

export function condenseFacts<T>(table: FactTable<T>, facts: T, absent = ' '): string {
  return table.map(([code, holds]) => (holds(facts) ? code : absent)).join('');
}

export function localStateCode(facts: LocalFacts): string {
  switch (facts.kind) {
    case 'no-baseline':
      return NO_BASELINE_CODE;
    case 'failed':
      return LOCAL_FAILED_CODE;
    case 'inspected':
      return condenseFacts(LOCAL_FACT_CODES, facts);
  }
}

export function remoteStateCode(facts: RemoteFacts): string {
  switch (facts.kind) {
    case 'no-upstream':
      return NO_UPSTREAM_CODE;
    case 'gone':
      return UPSTREAM_GONE_CODE;
    case 'refresh-failed':
      return REFRESH_FAILED_CODE;
    case 'tracked':
      return condenseFacts(REMOTE_FACT_CODES, facts);
  }
}

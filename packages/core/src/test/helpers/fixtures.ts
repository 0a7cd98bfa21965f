import { Entity } from '../../entity/shared.js';
import type { LocalChangeFlags, LocalFacts, RemoteFacts } from '../../entity/shared.js';

export function inspected(flags: Partial<LocalChangeFlags> = {}): Extract<LocalFacts, { kind: 'inspected' }> {
  return {
    kind: 'inspected',
    untracked: false,
    newFiles: false,
    unstagedModifications: false,
    stagedModifications: false,
    renamed: false,
    ...flags,
  };
}

export function tracked(
  flags: { unpulled?: boolean; unpushed?: boolean } = {},
  remoteBranch = 'main',
): RemoteFacts {
  return {
    kind: 'tracked',
    remoteName: 'origin',
    remoteBranch,
    unpulled: flags.unpulled ?? false,
    unpushed: flags.unpushed ?? false,
  };
}

export function makeEntity(name: string, label = 'main'): Entity {
  return new Entity(name, label, `/repos/${name}`);
}

/**
 * The three-repo table used across renderer tests:
 * A clean and in sync, B dirty and ahead, C without commits or upstream.
 */
export function abcEntities(): Entity[] {
  return [makeEntity('A', 'main'), makeEntity('B', 'dev'), makeEntity('C', 'feature')];
}

export function applyAbcFacts([a, b, c]: Entity[]): void {
  a.setLocalFacts(inspected());
  a.setRemoteFacts(tracked());
  b.setLocalFacts(inspected({ untracked: true, stagedModifications: true }));
  b.setRemoteFacts(tracked({ unpushed: true }, 'dev'));
  c.setLocalFacts({ kind: 'no-baseline' });
  c.setRemoteFacts({ kind: 'no-upstream' });
}

export interface PhaseEvent {
  name: string;
  phase: 'local' | 'remote';
}

/** Every arrival order of local/remote events in which each local precedes its remote. */
export function validArrivalOrders(names: string[]): PhaseEvent[][] {
  const orders: PhaseEvent[][] = [];
  const walk = (prefix: PhaseEvent[], localDone: Set<string>, remoteDone: Set<string>) => {
    if (prefix.length === names.length * 2) {
      orders.push(prefix);
      return;
    }
    for (const name of names) {
      if (!localDone.has(name)) {
        walk([...prefix, { name, phase: 'local' }], new Set([...localDone, name]), remoteDone);
      } else if (!remoteDone.has(name)) {
        walk([...prefix, { name, phase: 'remote' }], localDone, new Set([...remoteDone, name]));
      }
    }
  };
  walk([], new Set(), new Set());
  return orders;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

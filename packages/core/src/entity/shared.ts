/**
 * Entity model — one inspected repository and the facts gathered about it.
 *
 * Facts are written once per phase by the scheduler and read by renderers
 * after the corresponding phase event fires. No filesystem or git I/O.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Phase = 'local' | 'remote';

export interface LocalChangeFlags {
  untracked: boolean;
  newFiles: boolean;
  unstagedModifications: boolean;
  stagedModifications: boolean;
  renamed: boolean;
}

export type LocalFacts =
  | { kind: 'no-baseline' }
  | ({ kind: 'inspected' } & LocalChangeFlags)
  | { kind: 'failed'; error: string };

export interface TrackingRef {
  remoteName: string;
  remoteBranch: string;
}

export type RemoteFacts =
  | { kind: 'no-upstream' }
  | ({ kind: 'gone' } & TrackingRef)
  | ({ kind: 'refresh-failed'; error?: string } & TrackingRef)
  | ({ kind: 'tracked'; unpulled: boolean; unpushed: boolean } & TrackingRef);

export const DETACHED_LABEL = '--- detached? ---';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class EntityStateError extends Error {
  constructor(readonly entityName: string, message: string) {
    super(`${entityName}: ${message}`);
    this.name = 'EntityStateError';
  }
}

// ---------------------------------------------------------------------------
// Entity
// ---------------------------------------------------------------------------

export class Entity {
  private local: LocalFacts | undefined;
  private remote: RemoteFacts | undefined;

  constructor(
    readonly name: string,
    readonly label: string,
    readonly location: string,
  ) {}

  get localFacts(): LocalFacts | undefined {
    return this.local;
  }

  get remoteFacts(): RemoteFacts | undefined {
    return this.remote;
  }

  get hasLocalFacts(): boolean {
    return this.local !== undefined;
  }

  get hasRemoteFacts(): boolean {
    return this.remote !== undefined;
  }

  setLocalFacts(facts: LocalFacts): void {
    if (this.local !== undefined) {
      throw new EntityStateError(this.name, 'local facts already set');
    }
    this.local = facts;
  }

  setRemoteFacts(facts: RemoteFacts): void {
    if (this.local === undefined) {
      throw new EntityStateError(this.name, 'remote facts set before local facts');
    }
    if (this.remote !== undefined) {
      throw new EntityStateError(this.name, 'remote facts already set');
    }
    this.remote = facts;
  }

  /** False until local facts arrive, and for repositories without commits. */
  hasBaseline(): boolean {
    return this.local !== undefined && this.local.kind !== 'no-baseline';
  }

  isLocalDirty(): boolean {
    const local = this.local;
    if (!local || local.kind === 'no-baseline') return false;
    if (local.kind === 'failed') return true;
    return (
      local.untracked ||
      local.newFiles ||
      local.unstagedModifications ||
      local.stagedModifications ||
      local.renamed
    );
  }

  hasUpstream(): boolean {
    return this.remote !== undefined && this.remote.kind !== 'no-upstream';
  }

  isRemoteDirty(): boolean {
    return this.remote?.kind === 'tracked' && (this.remote.unpulled || this.remote.unpushed);
  }

  /** `remote/branch` when a tracking branch is known, otherwise empty. */
  trackingBranch(): string {
    const remote = this.remote;
    if (!remote || remote.kind === 'no-upstream') return '';
    if (!remote.remoteName || !remote.remoteBranch) return '';
    return `${remote.remoteName}/${remote.remoteBranch}`;
  }
}

/**
 * Pipeline schedulers — drive the two inspection phases for every entity.
 *
 * Per entity the order is total: local phase, local hook, remote phase,
 * remote hook. Across entities nothing is ordered; the concurrent scheduler
 * lets them race through a shared worker pool.
 *
 * Provider failures never escape: they are converted into facts the
 * renderers know how to show, so one broken repository cannot stall or
 * cancel the rest of the run.
 */

import type { Entity, LocalFacts, RemoteFacts } from '../entity/shared.js';
import { silentLogger, type Logger } from '../logger.js';
import { DEFAULT_POOL_DEGREE, WorkerPool } from './pool.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FactProvider {
  computeLocal(entity: Entity): Promise<LocalFacts>;
  computeRemote(entity: Entity, fetch: boolean): Promise<RemoteFacts>;
}

export interface PhaseListener {
  onLocalComplete(entity: Entity): void;
  onRemoteComplete(entity: Entity): void;
}

export interface SchedulerOptions {
  provider: FactProvider;
  listener: PhaseListener;
  /** Refresh from the remote before comparing branches (slow). */
  fetch?: boolean;
  logger?: Logger;
}

export interface Scheduler {
  run(entities: readonly Entity[]): Promise<void>;
}

// ---------------------------------------------------------------------------
// Phase execution
// ---------------------------------------------------------------------------

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

abstract class PhaseRunner implements Scheduler {
  protected readonly provider: FactProvider;
  protected readonly listener: PhaseListener;
  protected readonly fetch: boolean;
  protected readonly logger: Logger;

  constructor(opts: SchedulerOptions) {
    this.provider = opts.provider;
    this.listener = opts.listener;
    this.fetch = opts.fetch ?? false;
    this.logger = opts.logger ?? silentLogger;
  }

  abstract run(entities: readonly Entity[]): Promise<void>;

  protected async runLocal(entity: Entity): Promise<void> {
    let facts: LocalFacts;
    try {
      facts = await this.provider.computeLocal(entity);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.debug('Local inspection failed', { entity: entity.name, error: message });
      facts = { kind: 'failed', error: message };
    }
    entity.setLocalFacts(facts);
  }

  protected async runRemote(entity: Entity): Promise<void> {
    let facts: RemoteFacts;
    try {
      facts = await this.provider.computeRemote(entity, this.fetch);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.debug('Remote inspection failed', { entity: entity.name, error: message });
      facts = { kind: 'refresh-failed', remoteName: '', remoteBranch: '', error: message };
    }
    entity.setRemoteFacts(facts);
  }
}

// ---------------------------------------------------------------------------
// Schedulers
// ---------------------------------------------------------------------------

/**
 * One entity at a time, in list order. Deterministic reference behaviour.
 */
export class SequentialScheduler extends PhaseRunner {
  async run(entities: readonly Entity[]): Promise<void> {
    for (const entity of entities) {
      await this.runLocal(entity);
      this.listener.onLocalComplete(entity);
      await this.runRemote(entity);
      this.listener.onRemoteComplete(entity);
    }
  }
}

export interface ConcurrentSchedulerOptions extends SchedulerOptions {
  degree?: number;
}

/**
 * Every local phase is queued up front; each remote phase is queued on the
 * same pool as soon as its entity's local phase completes.
 */
export class ConcurrentScheduler extends PhaseRunner {
  private readonly pool: WorkerPool;

  constructor(opts: ConcurrentSchedulerOptions) {
    super(opts);
    this.pool = new WorkerPool(opts.degree ?? DEFAULT_POOL_DEGREE);
  }

  get degree(): number {
    return this.pool.degree;
  }

  async run(entities: readonly Entity[]): Promise<void> {
    const pipelines = entities.map(async (entity) => {
      await this.pool.submit(() => this.runLocal(entity));
      this.listener.onLocalComplete(entity);
      await this.pool.submit(() => this.runRemote(entity));
      this.listener.onRemoteComplete(entity);
    });
    await Promise.all(pipelines);
  }
}

export interface CreateSchedulerOptions extends ConcurrentSchedulerOptions {
  sequential?: boolean;
}

export function createScheduler(opts: CreateSchedulerOptions): Scheduler {
  return opts.sequential ? new SequentialScheduler(opts) : new ConcurrentScheduler(opts);
}

/**
 * Tests for the sequential and concurrent phase schedulers
 */

import { describe, it, expect, vi } from 'vitest';
import type { Entity, LocalFacts, RemoteFacts } from '../entity/shared.js';
import {
  ConcurrentScheduler,
  SequentialScheduler,
  createScheduler,
  type FactProvider,
  type PhaseListener,
} from '../pipeline/scheduler.js';
import { SequentialRenderer } from '../render/sequential.js';
import type { Logger } from '../logger.js';
import { inspected, makeEntity, sleep, tracked } from './helpers/fixtures.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Provider that logs every call boundary and can be told to wait or fail. */
class RecordingProvider implements FactProvider {
  readonly log: string[] = [];
  readonly fetchFlags: boolean[] = [];
  active = 0;
  maxActive = 0;

  constructor(
    private readonly delays: Record<string, number> = {},
    private readonly failing: ReadonlySet<string> = new Set(),
  ) {}

  async computeLocal(entity: Entity): Promise<LocalFacts> {
    await this.call('local', entity.name);
    return inspected({ untracked: entity.name === 'B' });
  }

  async computeRemote(entity: Entity, fetch: boolean): Promise<RemoteFacts> {
    this.fetchFlags.push(fetch);
    await this.call('remote', entity.name);
    return tracked();
  }

  private async call(phase: string, name: string): Promise<void> {
    this.log.push(`${phase}:start:${name}`);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await sleep(this.delays[`${phase}:${name}`] ?? this.delays[name] ?? 0);
      if (this.failing.has(name)) {
        throw new Error(`${phase} failed for ${name}`);
      }
    } finally {
      this.active--;
      this.log.push(`${phase}:end:${name}`);
    }
  }
}

function recordingListener(log: string[]): PhaseListener {
  return {
    onLocalComplete: (entity) => log.push(`hook:local:${entity.name}`),
    onRemoteComplete: (entity) => log.push(`hook:remote:${entity.name}`),
  };
}

function indexOf(log: string[], entry: string): number {
  const index = log.indexOf(entry);
  expect(index, `missing ${entry}`).toBeGreaterThanOrEqual(0);
  return index;
}

function entities(...names: string[]): Entity[] {
  return names.map((name) => makeEntity(name));
}

// ---------------------------------------------------------------------------
// SequentialScheduler
// ---------------------------------------------------------------------------

describe('SequentialScheduler', () => {
  it('runs both phases of each entity in list order', async () => {
    const provider = new RecordingProvider();
    const log = provider.log;
    const scheduler = new SequentialScheduler({ provider, listener: recordingListener(log) });

    await scheduler.run(entities('A', 'B'));

    expect(log).toEqual([
      'local:start:A',
      'local:end:A',
      'hook:local:A',
      'remote:start:A',
      'remote:end:A',
      'hook:remote:A',
      'local:start:B',
      'local:end:B',
      'hook:local:B',
      'remote:start:B',
      'remote:end:B',
      'hook:remote:B',
    ]);
  });

  it('passes the fetch flag to the remote phase', async () => {
    const provider = new RecordingProvider();
    const scheduler = new SequentialScheduler({
      provider,
      listener: recordingListener([]),
      fetch: true,
    });

    await scheduler.run(entities('A', 'B'));

    expect(provider.fetchFlags).toEqual([true, true]);
  });
});

// ---------------------------------------------------------------------------
// ConcurrentScheduler
// ---------------------------------------------------------------------------

describe('ConcurrentScheduler', () => {
  it('defaults to eight workers', () => {
    const scheduler = new ConcurrentScheduler({
      provider: new RecordingProvider(),
      listener: recordingListener([]),
    });
    expect(scheduler.degree).toBe(8);
  });

  it('never starts a remote phase before its local phase and hook complete', async () => {
    const provider = new RecordingProvider({
      'local:A': 15,
      'local:B': 1,
      'local:C': 8,
      'remote:B': 20,
      'remote:C': 2,
    });
    const log = provider.log;
    const scheduler = new ConcurrentScheduler({ provider, listener: recordingListener(log) });

    await scheduler.run(entities('A', 'B', 'C'));

    for (const name of ['A', 'B', 'C']) {
      const localEnd = indexOf(log, `local:end:${name}`);
      const localHook = indexOf(log, `hook:local:${name}`);
      const remoteStart = indexOf(log, `remote:start:${name}`);
      const remoteHook = indexOf(log, `hook:remote:${name}`);
      expect(localEnd).toBeLessThan(localHook);
      expect(localHook).toBeLessThan(remoteStart);
      expect(remoteStart).toBeLessThan(remoteHook);
    }
  });

  it('lets entities overtake each other', async () => {
    const provider = new RecordingProvider({ A: 25, B: 1 });
    const log = provider.log;
    const scheduler = new ConcurrentScheduler({ provider, listener: recordingListener(log) });

    await scheduler.run(entities('A', 'B'));

    expect(indexOf(log, 'hook:remote:B')).toBeLessThan(indexOf(log, 'hook:local:A'));
  });

  it('bounds concurrent provider calls by the degree', async () => {
    const provider = new RecordingProvider(
      Object.fromEntries(['A', 'B', 'C', 'D', 'E', 'F'].map((name, i) => [name, 2 + (i % 3)])),
    );
    const scheduler = new ConcurrentScheduler({
      provider,
      listener: recordingListener([]),
      degree: 2,
    });

    await scheduler.run(entities('A', 'B', 'C', 'D', 'E', 'F'));

    expect(provider.maxActive).toBe(2);
  });

  it('isolates an entity whose provider calls always fail', async () => {
    const provider = new RecordingProvider({ A: 3, C: 1 }, new Set(['B']));
    const log: string[] = [];
    const debug = vi.fn();
    const logger: Logger = { debug, info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const list = entities('A', 'B', 'C');
    const scheduler = new ConcurrentScheduler({
      provider,
      listener: recordingListener(log),
      logger,
    });

    await scheduler.run(list);

    const [a, b, c] = list;
    expect(log.filter((entry) => entry.startsWith('hook:remote:')).sort()).toEqual([
      'hook:remote:A',
      'hook:remote:B',
      'hook:remote:C',
    ]);
    expect(a.remoteFacts?.kind).toBe('tracked');
    expect(c.remoteFacts?.kind).toBe('tracked');
    expect(b.localFacts).toEqual({ kind: 'failed', error: 'local failed for B' });
    expect(b.remoteFacts).toEqual({
      kind: 'refresh-failed',
      remoteName: '',
      remoteBranch: '',
      error: 'remote failed for B',
    });
    expect(debug).toHaveBeenCalledWith('Local inspection failed', {
      entity: 'B',
      error: 'local failed for B',
    });
    expect(debug).toHaveBeenCalledWith('Remote inspection failed', {
      entity: 'B',
      error: 'remote failed for B',
    });
  });

  it('produces the same sequential table as the sequential scheduler', async () => {
    const render = async (concurrent: boolean): Promise<string> => {
      const list = entities('A', 'B', 'C', 'D');
      const chunks: string[] = [];
      const renderer = new SequentialRenderer(list, {
        path: '/repos',
        sink: { write: (text: string) => chunks.push(text) },
      });
      const provider = new RecordingProvider({ A: 12, B: 1, C: 6, D: 0 });
      await renderer.start();
      const scheduler = createScheduler({ sequential: !concurrent, provider, listener: renderer });
      await scheduler.run(list);
      expect(renderer.isComplete).toBe(true);
      return chunks.join('');
    };

    expect(await render(true)).toBe(await render(false));
  });
});

describe('createScheduler', () => {
  it('selects the scheduler from the sequential flag', () => {
    const base = { provider: new RecordingProvider(), listener: recordingListener([]) };

    expect(createScheduler({ ...base, sequential: true })).toBeInstanceOf(SequentialScheduler);
    expect(createScheduler({ ...base, degree: 3 })).toBeInstanceOf(ConcurrentScheduler);
  });
});

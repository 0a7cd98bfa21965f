/**
 * Sequential renderer — writes the table as a plain, strictly ordered text
 * stream (redirected output, pipes, dumb terminals).
 *
 * Phase events arrive in any cross-entity order, but the stream can only be
 * appended to. A single render position marks the next cell the stream is
 * waiting for; events that arrive early are recorded and written once the
 * position reaches them.
 */

import { localStateCode, remoteStateCode, STATE_CODE_WIDTH } from '../entity/codes.js';
import { EntityStateError, type Entity } from '../entity/shared.js';
import {
  HEADER_BRANCH,
  HEADER_REPO,
  HEADER_STATE,
  HEADER_TRACKING,
  computeColumnWidths,
  rule,
  titleLine,
  type ColumnWidths,
  type RenderOptions,
  type StatusRenderer,
  type TextSink,
} from './layout.js';

export interface RenderPosition {
  index: number;
  stage: 'awaiting-local' | 'awaiting-remote';
}

export interface SequentialRendererOptions extends RenderOptions {
  sink: TextSink;
}

export class SequentialRenderer implements StatusRenderer {
  private readonly entities: readonly Entity[];
  private readonly indexOf = new Map<Entity, number>();
  private readonly localKnown = new Set<number>();
  private readonly remoteKnown = new Set<number>();
  private readonly widths: ColumnWidths;
  private readonly sink: TextSink;
  private readonly path: string;
  private readonly tracking: boolean;
  private started = false;
  private cursor: RenderPosition | undefined;

  constructor(entities: readonly Entity[], opts: SequentialRendererOptions) {
    this.entities = entities;
    entities.forEach((entity, i) => this.indexOf.set(entity, i));
    this.widths = computeColumnWidths(entities);
    this.sink = opts.sink;
    this.path = opts.path;
    this.tracking = opts.tracking ?? false;
  }

  /** Next cell the stream is waiting for; undefined once every row is written. */
  get position(): RenderPosition | undefined {
    return this.cursor;
  }

  get isComplete(): boolean {
    return this.started && this.cursor === undefined;
  }

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    this.sink.write(`${titleLine(this.path)}\n\n`);
    this.sink.write(
      this.nameCell(HEADER_REPO) +
        this.labelCell(HEADER_BRANCH) +
        HEADER_STATE +
        this.trackingTail('  ', HEADER_TRACKING),
    );
    this.sink.write(
      this.nameCell(rule(this.widths.name)) +
        this.labelCell(rule(this.widths.label)) +
        rule(STATE_CODE_WIDTH) +
        this.trackingTail('', rule(HEADER_TRACKING.length)),
    );

    if (this.entities.length > 0) {
      this.beginRow(0);
    }
    this.writeOutstanding();
  }

  onLocalComplete(entity: Entity): void {
    this.localKnown.add(this.lookup(entity));
    this.writeOutstanding();
  }

  onRemoteComplete(entity: Entity): void {
    this.remoteKnown.add(this.lookup(entity));
    this.writeOutstanding();
  }

  private lookup(entity: Entity): number {
    const index = this.indexOf.get(entity);
    if (index === undefined) {
      throw new EntityStateError(entity.name, 'not part of this table');
    }
    return index;
  }

  /** Write forward from the current position for as long as facts allow. */
  private writeOutstanding(): void {
    if (!this.started) return;
    while (this.step()) {
      // keep advancing
    }
  }

  /** Returns whether the position moved. */
  private step(): boolean {
    const position = this.cursor;
    if (!position) return false;

    const entity = this.entities[position.index];
    if (position.stage === 'awaiting-local') {
      if (!this.localKnown.has(position.index)) return false;
      const facts = entity.localFacts;
      if (!facts) throw new EntityStateError(entity.name, 'local event without local facts');
      this.sink.write(localStateCode(facts));
      this.cursor = { index: position.index, stage: 'awaiting-remote' };
      return true;
    }

    if (!this.remoteKnown.has(position.index)) return false;
    const facts = entity.remoteFacts;
    if (!facts) throw new EntityStateError(entity.name, 'remote event without remote facts');
    this.sink.write(remoteStateCode(facts) + this.trackingTail('', entity.trackingBranch()));

    const next = position.index + 1;
    if (next >= this.entities.length) {
      this.cursor = undefined;
      return false;
    }
    this.beginRow(next);
    return true;
  }

  private beginRow(index: number): void {
    const entity = this.entities[index];
    this.sink.write(this.nameCell(entity.name) + this.labelCell(entity.label));
    this.cursor = { index, stage: 'awaiting-local' };
  }

  private nameCell(text: string): string {
    return `${text.padEnd(this.widths.name)}  `;
  }

  private labelCell(text: string): string {
    return `${text.padEnd(this.widths.label)}  `;
  }

  /** Remote part of a row: code, optional tracking column, newline. */
  private trackingTail(code: string, tracking: string): string {
    if (!this.tracking) return `${code}\n`;
    return `${code}${`  ${tracking}`.trimEnd()}\n`;
  }
}

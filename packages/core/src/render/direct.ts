/**
 * Direct-addressed renderer — every cell has a fixed screen position, so
 * each phase event is drawn the moment it arrives, in any order.
 *
 * The only cross-phase concern is the row colour: it is recomputed from
 * all facts known so far after every event.
 */

import type { ChalkInstance } from 'chalk';
import {
  LOCAL_CODE_WIDTH,
  STATE_CODE_WIDTH,
  localStateCode,
  remoteStateCode,
} from '../entity/codes.js';
import { EntityStateError, type Entity } from '../entity/shared.js';
import { summaryStatus } from '../entity/status.js';
import { AnsiWriter, type CursorProbe } from './ansi.js';
import {
  HEADER_BRANCH,
  HEADER_REPO,
  HEADER_STATE,
  HEADER_TRACKING,
  computeColumnWidths,
  rule,
  titleLine,
  trackingWidth,
  type RenderOptions,
  type StatusRenderer,
  type TextSink,
} from './layout.js';
import { colorize } from './palette.js';

const TITLE_ROW = 0;
const HEADER_ROW = 2;
const RULE_ROW = 3;
const PENDING_STATE = '_'.repeat(STATE_CODE_WIDTH);

export interface DirectRendererOptions extends RenderOptions {
  sink: TextSink;
  probe?: CursorProbe;
  monochrome?: boolean;
  forceClear?: boolean;
  /** Chalk instance used for row colours; defaults to the global one. */
  chalk?: ChalkInstance;
}

export interface DirectColumns {
  name: number;
  label: number;
  state: number;
  remote: number;
  tracking: number;
}

export class DirectRenderer implements StatusRenderer {
  private readonly entities: readonly Entity[];
  private readonly rows = new Map<Entity, number>();
  private readonly opts: DirectRendererOptions;
  private readonly nameWidth: number;
  private readonly labelWidth: number;
  readonly columns: DirectColumns;
  private writer: AnsiWriter | undefined;

  constructor(entities: readonly Entity[], opts: DirectRendererOptions) {
    this.entities = entities;
    this.opts = opts;
    entities.forEach((entity, i) => this.rows.set(entity, RULE_ROW + 1 + i));

    const widths = computeColumnWidths(entities);
    this.nameWidth = widths.name;
    this.labelWidth = widths.label;
    const label = widths.name + 3;
    const state = label + widths.label + 2;
    this.columns = {
      name: 0,
      label,
      state,
      remote: state + LOCAL_CODE_WIDTH,
      tracking: state + STATE_CODE_WIDTH + 2,
    };
  }

  /** Header rows plus one row per entity. */
  get rowsNeeded(): number {
    return RULE_ROW + 1 + this.entities.length;
  }

  async start(): Promise<void> {
    if (this.writer) return;
    this.writer = await AnsiWriter.open({
      rowsNeeded: this.rowsNeeded,
      sink: this.opts.sink,
      probe: this.opts.probe,
      forceClear: this.opts.forceClear,
    });

    this.writeHeader();
    for (const entity of this.entities) {
      this.write(entity, this.columns.name, entity.name);
      this.write(entity, this.columns.label, entity.label);
      this.write(entity, this.columns.state, PENDING_STATE);
    }
  }

  onLocalComplete(entity: Entity): void {
    const facts = entity.localFacts;
    if (!facts) throw new EntityStateError(entity.name, 'local event without local facts');
    this.writeName(entity);
    this.write(entity, this.columns.state, localStateCode(facts));
  }

  onRemoteComplete(entity: Entity): void {
    const facts = entity.remoteFacts;
    if (!facts) throw new EntityStateError(entity.name, 'remote event without remote facts');
    this.writeName(entity);
    this.write(entity, this.columns.remote, remoteStateCode(facts));
    if (this.opts.tracking) {
      this.write(entity, this.columns.tracking, entity.trackingBranch());
      // the tracking rule grows with the longest branch seen so far
      this.writeHeader();
    }
  }

  private writeHeader(): void {
    const writer = this.requireWriter();
    const { label, state, tracking } = this.columns;
    writer.writeAt(TITLE_ROW, 0, titleLine(this.opts.path));
    writer.writeAt(HEADER_ROW, 0, HEADER_REPO);
    writer.writeAt(RULE_ROW, 0, rule(this.nameWidth));
    writer.writeAt(HEADER_ROW, label, HEADER_BRANCH);
    writer.writeAt(RULE_ROW, label, rule(this.labelWidth));
    const stateHeader = `${HEADER_STATE}  `;
    writer.writeAt(HEADER_ROW, state, stateHeader);
    writer.writeAt(RULE_ROW, state, rule(stateHeader.length));
    if (this.opts.tracking) {
      writer.writeAt(HEADER_ROW, tracking, HEADER_TRACKING);
      writer.writeAt(RULE_ROW, tracking, rule(trackingWidth(this.entities)));
    }
  }

  private writeName(entity: Entity): void {
    const name = this.opts.monochrome
      ? entity.name
      : colorize(entity.name, summaryStatus(entity), this.opts.chalk);
    this.write(entity, this.columns.name, name);
  }

  private write(entity: Entity, col: number, text: string): void {
    const row = this.rows.get(entity);
    if (row === undefined) {
      throw new EntityStateError(entity.name, 'not part of this table');
    }
    this.requireWriter().writeAt(row, col, text);
  }

  private requireWriter(): AnsiWriter {
    if (!this.writer) {
      throw new Error('DirectRenderer.start() must complete before phase events');
    }
    return this.writer;
  }
}

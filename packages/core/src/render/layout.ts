/**
 * Fixed table geometry shared by the renderers.
 */

import type { Entity } from '../entity/shared.js';
import type { PhaseListener } from '../pipeline/scheduler.js';

export const HEADER_REPO = 'repo name';
export const HEADER_BRANCH = 'branch';
export const HEADER_STATE = 'state';
export const HEADER_TRACKING = 'tracking branch';
export const HEADER_RULE = '=';

/** Anything text can be written to — usually `process.stdout`. */
export interface TextSink {
  write(text: string): unknown;
}

export interface StatusRenderer extends PhaseListener {
  /** Draw everything known before the first phase event. */
  start(): Promise<void>;
}

export interface RenderOptions {
  /** Folder the repositories were found in; shown in the title line. */
  path: string;
  /** Show the tracking branch column. */
  tracking?: boolean;
}

export function titleLine(path: string): string {
  return `git summary for ${path}`;
}

export interface ColumnWidths {
  name: number;
  label: number;
}

/**
 * Name and label widths over the whole entity set, headers included.
 * Must be known before the first row is written.
 */
export function computeColumnWidths(entities: readonly Entity[]): ColumnWidths {
  return {
    name: Math.max(HEADER_REPO.length, ...entities.map((e) => e.name.length)),
    label: Math.max(HEADER_BRANCH.length, ...entities.map((e) => e.label.length)),
  };
}

/** Tracking column width over the tracking branches known so far. */
export function trackingWidth(entities: readonly Entity[]): number {
  return Math.max(HEADER_TRACKING.length, ...entities.map((e) => e.trackingBranch().length));
}

export function rule(width: number): string {
  return HEADER_RULE.repeat(width);
}

/**
 * ANSI cursor addressing relative to an anchor row.
 *
 * The table is drawn inside the normal console flow so scrollback stays
 * intact. That needs the cursor's current row; when it cannot be learned
 * (or the caller asks for it) the screen is cleared and the table is
 * anchored at the top instead.
 */

import type { TextSink } from './layout.js';

export const ESC = '\x1b[';
export const CLEAR_SCREEN = `${ESC}2J`;

/**
 * Best-effort source of the terminal cursor row. Resolves to a 0-based row,
 * or null when the terminal cannot say. Implementations must time out.
 */
export interface CursorProbe {
  currentRow(): Promise<number | null>;
}

export const unknownCursorProbe: CursorProbe = {
  currentRow: async () => null,
};

export interface AnsiWriterOptions {
  /** Rows the caller will address, 0 .. rowsNeeded-1. */
  rowsNeeded: number;
  sink: TextSink;
  probe?: CursorProbe;
  /** Always clear the screen and anchor at the top. */
  forceClear?: boolean;
}

export function cursorTo(row: number, col: number): string {
  return `${ESC}${row};${col}H`;
}

export class AnsiWriter {
  private constructor(
    private readonly sink: TextSink,
    readonly rowsNeeded: number,
    readonly anchorRow: number,
  ) {}

  static async open(opts: AnsiWriterOptions): Promise<AnsiWriter> {
    const anchor = await resolveAnchorRow(opts);
    const writer = new AnsiWriter(opts.sink, opts.rowsNeeded, anchor);
    if (anchor === 0) {
      writer.clear();
    }
    return writer;
  }

  clear(): void {
    this.sink.write(CLEAR_SCREEN + this.park());
  }

  /** Write text at a 0-based table position, then park the cursor below the table. */
  writeAt(row: number, col: number, text: string): void {
    this.sink.write(this.position(row + 1, col) + text + this.park());
  }

  private position(row: number, col: number): string {
    return cursorTo(this.anchorRow + row, col);
  }

  private park(): string {
    return `${this.position(this.rowsNeeded, 0)}\n`;
  }
}

/**
 * Row the table starts at. Makes vertical room first, then reads the cursor
 * row again: the table occupies the space just scrolled into view.
 */
export async function resolveAnchorRow(opts: AnsiWriterOptions): Promise<number> {
  const probe = opts.probe ?? unknownCursorProbe;
  if (opts.forceClear) return 0;

  const before = await probe.currentRow();
  if (!before) return 0;

  opts.sink.write('\n'.repeat(opts.rowsNeeded + 1));
  const after = await probe.currentRow();
  if (!after) return 0;

  return Math.max(0, after - opts.rowsNeeded - 1);
}

/**
 * Cursor position probe for real terminals.
 *
 * Sends a Device Status Report request (`ESC[6n`) and waits, bounded by a
 * timeout, for the `ESC[<row>;<col>R` answer on stdin.
 */

import type { CursorProbe } from '@gitglance/core';

export const DEFAULT_PROBE_TIMEOUT_MS = 1000;
const CURSOR_REPORT = /\x1b\[(\d+);(\d+)R/;

/** The slice of a tty read stream the probe needs. */
export interface ProbeInput {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode(mode: boolean): unknown;
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  off(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface ProbeOutput {
  isTTY?: boolean;
  write(text: string): unknown;
}

export interface TerminalProbeOptions {
  input?: ProbeInput;
  output?: ProbeOutput;
  timeoutMs?: number;
}

/** 0-based row from a cursor position report, or null if none is present. */
export function parseCursorReport(data: string): number | null {
  const match = CURSOR_REPORT.exec(data);
  if (!match) return null;
  return Number.parseInt(match[1], 10) - 1;
}

export function queryCursorRow(
  input: ProbeInput,
  output: ProbeOutput,
  timeoutMs = DEFAULT_PROBE_TIMEOUT_MS,
): Promise<number | null> {
  if (!input.isTTY || !output.isTTY) {
    return Promise.resolve(null);
  }

  return new Promise((resolve) => {
    const wasRaw = input.isRaw ?? false;
    let buffer = '';

    const finish = (row: number | null) => {
      clearTimeout(timer);
      input.off('data', onData);
      input.setRawMode(wasRaw);
      input.pause();
      resolve(row);
    };

    const onData = (chunk: Buffer | string) => {
      buffer += chunk.toString();
      const row = parseCursorReport(buffer);
      if (row !== null) finish(row);
    };

    const timer = setTimeout(() => finish(null), timeoutMs);

    input.setRawMode(true);
    input.on('data', onData);
    input.resume();
    output.write('\x1b[6n');
  });
}

export function createTerminalCursorProbe(opts: TerminalProbeOptions = {}): CursorProbe {
  const input = opts.input ?? process.stdin;
  const output = opts.output ?? process.stdout;
  return {
    currentRow: () => queryCursorRow(input, output, opts.timeoutMs),
  };
}

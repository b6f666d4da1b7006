/**
 * Terminal input → editor events
 *
 * Ink's `useInput` reports a chunk of stdin plus decoded key flags. Mouse reports
 * (SGR 1006: `ESC [ < b ; col ; row M|m`) reach it as unrecognised escape sequences with
 * the ESC stripped, so they are parsed here and mapped into canvas cells.
 */

import type { Key } from 'ink';
import type { EditorEvent, PointerAction, PointerButton } from '../core/orchestration/types';
import type { EditorLayout } from '../components/terminal/layout';

/** Mouse tracking: button events with drag motion, reported in SGR format */
export const ENABLE_MOUSE = '\u001b[?1000h\u001b[?1002h\u001b[?1006h';
export const DISABLE_MOUSE = '\u001b[?1006l\u001b[?1002l\u001b[?1000l';
export const ENTER_ALT_SCREEN = '\u001b[?1049h';
export const LEAVE_ALT_SCREEN = '\u001b[?1049l';

const SGR_MOUSE = /\[<(\d+);(\d+);(\d+)([Mm])/g;

const MOTION_FLAG = 32;
const WHEEL_FLAG = 64;

export interface MouseReport {
  button: number;
  /** 1-based terminal column and row */
  column: number;
  row: number;
  release: boolean;
}

export function parseMouseReports(input: string): MouseReport[] {
  const reports: MouseReport[] = [];
  for (const match of input.matchAll(SGR_MOUSE)) {
    reports.push({
      button: Number(match[1]),
      column: Number(match[2]),
      row: Number(match[3]),
      release: match[4] === 'm',
    });
  }
  return reports;
}

function toPointerEvent(report: MouseReport, layout: EditorLayout): EditorEvent | null {
  if (report.button & WHEEL_FLAG) return null;

  const code = report.button & 3;
  let button: PointerButton;
  if (code === 0) button = 'left';
  else if (code === 2) button = 'right';
  else return null;

  let action: PointerAction;
  if (report.release) action = 'up';
  else if (report.button & MOTION_FLAG) action = 'drag';
  else action = 'down';

  const { width, height } = layout.viewport;
  const x = report.column - 1 - layout.canvasLeft;
  const y = report.row - 1 - layout.canvasTop;
  const inside = x >= 0 && y >= 0 && x < width && y < height;

  // Presses start on the canvas; drags and releases are pinned to its edge
  if (action === 'down') {
    return inside ? { type: 'pointer', action, button, x, y } : null;
  }
  if (width === 0 || height === 0) return null;
  return {
    type: 'pointer',
    action,
    button,
    x: Math.min(Math.max(x, 0), width - 1),
    y: Math.min(Math.max(y, 0), height - 1),
  };
}

export type InputKey = Partial<
  Pick<Key, 'upArrow' | 'downArrow' | 'leftArrow' | 'rightArrow' | 'return' | 'escape' | 'ctrl' | 'shift' | 'tab' | 'backspace' | 'delete' | 'meta'>
>;

export function toEditorEvents(input: string, key: InputKey, layout: EditorLayout): EditorEvent[] {
  const reports = parseMouseReports(input);
  if (reports.length > 0) {
    return reports.flatMap(report => {
      const event = toPointerEvent(report, layout);
      return event ? [event] : [];
    });
  }

  if (key.upArrow) return [{ type: 'key', key: 'up' }];
  if (key.downArrow) return [{ type: 'key', key: 'down' }];
  if (key.leftArrow) return [{ type: 'key', key: 'left' }];
  if (key.rightArrow) return [{ type: 'key', key: 'right' }];
  if (key.escape) return [{ type: 'key', key: 'escape' }];
  if (key.return) return [{ type: 'key', key: 'enter' }];
  if (key.tab) return [{ type: 'key', key: key.shift ? 'backtab' : 'tab' }];
  // Most terminals send DEL (0x7f) for Backspace, which Ink reports as `delete`
  if (key.backspace || key.delete) return [{ type: 'key', key: 'backspace' }];
  if (key.ctrl || key.meta) return [];

  // A chunk holds several characters when typing fast or pasting; a tab would
  // span several terminal columns in a single grid cell
  return Array.from(input).map((char): EditorEvent => {
    if (char === '\r' || char === '\n') return { type: 'key', key: 'enter' };
    return { type: 'char', char: char === '\t' ? ' ' : char };
  });
}

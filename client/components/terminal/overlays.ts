/**
 * Modal overlays drawn over the rendered canvas
 *
 * Ink lays out in flow, not in absolute positions, so popups are painted into a copy of
 * the canvas grid instead of being separate components. The input canvas is left intact.
 */

import type { Bounds } from '../../core/viewstate/CoordinateService';
import type { AsciiCanvas } from '../../core/renderer';
import type { Mode, Viewport } from '../../core/orchestration/types';
import { CONTEXT_MENU_ENTRIES, contextMenuBounds } from '../../core/orchestration/contextMenu';
import { charLength } from '../../utils/textMeasurement';

export function leaderMenuLines(title: string): string[] {
  return [
    '  n -> New Box',
    '  d -> New Diamond',
    '  t -> New Text',
    '  f -> New Frame',
    `  w -> Write (${title}.txt/.json)`,
    '  c -> Copy to Clipboard',
    '  h -> Help Menu',
    '  q -> Quit',
    '',
    '  <Esc> -> Cancel',
  ];
}

export const HELP_LINES: readonly string[] = [
  '--- NAVIGATION & SELECTION ---',
  '  Tab / BackTab   : Cycle through shapes',
  '  Arrows          : Move shape or pan canvas',
  '  Esc             : Clear selection / Back to Normal',
  '',
  '--- EDITING ---',
  '  i               : Enter Insert mode (Edit text)',
  '  r               : Enter Resize mode (+/- to scale)',
  '  Del / Backspace : Delete selected shape/connection',
  '',
  '--- CONNECTORS ---',
  '  c               : Start plain connector from shape',
  '  a               : Start arrow connector from shape',
  '  Enter           : Finish connector on target shape',
  '  a (on conn)     : Toggle arrow on selection',
  '',
  '--- COMMANDS (<Leader> = Space) ---',
  '  <Leader> + n    : Create new Box',
  '  <Leader> + d    : Create new Diamond',
  '  <Leader> + t    : Create new Text',
  '  <Leader> + f    : Create new Frame',
  '  <Leader> + w    : Save (.json and .txt)',
  '  <Leader> + c    : Copy ASCII to clipboard',
  '',
  '  Press <Esc> or <Space> to close Help',
];

/** Bordered panel with an optional title in the top border; the interior is cleared. */
export function drawPanel(canvas: AsciiCanvas, bounds: Bounds, lines: readonly string[], title = ''): void {
  const { x, y, w, h } = bounds;
  if (w < 2 || h < 2) return;

  const right = x + w - 1;
  const bottom = y + h - 1;
  for (let row = y; row <= bottom; row++) {
    for (let col = x; col <= right; col++) {
      const onTop = row === y;
      const onBottom = row === bottom;
      const onSide = col === x || col === right;
      let ch = ' ';
      if ((onTop || onBottom) && onSide) {
        ch = onTop ? (col === x ? '┌' : '┐') : col === x ? '└' : '┘';
      } else if (onTop || onBottom) {
        ch = '─';
      } else if (onSide) {
        ch = '│';
      }
      canvas.set(col, row, ch);
    }
  }

  if (title) {
    canvas.write(x + 1, y, Array.from(title).slice(0, w - 2).join(''));
  }

  lines.slice(0, h - 2).forEach((line, i) => {
    canvas.write(x + 1, y + 1 + i, Array.from(line).slice(0, w - 2).join(''));
  });
}

/** Panel sized to its content, centered on the canvas */
function centeredPanelBounds(canvas: AsciiCanvas, lines: readonly string[], title: string, minWidth: number): Bounds {
  const contentWidth = Math.max(charLength(title), ...lines.map(charLength));
  const w = Math.max(minWidth, contentWidth + 2);
  const h = lines.length + 2;
  return {
    x: Math.max(0, Math.floor((canvas.width - w) / 2)),
    y: Math.max(0, Math.floor((canvas.height - h) / 2)),
    w,
    h,
  };
}

export function contextMenuLines(selectedIndex: number): string[] {
  return CONTEXT_MENU_ENTRIES.map((entry, i) => `${i === selectedIndex ? '> ' : '  '}${entry.label}`);
}

/**
 * Copy of `canvas` with the overlay of the current mode on top.
 * Modes without an overlay get an unchanged copy.
 */
export function drawModeOverlay(canvas: AsciiCanvas, mode: Mode, title: string, viewport: Viewport): AsciiCanvas {
  const out = canvas.clone();
  switch (mode.kind) {
    case 'leader': {
      const lines = leaderMenuLines(title);
      drawPanel(out, centeredPanelBounds(out, lines, ' Commands ', 30), lines, ' Commands ');
      break;
    }
    case 'help':
      drawPanel(out, centeredPanelBounds(out, HELP_LINES, ' Full Command Reference ', 50), HELP_LINES, ' Full Command Reference ');
      break;
    case 'context-menu':
      drawPanel(out, contextMenuBounds(mode, viewport), contextMenuLines(mode.selectedIndex));
      break;
    case 'normal':
    case 'insert':
    case 'resize':
      break;
  }
  return out;
}

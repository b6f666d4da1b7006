/**
 * Terminal layout: where the framed canvas and the status bar sit
 *
 * The frame is centered horizontally and never wider than the export width, so what is
 * on screen is what `w` writes. One row is kept free below the status bar so Ink never
 * has to scroll the terminal.
 */

import type { Viewport } from '../../core/orchestration/types';

export interface TerminalSize {
  columns: number;
  rows: number;
}

export interface EditorLayout {
  /** Blank columns left of the frame */
  marginLeft: number;
  /** Frame width including both border columns */
  frameWidth: number;
  /** Terminal cell (0-based) of the canvas's top-left cell */
  canvasLeft: number;
  canvasTop: number;
  /** Canvas size in cells, the orchestrator's viewport */
  viewport: Viewport;
}

const BORDER = 1;
const STATUS_ROWS = 1;
const SPARE_ROWS = 1;

export function computeLayout(size: TerminalSize, exportWidth: number): EditorLayout {
  const frameWidth = Math.max(2 * BORDER, Math.min(exportWidth, size.columns));
  const marginLeft = Math.max(0, Math.floor((size.columns - frameWidth) / 2));
  const height = Math.max(0, size.rows - 2 * BORDER - STATUS_ROWS - SPARE_ROWS);
  return {
    marginLeft,
    frameWidth,
    canvasLeft: marginLeft + BORDER,
    canvasTop: BORDER,
    viewport: { width: frameWidth - 2 * BORDER, height },
  };
}

/**
 * Shape outlines and text placement
 *
 * Every function here takes a node already in SCREEN coordinates.
 */

import type { Bounds, Point } from '../viewstate/CoordinateService';
import type { DiagramNode } from '../../domain/types';
import { TEXT_INSET } from '../../utils/nodeConstants';
import { charLength, wrapText } from '../../utils/textMeasurement';
import type { AsciiCanvas } from './AsciiCanvas';

type OutlineGlyphs = { corner: string; horizontal: string; vertical: string };

const PLAIN_OUTLINE: OutlineGlyphs = { corner: '+', horizontal: '-', vertical: '|' };
const SELECTED_OUTLINE: OutlineGlyphs = { corner: '#', horizontal: '=', vertical: '#' };

export type PlacedLine = { x: number; y: number; text: string };

export interface TextLayout {
  lines: PlacedLine[];
  /** Cells text may occupy; null means unclipped */
  clip: Bounds | null;
}

// ============================================================================
// Text layout
// ============================================================================

function centeredX(left: number, available: number, line: string): number {
  return left + Math.floor(Math.max(0, available - charLength(line)) / 2);
}

/**
 * Where each wrapped line of a node's text lands. Shared by the renderer and the
 * insert caret so both agree on every shape.
 */
export function textLayout(node: DiagramNode): TextLayout {
  const { x, y, width, height } = node;
  const inset = TEXT_INSET[node.shape];

  switch (node.shape) {
    case 'Box':
    case 'Frame': {
      const availableWidth = Math.max(0, width - inset);
      const availableHeight = Math.max(0, height - 2);
      if (availableWidth === 0 || availableHeight === 0) {
        return { lines: [], clip: null };
      }
      const wrapped = wrapText(node.text, availableWidth);
      // frames keep their text as a title on the first interior row
      const startY = node.shape === 'Frame'
        ? y + 1
        : y + 1 + Math.floor(Math.max(0, availableHeight - wrapped.length) / 2);
      return {
        lines: wrapped.slice(0, availableHeight).map((text, i) => ({
          x: centeredX(x + 1, availableWidth, text),
          y: startY + i,
          text,
        })),
        clip: { x: x + 1, y: y + 1, w: width - 2, h: height - 2 },
      };
    }
    case 'Diamond': {
      const availableWidth = Math.max(1, width - inset);
      const availableHeight = Math.max(1, height - 2);
      const wrapped = wrapText(node.text, availableWidth);
      const startY = y + 1 + Math.floor(Math.max(0, availableHeight - wrapped.length) / 2);
      return {
        lines: wrapped.slice(0, availableHeight).map((text, i) => ({
          x: centeredX(x, width, text),
          y: startY + i,
          text,
        })),
        clip: { x: x + 2, y: y + 1, w: width - 4, h: height - 2 },
      };
    }
    case 'Text': {
      const wrapped = wrapText(node.text, width);
      const startY = y + Math.floor(Math.max(0, height - wrapped.length) / 2);
      return {
        lines: wrapped.slice(0, height).map((text, i) => ({
          x: centeredX(x, width, text),
          y: startY + i,
          text,
        })),
        clip: null,
      };
    }
  }
}

/** Cell just after the last typed character, where the insert caret sits. */
export function caretPosition(node: DiagramNode): Point {
  const { lines } = textLayout(node);
  const last = lines[lines.length - 1];
  if (!last) {
    return { x: node.x + Math.floor(node.width / 2), y: node.y + Math.floor(node.height / 2) };
  }
  return { x: last.x + charLength(last.text), y: last.y };
}

function insideClip(clip: Bounds | null, x: number, y: number): boolean {
  if (!clip) return true;
  return x >= clip.x && x < clip.x + clip.w && y >= clip.y && y < clip.y + clip.h;
}

function drawNodeText(canvas: AsciiCanvas, node: DiagramNode): void {
  const { lines, clip } = textLayout(node);
  for (const line of lines) {
    let col = line.x;
    for (const ch of line.text) {
      if (insideClip(clip, col, line.y)) {
        canvas.set(col, line.y, ch);
      }
      col++;
    }
  }
}

// ============================================================================
// Outlines
// ============================================================================

function drawRectangle(canvas: AsciiCanvas, node: DiagramNode): void {
  const glyphs = node.selected ? SELECTED_OUTLINE : PLAIN_OUTLINE;
  const x1 = node.x;
  const y1 = node.y;
  const x2 = x1 + node.width - 1;
  const y2 = y1 + node.height - 1;

  for (let x = x1 + 1; x < x2; x++) {
    canvas.set(x, y1, glyphs.horizontal);
    canvas.set(x, y2, glyphs.horizontal);
  }
  for (let y = y1 + 1; y < y2; y++) {
    canvas.set(x1, y, glyphs.vertical);
    canvas.set(x2, y, glyphs.vertical);
  }
  canvas.set(x1, y1, glyphs.corner);
  canvas.set(x2, y1, glyphs.corner);
  canvas.set(x1, y2, glyphs.corner);
  canvas.set(x2, y2, glyphs.corner);
}

/** Boxes and frames share the outline; they differ only in where their text sits. */
export function drawBox(canvas: AsciiCanvas, node: DiagramNode): void {
  drawRectangle(canvas, node);
  drawNodeText(canvas, node);
}

/**
 * Bresenham line between two cells. Both endpoints are left untouched; the caller
 * marks them with point glyphs afterwards.
 */
export function drawLine(canvas: AsciiCanvas, from: Point, to: Point, ch: string): void {
  const dx = Math.abs(to.x - from.x);
  const dy = Math.abs(to.y - from.y);
  const sx = from.x < to.x ? 1 : -1;
  const sy = from.y < to.y ? 1 : -1;
  let err = dx - dy;
  let x = from.x;
  let y = from.y;

  for (;;) {
    const atStart = x === from.x && y === from.y;
    const atEnd = x === to.x && y === to.y;
    if (!atStart && !atEnd) {
      canvas.set(x, y, ch);
    }
    if (atEnd) break;

    const e2 = 2 * err;
    if (e2 > -dy) {
      err -= dy;
      x += sx;
    }
    if (e2 < dx) {
      err += dx;
      y += sy;
    }
  }
}

export function drawDiamond(canvas: AsciiCanvas, node: DiagramNode): void {
  const x1 = node.x;
  const y1 = node.y;
  const x2 = x1 + node.width - 1;
  const y2 = y1 + node.height - 1;
  const cx = x1 + Math.floor(node.width / 2);
  const cy = y1 + Math.floor(node.height / 2);

  const top = { x: cx, y: y1 };
  const right = { x: x2, y: cy };
  const bottom = { x: cx, y: y2 };
  const left = { x: x1, y: cy };

  const rising = node.selected ? '#' : '/';
  const falling = node.selected ? '#' : '\\';
  const point = node.selected ? '#' : '+';

  drawLine(canvas, top, right, rising);
  drawLine(canvas, right, bottom, falling);
  drawLine(canvas, bottom, left, rising);
  drawLine(canvas, left, top, falling);

  for (const p of [top, bottom, left, right]) {
    canvas.set(p.x, p.y, point);
  }

  drawNodeText(canvas, node);
}

export function drawTextNode(canvas: AsciiCanvas, node: DiagramNode): void {
  drawNodeText(canvas, node);
  if (node.selected) {
    canvas.set(Math.max(0, node.x - 1), node.y, '[');
    canvas.set(node.x + node.width, node.y + node.height - 1, ']');
  }
}

export function drawNode(canvas: AsciiCanvas, node: DiagramNode): void {
  switch (node.shape) {
    case 'Box':
    case 'Frame':
      drawBox(canvas, node);
      break;
    case 'Diamond':
      drawDiamond(canvas, node);
      break;
    case 'Text':
      drawTextNode(canvas, node);
      break;
  }
}

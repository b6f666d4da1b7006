/**
 * Right-click context menu: entries, placement and keyboard navigation
 *
 * Shared by the state machine (hit tests, activation) and the shell (overlay drawing),
 * so the highlighted row is always the row that was clicked.
 */

import type { Bounds } from '../viewstate/CoordinateService';
import type { ShapeType } from '../../domain/types';
import type { Viewport } from './types';

export type ContextMenuAction =
  | { kind: 'create'; shape: ShapeType }
  | { kind: 'start-connector'; arrow: boolean }
  | { kind: 'delete' }
  | { kind: 'cancel' }
  | { kind: 'separator' };

export interface ContextMenuEntry {
  label: string;
  action: ContextMenuAction;
}

export const CONTEXT_MENU_ENTRIES: readonly ContextMenuEntry[] = [
  { label: ' New Box ', action: { kind: 'create', shape: 'Box' } },
  { label: ' New Diamond ', action: { kind: 'create', shape: 'Diamond' } },
  { label: ' New Text ', action: { kind: 'create', shape: 'Text' } },
  { label: ' New Frame ', action: { kind: 'create', shape: 'Frame' } },
  { label: '---------', action: { kind: 'separator' } },
  { label: ' Start Connector ', action: { kind: 'start-connector', arrow: false } },
  { label: ' Start Arrow ', action: { kind: 'start-connector', arrow: true } },
  { label: ' Delete ', action: { kind: 'delete' } },
  { label: '---------', action: { kind: 'separator' } },
  { label: ' Cancel ', action: { kind: 'cancel' } },
];

export const CONTEXT_MENU_WIDTH = 21;
/** One row per entry plus the border above and below */
export const CONTEXT_MENU_HEIGHT = CONTEXT_MENU_ENTRIES.length + 2;

export function isSeparator(index: number): boolean {
  return CONTEXT_MENU_ENTRIES[index]?.action.kind === 'separator';
}

/** Menu rectangle in canvas cells: at the anchor, shifted left/up to stay on screen. */
export function contextMenuBounds(anchor: { x: number; y: number }, viewport: Viewport): Bounds {
  const x = anchor.x + CONTEXT_MENU_WIDTH > viewport.width
    ? Math.max(0, viewport.width - CONTEXT_MENU_WIDTH)
    : anchor.x;
  const y = anchor.y + CONTEXT_MENU_HEIGHT > viewport.height
    ? Math.max(0, viewport.height - CONTEXT_MENU_HEIGHT)
    : anchor.y;
  return { x, y, w: CONTEXT_MENU_WIDTH, h: CONTEXT_MENU_HEIGHT };
}

/**
 * Entry under a canvas cell, or null for cells outside the entry rows
 * (border rows, separators, outside the menu).
 */
export function entryIndexAt(bounds: Bounds, x: number, y: number): number | null {
  if (x < bounds.x || x >= bounds.x + bounds.w) return null;
  const index = y - bounds.y - 1;
  if (index < 0 || index >= CONTEXT_MENU_ENTRIES.length || isSeparator(index)) return null;
  return index;
}

export function menuContains(bounds: Bounds, x: number, y: number): boolean {
  return x >= bounds.x && x < bounds.x + bounds.w && y >= bounds.y && y < bounds.y + bounds.h;
}

/** Up/Down step that skips separators and stops at either end. */
export function stepMenuIndex(index: number, direction: 'up' | 'down'): number {
  const delta = direction === 'up' ? -1 : 1;
  let next = index + delta;
  while (next >= 0 && next < CONTEXT_MENU_ENTRIES.length && isSeparator(next)) {
    next += delta;
  }
  if (next < 0 || next >= CONTEXT_MENU_ENTRIES.length) return index;
  return next;
}

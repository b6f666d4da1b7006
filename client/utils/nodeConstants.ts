/**
 * SINGLE SOURCE OF TRUTH for node sizing and placement constants
 *
 * All sizes are in character cells. Import from this file instead of repeating numbers
 * in handlers or the renderer.
 */

import type { ShapeType } from '../domain/types';

// ============================================================================
// NODE DIMENSIONS (in cells)
// ============================================================================

export const DEFAULT_NODE_SIZES: Record<ShapeType, { width: number; height: number }> = {
  Box: { width: 20, height: 5 },
  Diamond: { width: 15, height: 7 },
  Text: { width: 10, height: 1 },
  Frame: { width: 30, height: 10 },
};

/** Smallest width any node may shrink to */
export const MIN_NODE_WIDTH = 3;

/** Smallest height any node may shrink to */
export const MIN_NODE_HEIGHT = 1;

/** Pointer resizing keeps nodes at least this tall, so the corner handle stays grabbable */
export const MIN_DRAG_RESIZE_HEIGHT = 3;

/** Keyboard resize steps (`+` / `-` in resize mode) */
export const RESIZE_STEP_WIDTH = 2;
export const RESIZE_STEP_HEIGHT = 1;

// ============================================================================
// TEXT INSETS
// ============================================================================

/** Columns lost to the outline on each shape, per side pair */
export const TEXT_INSET: Record<ShapeType, number> = {
  Box: 2,
  Diamond: 6,
  Text: 0,
  Frame: 2,
};

// ============================================================================
// PLACEMENT
// ============================================================================

/** Where the first node of an empty diagram is spawned */
export const FIRST_SPAWN_POSITION = { x: 10, y: 10 } as const;

/** Blank rows left between a spawned node and the node above it */
export const SPAWN_VERTICAL_GAP = 2;

/**
 * Interaction policy decisions
 *
 * Pure decision logic for the state machine:
 * - Which anchors a keyboard connection uses (pickDirectionalAnchors)
 * - Which anchor a border press or a drop snaps to (snapBorderAnchor, nearestEdgeAnchor)
 * - What part of a node a press landed on (classifyNodeHit)
 * - Where a new shape spawns (spawnPosition)
 * - Which node Tab / Shift-Tab moves to (cycleIndex)
 *
 * All functions return decisions and never modify state. Handlers apply them.
 */

import type { Point } from '../viewstate/CoordinateService';
import type { DiagramNode } from '../../domain/types';
import { anchorOffset } from '../../domain/geometry';
import { FIRST_SPAWN_POSITION, SPAWN_VERTICAL_GAP } from '../../utils/nodeConstants';

type Box = Pick<DiagramNode, 'x' | 'y' | 'width' | 'height'>;

export interface AnchorPair {
  fromOffset: Point;
  toOffset: Point;
}

/**
 * Anchors for a connection committed from the keyboard. First match wins:
 * target below, right of, above, else left of the source. Each test is non-overlap on
 * that axis.
 */
export function pickDirectionalAnchors(source: Box, target: Box): AnchorPair {
  if (target.y >= source.y + source.height) {
    return { fromOffset: anchorOffset(source, 'bottom'), toOffset: anchorOffset(target, 'top') };
  }
  if (target.x >= source.x + source.width) {
    return { fromOffset: anchorOffset(source, 'right'), toOffset: anchorOffset(target, 'left') };
  }
  if (source.y >= target.y + target.height) {
    return { fromOffset: anchorOffset(source, 'top'), toOffset: anchorOffset(target, 'bottom') };
  }
  return { fromOffset: anchorOffset(source, 'left'), toOffset: anchorOffset(target, 'right') };
}

export type NodeHit = 'corner' | 'border' | 'body';

/** `local` is relative to the node's top-left and lies inside it. */
export function classifyNodeHit(node: Box, local: Point): NodeHit {
  const right = node.width - 1;
  const bottom = node.height - 1;
  if (local.x === right && local.y === bottom) return 'corner';
  if (local.x === 0 || local.x === right || local.y === 0 || local.y === bottom) return 'border';
  return 'body';
}

/** Anchor for a press on a border cell: top and bottom edges win over the sides. */
export function snapBorderAnchor(node: Box, local: Point): Point {
  if (local.y === 0) return anchorOffset(node, 'top');
  if (local.y === node.height - 1) return anchorOffset(node, 'bottom');
  if (local.x === 0) return anchorOffset(node, 'left');
  return anchorOffset(node, 'right');
}

/**
 * Anchor on the edge closest to a world cell inside the node.
 * Ties resolve top, bottom, left, right.
 */
export function nearestEdgeAnchor(node: Box, point: Point): Point {
  const dLeft = Math.max(0, point.x - node.x);
  const dRight = Math.max(0, node.x + node.width - 1 - point.x);
  const dTop = Math.max(0, point.y - node.y);
  const dBottom = Math.max(0, node.y + node.height - 1 - point.y);
  const min = Math.min(dLeft, dRight, dTop, dBottom);

  if (min === dTop) return anchorOffset(node, 'top');
  if (min === dBottom) return anchorOffset(node, 'bottom');
  if (min === dLeft) return anchorOffset(node, 'left');
  return anchorOffset(node, 'right');
}

/** Below the last node in z-order, or the fixed first position on an empty canvas. */
export function spawnPosition(nodes: readonly Box[]): Point {
  const last = nodes[nodes.length - 1];
  if (!last) return { ...FIRST_SPAWN_POSITION };
  return { x: last.x, y: last.y + last.height + SPAWN_VERTICAL_GAP };
}

export type CycleDirection = 'forward' | 'backward';

/**
 * Index to select after a Tab / Shift-Tab, wrapping. With nothing selected, forward
 * starts at the first node and backward at the last. Null on an empty list.
 */
export function cycleIndex(count: number, current: number | null, direction: CycleDirection): number | null {
  if (count === 0) return null;
  if (current === null) return direction === 'forward' ? 0 : count - 1;
  return direction === 'forward' ? (current + 1) % count : (current + count - 1) % count;
}

/** Short label for status messages: the node's first word */
export function nodeLabel(node: Pick<DiagramNode, 'text'>): string {
  const [first] = node.text.split(/\s+/).filter(word => word.length > 0);
  return first ?? 'Node';
}

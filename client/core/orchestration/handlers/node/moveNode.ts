/**
 * Move Node Handler
 *
 * Keyboard nudges one cell at a time; pointer drags follow the grab point and stay on
 * the visible part of the canvas.
 */

import type { Point } from '../../../viewstate/CoordinateService';
import { CoordinateService } from '../../../viewstate/CoordinateService';
import type { DiagramNode } from '../../../../domain/types';
import type { Viewport } from '../../types';

/** Coordinates saturate at 0. */
export function nudgeNode(node: DiagramNode, delta: Point): void {
  node.x = Math.max(0, node.x + delta.x);
  node.y = Math.max(0, node.y + delta.y);
}

/**
 * Places a dragged node so the grab offset stays under the pointer, clamped to
 * `[max(0, camera), camera + viewport - size]` on each axis.
 */
export function dragNodeTo(
  node: DiagramNode,
  pointer: Point,
  grabOffset: Point,
  camera: Point,
  viewport: Viewport
): void {
  const x = Math.max(0, pointer.x - grabOffset.x);
  const y = Math.max(0, pointer.y - grabOffset.y);
  node.x = CoordinateService.clamp(x, Math.max(0, camera.x), camera.x + viewport.width - node.width);
  node.y = CoordinateService.clamp(y, Math.max(0, camera.y), camera.y + viewport.height - node.height);
}

/**
 * Resize Node Handler
 */

import type { Point } from '../../../viewstate/CoordinateService';
import type { DiagramNode } from '../../../../domain/types';
import { resizeNodeBy } from '../../../../domain/mutations';
import { MIN_DRAG_RESIZE_HEIGHT, MIN_NODE_WIDTH, RESIZE_STEP_HEIGHT, RESIZE_STEP_WIDTH } from '../../../../utils/nodeConstants';

export type ResizeStep = 'grow' | 'shrink';

/** One +/- step in Resize mode. Returns the status line. */
export function stepResize(node: DiagramNode, step: ResizeStep): string {
  const sign = step === 'grow' ? 1 : -1;
  resizeNodeBy(node, sign * RESIZE_STEP_WIDTH, sign * RESIZE_STEP_HEIGHT);
  return `Resized: ${node.width}x${node.height}`;
}

/** Bottom-right corner follows the pointer (world cell), at least 3×3. */
export function dragResizeTo(node: DiagramNode, pointer: Point): void {
  node.width = Math.max(MIN_NODE_WIDTH, Math.max(0, pointer.x - node.x) + 1);
  node.height = Math.max(MIN_DRAG_RESIZE_HEIGHT, Math.max(0, pointer.y - node.y) + 1);
}

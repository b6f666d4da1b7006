/**
 * Domain layer - re-exports for clean imports
 */

export {
  addNode,
  deleteNode,
  bringToFront,
  selectOnly,
  selectedNode,
  autoFitText,
  resizeNodeBy,
  clampNodeSize,
  nextNodeId,
  addConnection,
  deleteConnection,
} from './mutations';
export type { DiagramContent } from './mutations';

export {
  nodeContains,
  findNode,
  topmostNodeAt,
  topmostConnectionAt,
  connectionContains,
  anchorOffset,
  isVerticalAnchor,
  resolveConnectionRoute,
  routeSegments,
  routeContains,
  buildRoute,
} from './geometry';
export type { AnchorSide, Route, RouteOrientation, Segment } from './geometry';

export type { ShapeType, NodeId, DiagramNode, Connection, PartialConnection, Diagram } from './types';

/**
 * Geometric predicates over the diagram model
 *
 * Connector routes are computed here, once, and shared by the renderer (drawing) and the
 * pointer hit tests (picking), so what is clicked is exactly what is drawn.
 */

import type { Point } from '../core/viewstate/CoordinateService';
import type { Connection, DiagramNode, NodeId } from './types';

export type AnchorSide = 'top' | 'bottom' | 'left' | 'right';

export type RouteOrientation = 'vertical-first' | 'horizontal-first';

/**
 * Three-segment orthogonal path. Vertical-first routes run V→H→V through row `mid`;
 * horizontal-first routes run H→V→H through column `mid`.
 */
export interface Route {
  start: Point;
  end: Point;
  orientation: RouteOrientation;
  mid: number;
}

export type Segment = { from: Point; to: Point };

/** Half-open rectangle test */
export function nodeContains(node: DiagramNode, x: number, y: number): boolean {
  return x >= node.x && x < node.x + node.width && y >= node.y && y < node.y + node.height;
}

export function findNode(nodes: readonly DiagramNode[], id: NodeId): DiagramNode | undefined {
  return nodes.find(n => n.id === id);
}

/** Topmost node under a world cell (last in z-order wins) */
export function topmostNodeAt(nodes: readonly DiagramNode[], x: number, y: number): DiagramNode | undefined {
  for (let i = nodes.length - 1; i >= 0; i--) {
    if (nodeContains(nodes[i], x, y)) return nodes[i];
  }
  return undefined;
}

export function anchorOffset(node: Pick<DiagramNode, 'width' | 'height'>, side: AnchorSide): Point {
  switch (side) {
    case 'top':
      return { x: Math.floor(node.width / 2), y: 0 };
    case 'bottom':
      return { x: Math.floor(node.width / 2), y: node.height - 1 };
    case 'left':
      return { x: 0, y: Math.floor(node.height / 2) };
    case 'right':
      return { x: node.width - 1, y: Math.floor(node.height / 2) };
  }
}

/** True for anchors on the top or bottom edge; their routes leave vertically. */
export function isVerticalAnchor(node: Pick<DiagramNode, 'height'>, offset: Point): boolean {
  return offset.y === 0 || offset.y === node.height - 1;
}

/**
 * Pulls an arrowed endpoint one cell off the target's border so the arrowhead sits
 * just outside the shape.
 */
export function shrinkArrowEndpoint(end: Point, target: DiagramNode, toOffset: Point): Point {
  if (toOffset.y === 0) return { x: end.x, y: Math.max(0, end.y - 1) };
  if (toOffset.y === target.height - 1) return { x: end.x, y: end.y + 1 };
  if (toOffset.x === 0) return { x: Math.max(0, end.x - 1), y: end.y };
  if (toOffset.x === target.width - 1) return { x: end.x + 1, y: end.y };
  return end;
}

export function buildRoute(start: Point, end: Point, orientation: RouteOrientation): Route {
  const mid = orientation === 'vertical-first'
    ? Math.floor((start.y + end.y) / 2)
    : Math.floor((start.x + end.x) / 2);
  return { start, end, orientation, mid };
}

/**
 * Route of a committed connection against the given node positions, or null when either
 * endpoint node no longer exists.
 */
export function resolveConnectionRoute(conn: Connection, nodes: readonly DiagramNode[]): Route | null {
  const from = findNode(nodes, conn.fromId);
  const to = findNode(nodes, conn.toId);
  if (!from || !to) return null;

  const start = { x: from.x + conn.fromOffset.x, y: from.y + conn.fromOffset.y };
  let end = { x: to.x + conn.toOffset.x, y: to.y + conn.toOffset.y };
  if (conn.hasArrow) {
    end = shrinkArrowEndpoint(end, to, conn.toOffset);
  }

  const orientation = isVerticalAnchor(from, conn.fromOffset) ? 'vertical-first' : 'horizontal-first';
  return buildRoute(start, end, orientation);
}

export function routeSegments(route: Route): [Segment, Segment, Segment] {
  const { start, end, mid } = route;
  if (route.orientation === 'vertical-first') {
    const bendA = { x: start.x, y: mid };
    const bendB = { x: end.x, y: mid };
    return [
      { from: start, to: bendA },
      { from: bendA, to: bendB },
      { from: bendB, to: end },
    ];
  }
  const bendA = { x: mid, y: start.y };
  const bendB = { x: mid, y: end.y };
  return [
    { from: start, to: bendA },
    { from: bendA, to: bendB },
    { from: bendB, to: end },
  ];
}

function onSegment(segment: Segment, x: number, y: number): boolean {
  const { from, to } = segment;
  return (
    x >= Math.min(from.x, to.x) &&
    x <= Math.max(from.x, to.x) &&
    y >= Math.min(from.y, to.y) &&
    y <= Math.max(from.y, to.y)
  );
}

export function routeContains(route: Route, x: number, y: number): boolean {
  return routeSegments(route).some(segment => onSegment(segment, x, y));
}

/** Pointer hit test against the rendered route of a connection */
export function connectionContains(
  conn: Connection,
  x: number,
  y: number,
  nodes: readonly DiagramNode[]
): boolean {
  const route = resolveConnectionRoute(conn, nodes);
  return route !== null && routeContains(route, x, y);
}

/** Index of the topmost (last drawn) connection whose route passes through the cell */
export function topmostConnectionAt(
  connections: readonly Connection[],
  nodes: readonly DiagramNode[],
  x: number,
  y: number
): number | undefined {
  for (let i = connections.length - 1; i >= 0; i--) {
    if (connectionContains(connections[i], x, y, nodes)) return i;
  }
  return undefined;
}

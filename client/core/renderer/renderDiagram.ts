/**
 * Diagram → character grid
 *
 * Pure: reads the model, never writes it, keeps no state between calls. The same input
 * renders the same grid at any size, so the live view and the fixed-width export can
 * both call it on one state.
 *
 * Draw order: nodes back to front, then connections, then the connector being dragged.
 */

import type { Point } from '../viewstate/CoordinateService';
import { CoordinateService } from '../viewstate/CoordinateService';
import type { Connection, DiagramNode, PartialConnection } from '../../domain/types';
import { buildRoute, findNode, isVerticalAnchor, resolveConnectionRoute } from '../../domain/geometry';
import { AsciiCanvas } from './AsciiCanvas';
import { drawNode } from './shapes';
import { drawRoute } from './connectors';

export interface RenderInput {
  nodes: readonly DiagramNode[];
  connections: readonly Connection[];
  cameraOffset: Point;
  selectedConnectionIndex: number | null;
  partialConnection: PartialConnection | null;
}

/** Copies of the nodes moved into screen space */
export function toScreenNodes(nodes: readonly DiagramNode[], camera: Point): DiagramNode[] {
  return nodes.map(node => ({
    ...node,
    ...CoordinateService.toScreenFromWorld(node, camera),
  }));
}

export function renderDiagram(input: RenderInput, width: number, height: number): AsciiCanvas {
  const canvas = new AsciiCanvas(width, height);
  const nodes = toScreenNodes(input.nodes, input.cameraOffset);

  for (const node of nodes) {
    drawNode(canvas, node);
  }

  input.connections.forEach((conn, index) => {
    const route = resolveConnectionRoute(conn, nodes);
    if (!route) return;
    drawRoute(canvas, route, {
      arrow: conn.hasArrow,
      highlighted: input.selectedConnectionIndex === index,
    });
  });

  const partial = input.partialConnection;
  if (partial) {
    const from = findNode(nodes, partial.fromId);
    if (from) {
      const start = { x: from.x + partial.fromOffset.x, y: from.y + partial.fromOffset.y };
      const end = CoordinateService.toScreenFromWorld(partial.currentPos, input.cameraOffset);
      const orientation = isVerticalAnchor(from, partial.fromOffset) ? 'vertical-first' : 'horizontal-first';
      drawRoute(canvas, buildRoute(start, end, orientation), { arrow: true, highlighted: true });
    }
  }

  return canvas;
}

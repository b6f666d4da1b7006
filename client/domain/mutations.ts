/**
 * Domain mutations
 *
 * Structural edits of the diagram model. They work in place on the node and connection
 * lists of whatever holds them (the editor state, or a bare Diagram in tests), and keep
 * the model's invariants:
 *
 *   - node ids are `1 + max(live ids)`, never shared by two live nodes
 *   - width ≥ 3 and height ≥ 1 after every create / resize / auto-fit
 *   - deleting a node cascades to every connection that references it
 */

import type { Point } from '../core/viewstate/CoordinateService';
import type { Connection, Diagram, DiagramNode, NodeId, ShapeType } from './types';
import { DEFAULT_NODE_SIZES, MIN_NODE_HEIGHT, MIN_NODE_WIDTH } from '../utils/nodeConstants';
import { measureTextBlock } from '../utils/textMeasurement';

export type DiagramContent = Pick<Diagram, 'nodes' | 'connections'>;

// ──────────────────────────────────────────────
// IDS
// ──────────────────────────────────────────────

export function nextNodeId(nodes: readonly DiagramNode[]): NodeId {
  return nodes.reduce((max, n) => Math.max(max, n.id), 0) + 1;
}

// ──────────────────────────────────────────────
// NODES
// ──────────────────────────────────────────────

export function clampNodeSize(width: number, height: number): { width: number; height: number } {
  return {
    width: Math.max(MIN_NODE_WIDTH, width),
    height: Math.max(MIN_NODE_HEIGHT, height),
  };
}

/**
 * Appends a new node of the shape's default size and returns it.
 * The node starts unselected; selection is the caller's decision.
 */
export function addNode(content: DiagramContent, shape: ShapeType, position: Point): DiagramNode {
  const size = DEFAULT_NODE_SIZES[shape];
  const node: DiagramNode = {
    id: nextNodeId(content.nodes),
    shape,
    x: Math.max(0, position.x),
    y: Math.max(0, position.y),
    width: size.width,
    height: size.height,
    text: '',
    selected: false,
  };
  content.nodes.push(node);
  return node;
}

/**
 * Removes a node and every connection that references it.
 * Returns the number of connections removed, or null when the id is unknown.
 */
export function deleteNode(content: DiagramContent, nodeId: NodeId): number | null {
  const index = content.nodes.findIndex(n => n.id === nodeId);
  if (index === -1) return null;

  content.nodes.splice(index, 1);
  const before = content.connections.length;
  content.connections = content.connections.filter(c => c.fromId !== nodeId && c.toId !== nodeId);
  return before - content.connections.length;
}

/** Moves a node to the end of the z-order (drawn last, hit-tested first). */
export function bringToFront(nodes: DiagramNode[], nodeId: NodeId): void {
  const index = nodes.findIndex(n => n.id === nodeId);
  if (index === -1 || index === nodes.length - 1) return;
  const [node] = nodes.splice(index, 1);
  nodes.push(node);
}

/** Selects exactly one node, or none when `nodeId` is null. */
export function selectOnly(nodes: DiagramNode[], nodeId: NodeId | null): void {
  for (const n of nodes) {
    n.selected = n.id === nodeId;
  }
}

export function selectedNode(nodes: readonly DiagramNode[]): DiagramNode | undefined {
  return nodes.find(n => n.selected);
}

/** Borderless text nodes take the size of their text. Other shapes are left alone. */
export function autoFitText(node: DiagramNode): void {
  if (node.shape !== 'Text') return;
  const extent = measureTextBlock(node.text);
  const size = clampNodeSize(extent.width, extent.height);
  node.width = size.width;
  node.height = size.height;
}

export function resizeNodeBy(node: DiagramNode, dw: number, dh: number): void {
  const size = clampNodeSize(node.width + dw, node.height + dh);
  node.width = size.width;
  node.height = size.height;
}

// ──────────────────────────────────────────────
// CONNECTIONS
// ──────────────────────────────────────────────

export function addConnection(content: DiagramContent, connection: Connection): void {
  content.connections.push(connection);
}

export function deleteConnection(content: DiagramContent, index: number): Connection | null {
  if (index < 0 || index >= content.connections.length) return null;
  const [removed] = content.connections.splice(index, 1);
  return removed;
}

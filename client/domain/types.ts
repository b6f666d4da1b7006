/**
 * Diagram model types
 *
 * Pure data. Geometry predicates live in ./geometry, structural edits in ./mutations.
 * Node order in `Diagram.nodes` is z-order: index 0 is drawn first, the last node is on top.
 */

import type { Point } from '../core/viewstate/CoordinateService';

export type ShapeType = 'Box' | 'Diamond' | 'Text' | 'Frame';

export type NodeId = number;

export interface DiagramNode {
  id: NodeId;
  shape: ShapeType;
  /** Column in world coordinates */
  x: number;
  /** Row in world coordinates */
  y: number;
  width: number;
  height: number;
  text: string;
  selected: boolean;
}

/**
 * A connector between two nodes. Nodes are referenced by id only; a connection must be
 * dropped as soon as either endpoint node is deleted.
 */
export interface Connection {
  fromId: NodeId;
  /** Relative to the source node's top-left corner */
  fromOffset: Point;
  toId: NodeId;
  /** Relative to the target node's top-left corner */
  toOffset: Point;
  hasArrow: boolean;
}

/** A connector being dragged out of a node, not yet attached to a target. */
export type PartialConnection = {
  kind: 'starting';
  fromId: NodeId;
  fromOffset: Point;
  /** Live pointer position, world coordinates */
  currentPos: Point;
};

export interface Diagram {
  title: string;
  nodes: DiagramNode[];
  connections: Connection[];
}

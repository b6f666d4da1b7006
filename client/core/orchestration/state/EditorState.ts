/**
 * Editor state for one editing session
 *
 * One instance per session, owned by the event loop. The Orchestrator receives it by
 * exclusive reference and mutates it; the renderer receives it read-only.
 */

import type { Point } from '../../viewstate/CoordinateService';
import type { Connection, Diagram, DiagramNode, NodeId, PartialConnection } from '../../../domain/types';
import type { Mode } from '../types';

export const INITIAL_STATUS = 'Press <Space> for commands';

export interface EditorState {
  title: string;
  nodes: DiagramNode[];
  connections: Connection[];

  /** World-to-screen translation; signed, the camera may pan past the origin */
  cameraOffset: Point;
  mode: Mode;

  /** Node being dragged by its body, and where inside it the pointer grabbed */
  draggingNodeId: NodeId | null;
  dragOffset: Point;
  /** Node being resized by its bottom-right corner */
  resizingNodeId: NodeId | null;
  partialConnection: PartialConnection | null;

  selectedConnectionIndex: number | null;

  /** Keyboard connector armed with `c` / `a`, waiting for Enter on a target */
  connectionSourceId: NodeId | null;
  connectionHasArrow: boolean;

  statusMessage: string;
}

export function createEditorState(title: string): EditorState {
  return {
    title,
    nodes: [],
    connections: [],
    cameraOffset: { x: 0, y: 0 },
    mode: { kind: 'normal' },
    draggingNodeId: null,
    dragOffset: { x: 0, y: 0 },
    resizingNodeId: null,
    partialConnection: null,
    selectedConnectionIndex: null,
    connectionSourceId: null,
    connectionHasArrow: false,
    statusMessage: INITIAL_STATUS,
  };
}

export function editorStateFromDiagram(diagram: Diagram): EditorState {
  const state = createEditorState(diagram.title);
  state.nodes = diagram.nodes.map(n => ({ ...n }));
  state.connections = diagram.connections.map(c => ({
    ...c,
    fromOffset: { ...c.fromOffset },
    toOffset: { ...c.toOffset },
  }));
  return state;
}

/** Snapshot of the persistent part of the state */
export function toDiagram(state: EditorState): Diagram {
  return {
    title: state.title,
    nodes: state.nodes.map(n => ({ ...n })),
    connections: state.connections.map(c => ({
      ...c,
      fromOffset: { ...c.fromOffset },
      toOffset: { ...c.toOffset },
    })),
  };
}

/** Drops every transient pointer interaction */
export function clearDragState(state: EditorState): void {
  state.draggingNodeId = null;
  state.resizingNodeId = null;
  state.partialConnection = null;
}

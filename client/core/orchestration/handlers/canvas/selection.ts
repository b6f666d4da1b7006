/**
 * Selection Handlers
 *
 * At most one node is selected at a time through these handlers, and a node selection
 * always drops the connection selection.
 */

import type { Point } from '../../../viewstate/CoordinateService';
import type { NodeId } from '../../../../domain/types';
import type { EditorState } from '../../state/EditorState';
import { selectOnly } from '../../../../domain/mutations';
import { topmostConnectionAt } from '../../../../domain/geometry';
import type { CycleDirection } from '../../Policy';
import { cycleIndex } from '../../Policy';

/** Esc in Normal: nodes, connection and the armed connector. */
export function clearSelection(state: EditorState): void {
  selectOnly(state.nodes, null);
  state.selectedConnectionIndex = null;
  state.connectionSourceId = null;
  state.statusMessage = 'Selection cleared';
}

export function selectNode(state: EditorState, nodeId: NodeId): void {
  selectOnly(state.nodes, nodeId);
  state.selectedConnectionIndex = null;
}

/** Tab / Shift-Tab from the first selected node, in z-order. */
export function cycleSelection(state: EditorState, direction: CycleDirection): void {
  const current = state.nodes.findIndex(n => n.selected);
  const next = cycleIndex(state.nodes.length, current === -1 ? null : current, direction);
  if (next === null) return;
  selectNode(state, state.nodes[next].id);
}

/** Tab out of Insert: the node after `nodeId`, or the first node if it is gone. */
export function selectNodeAfter(state: EditorState, nodeId: NodeId): void {
  const current = state.nodes.findIndex(n => n.id === nodeId);
  const next = cycleIndex(state.nodes.length, current === -1 ? null : current, 'forward');
  if (next === null) return;
  selectNode(state, state.nodes[next].id);
}

/** Press on empty canvas: drop every selection, then pick the topmost connection there. */
export function selectConnectionAt(state: EditorState, point: Point): void {
  selectOnly(state.nodes, null);
  state.selectedConnectionIndex = null;

  const index = topmostConnectionAt(state.connections, state.nodes, point.x, point.y);
  if (index === undefined) return;
  state.selectedConnectionIndex = index;
  state.statusMessage = "Connection selected | 'a': Arrow | 'Del': Remove";
}

/**
 * Connect Nodes Handler
 *
 * Two ways to make a connection:
 * - keyboard: arm a source with c / a, select the target, Enter
 * - pointer: drag out of a border cell, release over another node
 */

import type { Point } from '../../../viewstate/CoordinateService';
import type { DiagramNode } from '../../../../domain/types';
import type { EditorState } from '../../state/EditorState';
import { addConnection, selectedNode } from '../../../../domain/mutations';
import { findNode, topmostNodeAt } from '../../../../domain/geometry';
import { nearestEdgeAnchor, nodeLabel, pickDirectionalAnchors } from '../../Policy';
import { debugLog } from '../../../../utils/debugLog';

/** Arms the keyboard connector with `node` as its source. */
export function startConnector(state: EditorState, node: DiagramNode, arrow: boolean): void {
  state.connectionSourceId = node.id;
  state.connectionHasArrow = arrow;
  const kind = arrow ? 'Arrow' : 'Connector';
  state.statusMessage = `${kind} source: ${nodeLabel(node)}. Tab to target, Enter to finish.`;
}

/**
 * Commits the armed connector onto the selected node.
 * Needs an armed source that still exists and a different selected target; otherwise a no-op.
 */
export function commitKeyboardConnection(state: EditorState): boolean {
  if (state.connectionSourceId === null) return false;
  const target = selectedNode(state.nodes);
  if (!target || target.id === state.connectionSourceId) return false;
  const source = findNode(state.nodes, state.connectionSourceId);
  if (!source) return false;

  const { fromOffset, toOffset } = pickDirectionalAnchors(source, target);
  addConnection(state, {
    fromId: source.id,
    fromOffset,
    toId: target.id,
    toOffset,
    hasArrow: state.connectionHasArrow,
  });
  debugLog('connectNodes', `keyboard ${source.id} -> ${target.id}`);

  state.connectionSourceId = null;
  state.statusMessage = 'Keyboard connection created!';
  return true;
}

/**
 * Finishes a connector drag at a world cell. Connects to the topmost other node under
 * it, on the anchor of its nearest edge. Arrowed.
 */
export function commitPointerConnection(state: EditorState, point: Point): boolean {
  const partial = state.partialConnection;
  if (!partial) return false;

  const candidates = state.nodes.filter(n => n.id !== partial.fromId);
  const target = topmostNodeAt(candidates, point.x, point.y);
  if (!target) return false;

  addConnection(state, {
    fromId: partial.fromId,
    fromOffset: partial.fromOffset,
    toId: target.id,
    toOffset: nearestEdgeAnchor(target, point),
    hasArrow: true,
  });
  debugLog('connectNodes', `pointer ${partial.fromId} -> ${target.id}`);
  return true;
}

/**
 * Delete Node Handler
 *
 * Flow: Domain.mutate (node + its connections) → clean transient state
 */

import type { NodeId } from '../../../../domain/types';
import type { EditorState } from '../../state/EditorState';
import { deleteNode as domainDeleteNode } from '../../../../domain/mutations';
import { debugLog } from '../../../../utils/debugLog';

/** Returns false when the id is unknown (nothing changes). */
export function deleteNode(state: EditorState, nodeId: NodeId): boolean {
  const removedConnections = domainDeleteNode(state, nodeId);
  if (removedConnections === null) return false;

  debugLog('deleteNode', `node ${nodeId} removed with ${removedConnections} connection(s)`);

  // Connection indices shifted
  if (removedConnections > 0) {
    state.selectedConnectionIndex = null;
  }
  if (state.connectionSourceId === nodeId) {
    state.connectionSourceId = null;
  }
  if (state.draggingNodeId === nodeId) state.draggingNodeId = null;
  if (state.resizingNodeId === nodeId) state.resizingNodeId = null;
  if (state.partialConnection?.fromId === nodeId) state.partialConnection = null;

  state.statusMessage = 'Shape and connections deleted';
  return true;
}

/**
 * Delete Edge Handler
 */

import type { EditorState } from '../../state/EditorState';
import { deleteConnection } from '../../../../domain/mutations';

export function deleteEdge(state: EditorState, index: number): boolean {
  const removed = deleteConnection(state, index);
  if (!removed) return false;
  state.selectedConnectionIndex = null;
  state.statusMessage = 'Connection deleted';
  return true;
}

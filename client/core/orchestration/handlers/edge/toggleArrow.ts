import type { EditorState } from '../../state/EditorState';

export function toggleArrow(state: EditorState, index: number): boolean {
  const conn = state.connections[index];
  if (!conn) return false;
  conn.hasArrow = !conn.hasArrow;
  state.statusMessage = conn.hasArrow ? 'Arrow enabled' : 'Arrow disabled';
  return true;
}

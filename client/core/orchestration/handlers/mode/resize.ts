import type { NodeId } from '../../../../domain/types';
import type { EditorState } from '../../state/EditorState';
import type { EditorEffect, KeyInput } from '../../types';
import { findNode } from '../../../../domain/geometry';
import { stepResize } from '../node';

export function handleResizeKey(state: EditorState, nodeId: NodeId, input: KeyInput): EditorEffect[] {
  const node = findNode(state.nodes, nodeId);
  if (!node) {
    state.mode = { kind: 'normal' };
    return [];
  }

  if (input.type === 'key') {
    if (input.key === 'escape' || input.key === 'enter') {
      state.mode = { kind: 'normal' };
      state.statusMessage = 'Resize finished';
    }
    return [];
  }

  switch (input.char) {
    case '+':
    case '=':
      state.statusMessage = stepResize(node, 'grow');
      break;
    case '-':
    case '_':
      state.statusMessage = stepResize(node, 'shrink');
      break;
  }
  return [];
}

/**
 * Insert mode: typing into one node
 */

import type { NodeId } from '../../../../domain/types';
import type { EditorState } from '../../state/EditorState';
import type { EditorEffect, KeyInput } from '../../types';
import { findNode } from '../../../../domain/geometry';
import { selectOnly } from '../../../../domain/mutations';
import { appendText, deleteLastChar } from '../node';
import { selectNodeAfter } from '../canvas';

export function handleInsertKey(state: EditorState, nodeId: NodeId, input: KeyInput): EditorEffect[] {
  if (input.type === 'key' && input.key === 'escape') {
    state.mode = { kind: 'normal' };
    selectOnly(state.nodes, null);
    return [];
  }
  if (input.type === 'key' && input.key === 'tab') {
    state.mode = { kind: 'normal' };
    selectNodeAfter(state, nodeId);
    return [];
  }

  const node = findNode(state.nodes, nodeId);
  if (!node) {
    state.mode = { kind: 'normal' };
    return [];
  }

  if (input.type === 'char') {
    appendText(node, input.char);
  } else if (input.key === 'backspace') {
    deleteLastChar(node);
  } else if (input.key === 'enter') {
    appendText(node, '\n');
  }
  return [];
}

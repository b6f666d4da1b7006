/**
 * Normal mode keyboard routing
 *
 * Selection, navigation, deletion and the keyboard connector live here; everything that
 * types text or opens a palette switches mode first.
 */

import type { Point } from '../../../viewstate/CoordinateService';
import type { EditorState } from '../../state/EditorState';
import type { EditorEffect, KeyInput, SpecialKey } from '../../types';
import { selectedNode } from '../../../../domain/mutations';
import { deleteNode, nudgeNode } from '../node';
import { commitKeyboardConnection, deleteEdge, startConnector, toggleArrow } from '../edge';
import { clearSelection, cycleSelection, panCamera } from '../canvas';

export const ARROW_DELTAS: Partial<Record<SpecialKey, Point>> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

export function handleNormalKey(state: EditorState, input: KeyInput): EditorEffect[] {
  if (input.type === 'char') {
    return handleNormalChar(state, input.char);
  }

  const key = input.key;
  switch (key) {
    case 'escape':
      clearSelection(state);
      break;
    case 'tab':
      cycleSelection(state, 'forward');
      break;
    case 'backtab':
      cycleSelection(state, 'backward');
      break;
    case 'enter':
      commitKeyboardConnection(state);
      break;
    case 'backspace':
    case 'delete': {
      if (state.selectedConnectionIndex !== null) {
        deleteEdge(state, state.selectedConnectionIndex);
        break;
      }
      const node = selectedNode(state.nodes);
      if (node) deleteNode(state, node.id);
      break;
    }
    case 'up':
    case 'down':
    case 'left':
    case 'right': {
      const delta = ARROW_DELTAS[key];
      if (!delta) break;
      const node = selectedNode(state.nodes);
      if (node) {
        nudgeNode(node, delta);
      } else {
        panCamera(state, delta);
      }
      break;
    }
  }
  return [];
}

function handleNormalChar(state: EditorState, char: string): EditorEffect[] {
  switch (char) {
    case ' ':
      state.mode = { kind: 'leader' };
      return [];
    case 'q':
      return [{ type: 'quit' }];
    case 'i': {
      const node = selectedNode(state.nodes);
      if (node) state.mode = { kind: 'insert', nodeId: node.id };
      return [];
    }
    case 'r': {
      const node = selectedNode(state.nodes);
      if (node) {
        state.mode = { kind: 'resize', nodeId: node.id };
        state.statusMessage = 'Resize Mode: Use +/- to scale, Esc to finish';
      }
      return [];
    }
    case 'c': {
      const node = selectedNode(state.nodes);
      if (node) startConnector(state, node, false);
      return [];
    }
    case 'a': {
      // On a selected connection `a` toggles its arrow instead of starting one
      if (state.selectedConnectionIndex !== null) {
        toggleArrow(state, state.selectedConnectionIndex);
        return [];
      }
      const node = selectedNode(state.nodes);
      if (node) {
        startConnector(state, node, true);
      } else {
        state.statusMessage = 'Select a node (a) for Arrow or connection (a) to toggle';
      }
      return [];
    }
    default:
      return [];
  }
}

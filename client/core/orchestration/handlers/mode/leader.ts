/**
 * Leader mode: the one-key command palette opened with Space
 */

import type { ShapeType } from '../../../../domain/types';
import type { EditorState } from '../../state/EditorState';
import { toDiagram } from '../../state/EditorState';
import type { ApplyContext, EditorEffect, KeyInput } from '../../types';
import { spawnPosition } from '../../Policy';
import { renderExportText } from '../../render/Renderer';
import { addNode } from '../node';

const SPAWN_KEYS = new Map<string, ShapeType>([
  ['n', 'Box'],
  ['d', 'Diamond'],
  ['t', 'Text'],
  ['f', 'Frame'],
]);

export function handleLeaderKey(state: EditorState, input: KeyInput, context: ApplyContext): EditorEffect[] {
  if (input.type === 'key') {
    if (input.key === 'escape') state.mode = { kind: 'normal' };
    return [];
  }

  const shape = SPAWN_KEYS.get(input.char);
  if (shape) {
    addNode(state, shape, spawnPosition(state.nodes));
    state.statusMessage = 'New shape created below previous';
    return [];
  }

  switch (input.char) {
    case 'h':
      state.mode = { kind: 'help' };
      return [];
    case 'w': {
      state.mode = { kind: 'normal' };
      const text = renderExportText(state, context);
      return [{ type: 'write', title: state.title, diagram: toDiagram(state), text }];
    }
    case 'c': {
      state.mode = { kind: 'normal' };
      return [{ type: 'copy', text: renderExportText(state, context) }];
    }
    case 'q':
      return [{ type: 'quit' }];
    default:
      return [];
  }
}

/**
 * Context menu mode: keyboard navigation and entry activation
 *
 * Activation acts at the menu's anchor translated into the world, so the new shape or
 * the deleted shape is the one that was right-clicked.
 */

import { CoordinateService } from '../../../viewstate/CoordinateService';
import type { EditorState } from '../../state/EditorState';
import type { EditorEffect, KeyInput } from '../../types';
import { CONTEXT_MENU_ENTRIES, stepMenuIndex } from '../../contextMenu';
import { topmostConnectionAt, topmostNodeAt } from '../../../../domain/geometry';
import { addNode, deleteNode } from '../node';
import { deleteEdge, startConnector } from '../edge';
import { debugLog } from '../../../../utils/debugLog';

type ContextMenuMode = Extract<EditorState['mode'], { kind: 'context-menu' }>;

export function handleContextMenuKey(state: EditorState, mode: ContextMenuMode, input: KeyInput): EditorEffect[] {
  if (input.type === 'char') {
    if (input.char === ' ') activateContextMenuEntry(state, mode, mode.selectedIndex);
    return [];
  }

  switch (input.key) {
    case 'up':
    case 'down':
      state.mode = { ...mode, selectedIndex: stepMenuIndex(mode.selectedIndex, input.key) };
      break;
    case 'enter':
      activateContextMenuEntry(state, mode, mode.selectedIndex);
      break;
    case 'escape':
      state.mode = { kind: 'normal' };
      break;
  }
  return [];
}

export function activateContextMenuEntry(state: EditorState, mode: ContextMenuMode, index: number): void {
  const entry = CONTEXT_MENU_ENTRIES[index];
  const world = CoordinateService.toWorldFromScreen(mode, state.cameraOffset);
  state.mode = { kind: 'normal' };
  if (!entry) return;

  debugLog('contextMenu', `activate "${entry.label.trim()}" at (${world.x}, ${world.y})`);
  const action = entry.action;

  switch (action.kind) {
    case 'create':
      addNode(state, action.shape, world);
      break;
    case 'start-connector': {
      const node = topmostNodeAt(state.nodes, world.x, world.y);
      if (node) {
        startConnector(state, node, action.arrow);
      } else {
        state.statusMessage = 'No node at click position';
      }
      break;
    }
    case 'delete': {
      const node = topmostNodeAt(state.nodes, world.x, world.y);
      if (node) {
        deleteNode(state, node.id);
        break;
      }
      const index = topmostConnectionAt(state.connections, state.nodes, world.x, world.y);
      if (index !== undefined) deleteEdge(state, index);
      break;
    }
    case 'cancel':
    case 'separator':
      break;
  }
}

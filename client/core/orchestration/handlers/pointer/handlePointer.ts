/**
 * Pointer Handler
 *
 * Button-down picks one interaction for the topmost node under the pointer, in priority:
 * resize corner, border (connector drag), body (move). Empty canvas selects connections.
 * Drags update whichever interaction is armed; button-up commits it and clears all
 * transient drag state.
 *
 * Coordinates arrive in canvas screen cells and are moved into the world here.
 */

import type { Point } from '../../../viewstate/CoordinateService';
import { CoordinateService } from '../../../viewstate/CoordinateService';
import type { EditorState } from '../../state/EditorState';
import { clearDragState } from '../../state/EditorState';
import type { ApplyContext, PointerInput } from '../../types';
import { bringToFront } from '../../../../domain/mutations';
import { findNode, topmostNodeAt } from '../../../../domain/geometry';
import { classifyNodeHit, snapBorderAnchor } from '../../Policy';
import { contextMenuBounds, entryIndexAt, menuContains } from '../../contextMenu';
import { dragNodeTo, dragResizeTo } from '../node';
import { commitPointerConnection } from '../edge';
import { selectConnectionAt, selectNode } from '../canvas';
import { activateContextMenuEntry } from '../mode/contextMenu';

export function handlePointer(state: EditorState, input: PointerInput, context: ApplyContext): void {
  const mode = state.mode;
  // Palettes are modal
  if (mode.kind === 'help' || mode.kind === 'leader') return;

  const screen = { x: input.x, y: input.y };

  if (mode.kind === 'context-menu' && input.button === 'left') {
    const bounds = contextMenuBounds(mode, context.viewport);
    if (menuContains(bounds, screen.x, screen.y)) {
      const index = entryIndexAt(bounds, screen.x, screen.y);
      if (index === null) return;
      state.mode = { ...mode, selectedIndex: index };
      if (input.action === 'down') activateContextMenuEntry(state, mode, index);
    } else if (input.action === 'down') {
      state.mode = { kind: 'normal' };
    }
    return;
  }

  if (input.button === 'right') {
    if (input.action === 'down') {
      clearDragState(state);
      state.mode = { kind: 'context-menu', x: screen.x, y: screen.y, selectedIndex: 0 };
    }
    return;
  }

  const world = CoordinateService.toWorldFromScreen(screen, state.cameraOffset);
  switch (input.action) {
    case 'down':
      pointerDown(state, world);
      break;
    case 'drag':
      pointerDrag(state, world, context);
      break;
    case 'up':
      pointerUp(state, world);
      break;
  }
}

function pointerDown(state: EditorState, world: Point): void {
  clearDragState(state);

  const hit = topmostNodeAt(state.nodes, world.x, world.y);
  if (!hit) {
    state.mode = { kind: 'normal' };
    selectConnectionAt(state, world);
    return;
  }

  const local = CoordinateService.toRelative(world, hit);
  switch (classifyNodeHit(hit, local)) {
    case 'corner':
      state.resizingNodeId = hit.id;
      break;
    case 'border':
      state.partialConnection = {
        kind: 'starting',
        fromId: hit.id,
        fromOffset: snapBorderAnchor(hit, local),
        currentPos: world,
      };
      break;
    case 'body':
      state.draggingNodeId = hit.id;
      state.dragOffset = local;
      selectNode(state, hit.id);
      bringToFront(state.nodes, hit.id);
      break;
  }
}

function pointerDrag(state: EditorState, world: Point, context: ApplyContext): void {
  if (state.partialConnection) {
    state.partialConnection = { ...state.partialConnection, currentPos: world };
    return;
  }
  if (state.resizingNodeId !== null) {
    const node = findNode(state.nodes, state.resizingNodeId);
    if (node) dragResizeTo(node, world);
    return;
  }
  if (state.draggingNodeId !== null) {
    const node = findNode(state.nodes, state.draggingNodeId);
    if (node) dragNodeTo(node, world, state.dragOffset, state.cameraOffset, context.viewport);
  }
}

function pointerUp(state: EditorState, world: Point): void {
  if (state.partialConnection) {
    commitPointerConnection(state, world);
  } else if (state.draggingNodeId !== null && findNode(state.nodes, state.draggingNodeId)) {
    // Click-to-edit: releasing a moved (or just clicked) node starts typing into it
    state.mode = { kind: 'insert', nodeId: state.draggingNodeId };
  }
  clearDragState(state);
}

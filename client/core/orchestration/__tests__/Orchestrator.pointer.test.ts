/**
 * Tests for the Orchestrator pointer paths: drag, resize, connector drags, connection
 * picking and the right-click menu
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import { apply } from '../Orchestrator';
import type { EditorState } from '../state/EditorState';
import { createEditorState } from '../state/EditorState';
import type { ApplyContext, PointerAction, PointerButton, SpecialKey } from '../types';
import type { DiagramNode } from '../../../domain/types';

const context: ApplyContext = { viewport: { width: 77, height: 20 }, exportWidth: 79 };

function pointer(state: EditorState, action: PointerAction, x: number, y: number, button: PointerButton = 'left'): void {
  apply(state, { type: 'pointer', action, button, x, y }, context);
}

function press(state: EditorState, ...keys: SpecialKey[]): void {
  for (const key of keys) apply(state, { type: 'key', key }, context);
}

function box(id: number, x: number, y: number): DiagramNode {
  return { id, shape: 'Box', x, y, width: 10, height: 5, text: '', selected: false };
}

describe('Orchestrator pointer input', () => {
  let state: EditorState;

  beforeEach(() => {
    state = createEditorState('Pointer');
    state.nodes = [box(1, 0, 0), box(2, 20, 0)];
  });

  describe('dragging a body', () => {
    test('press selects and raises the node', () => {
      pointer(state, 'down', 3, 2);
      expect(state.draggingNodeId).toBe(1);
      expect(state.dragOffset).toEqual({ x: 3, y: 2 });
      expect(state.nodes.map(n => n.id)).toEqual([2, 1]);
      expect(state.nodes[1].selected).toBe(true);
    });

    test('the grab point stays under the pointer', () => {
      pointer(state, 'down', 3, 2);
      pointer(state, 'drag', 8, 4);
      expect(state.nodes[1]).toMatchObject({ id: 1, x: 5, y: 2 });
    });

    test('the node stays inside the visible canvas', () => {
      pointer(state, 'down', 3, 2);
      pointer(state, 'drag', 76, 19);
      expect(state.nodes[1]).toMatchObject({ x: 67, y: 15 });
    });

    test('release starts typing into the node', () => {
      pointer(state, 'down', 3, 2);
      pointer(state, 'up', 3, 2);
      expect(state.mode).toEqual({ kind: 'insert', nodeId: 1 });
      expect(state.draggingNodeId).toBeNull();
    });

    test('the camera offset moves presses into the world', () => {
      state.cameraOffset = { x: 5, y: 0 };
      pointer(state, 'down', 18, 2);
      expect(state.draggingNodeId).toBe(2);
      expect(state.dragOffset).toEqual({ x: 3, y: 2 });
    });
  });

  describe('resizing by the corner', () => {
    test('the corner follows the pointer', () => {
      pointer(state, 'down', 9, 4);
      expect(state.resizingNodeId).toBe(1);
      pointer(state, 'drag', 14, 9);
      expect([state.nodes[0].width, state.nodes[0].height]).toEqual([15, 10]);
    });

    test('never smaller than 3x3', () => {
      pointer(state, 'down', 9, 4);
      pointer(state, 'drag', 1, 1);
      expect([state.nodes[0].width, state.nodes[0].height]).toEqual([3, 3]);
    });

    test('release leaves the mode alone', () => {
      pointer(state, 'down', 9, 4);
      pointer(state, 'up', 12, 6);
      expect(state.mode).toEqual({ kind: 'normal' });
      expect(state.resizingNodeId).toBeNull();
    });
  });

  describe('connector drags', () => {
    test('a border press snaps to the edge anchor', () => {
      pointer(state, 'down', 0, 3);
      expect(state.partialConnection).toEqual({
        kind: 'starting',
        fromId: 1,
        fromOffset: { x: 0, y: 2 },
        currentPos: { x: 0, y: 3 },
      });
    });

    test('dropping on another node connects to its nearest edge with an arrow', () => {
      pointer(state, 'down', 0, 2);
      pointer(state, 'drag', 21, 1);
      expect(state.partialConnection?.currentPos).toEqual({ x: 21, y: 1 });
      pointer(state, 'up', 21, 1);

      expect(state.connections).toEqual([
        { fromId: 1, fromOffset: { x: 0, y: 2 }, toId: 2, toOffset: { x: 5, y: 0 }, hasArrow: true },
      ]);
      expect(state.partialConnection).toBeNull();
    });

    test('dropping on the source node or empty canvas is discarded', () => {
      pointer(state, 'down', 0, 2);
      pointer(state, 'up', 4, 2);
      pointer(state, 'down', 0, 2);
      pointer(state, 'up', 50, 15);
      expect(state.connections).toHaveLength(0);
      expect(state.partialConnection).toBeNull();
    });
  });

  describe('picking connections', () => {
    beforeEach(() => {
      state.connections = [{ fromId: 1, fromOffset: { x: 9, y: 2 }, toId: 2, toOffset: { x: 0, y: 2 }, hasArrow: false }];
      state.nodes[0].selected = true;
    });

    test('a press on the route selects the connection', () => {
      pointer(state, 'down', 14, 2);
      expect(state.selectedConnectionIndex).toBe(0);
      expect(state.nodes.some(n => n.selected)).toBe(false);
      expect(state.statusMessage).toBe("Connection selected | 'a': Arrow | 'Del': Remove");
    });

    test('a press on empty canvas clears every selection', () => {
      state.selectedConnectionIndex = 0;
      pointer(state, 'down', 14, 10);
      expect(state.selectedConnectionIndex).toBeNull();
      expect(state.nodes.some(n => n.selected)).toBe(false);
    });
  });

  test('help and the leader palette ignore the pointer', () => {
    state.mode = { kind: 'help' };
    pointer(state, 'down', 3, 2);
    expect(state.draggingNodeId).toBeNull();
    state.mode = { kind: 'leader' };
    pointer(state, 'down', 40, 10, 'right');
    expect(state.mode).toEqual({ kind: 'leader' });
  });

  describe('context menu', () => {
    test('right press opens the menu at the pointer', () => {
      pointer(state, 'down', 3, 2);
      pointer(state, 'down', 30, 8, 'right');
      expect(state.mode).toEqual({ kind: 'context-menu', x: 30, y: 8, selectedIndex: 0 });
      expect(state.draggingNodeId).toBeNull();
    });

    test('arrow keys skip separators', () => {
      pointer(state, 'down', 30, 8, 'right');
      press(state, 'down', 'down', 'down', 'down');
      expect(state.mode).toMatchObject({ kind: 'context-menu', selectedIndex: 5 });
      press(state, 'up');
      expect(state.mode).toMatchObject({ selectedIndex: 3 });
    });

    test('Enter creates the highlighted shape where the menu was opened', () => {
      pointer(state, 'down', 30, 8, 'right');
      press(state, 'down', 'enter');
      expect(state.nodes[2]).toMatchObject({ id: 3, shape: 'Diamond', x: 30, y: 8, selected: true });
      expect(state.mode).toEqual({ kind: 'insert', nodeId: 3 });
    });

    test('clicking an entry activates it', () => {
      pointer(state, 'down', 40, 5, 'right');
      // bounds start at (40, 5); entry rows begin one row below the border
      pointer(state, 'down', 42, 8);
      expect(state.nodes[2]).toMatchObject({ shape: 'Text', x: 40, y: 5 });
    });

    test('clicking a border row highlights nothing and keeps the menu open', () => {
      pointer(state, 'down', 40, 5, 'right');
      pointer(state, 'down', 42, 5);
      expect(state.mode).toEqual({ kind: 'context-menu', x: 40, y: 5, selectedIndex: 0 });
    });

    test('clicking outside closes the menu without touching the node there', () => {
      pointer(state, 'down', 40, 5, 'right');
      pointer(state, 'down', 3, 2);
      expect(state.mode).toEqual({ kind: 'normal' });
      expect(state.draggingNodeId).toBeNull();
      expect(state.nodes.some(n => n.selected)).toBe(false);
    });

    test('Delete removes the shape under the menu anchor', () => {
      pointer(state, 'down', 22, 1, 'right');
      state.mode = { kind: 'context-menu', x: 22, y: 1, selectedIndex: 7 };
      press(state, 'enter');
      expect(state.nodes.map(n => n.id)).toEqual([1]);
    });

    test('Delete falls back to a connection under the anchor', () => {
      state.connections = [{ fromId: 1, fromOffset: { x: 9, y: 2 }, toId: 2, toOffset: { x: 0, y: 2 }, hasArrow: false }];
      state.mode = { kind: 'context-menu', x: 14, y: 2, selectedIndex: 7 };
      apply(state, { type: 'char', char: ' ' }, context);
      expect(state.connections).toHaveLength(0);
      expect(state.statusMessage).toBe('Connection deleted');
    });

    test('Start Arrow on empty canvas reports it', () => {
      state.mode = { kind: 'context-menu', x: 50, y: 15, selectedIndex: 6 };
      press(state, 'enter');
      expect(state.mode).toEqual({ kind: 'normal' });
      expect(state.statusMessage).toBe('No node at click position');
    });

    test('Start Connector arms the node under the anchor', () => {
      state.mode = { kind: 'context-menu', x: 2, y: 2, selectedIndex: 5 };
      press(state, 'enter');
      expect(state.connectionSourceId).toBe(1);
      expect(state.connectionHasArrow).toBe(false);
    });

    test('Esc closes the menu', () => {
      pointer(state, 'down', 30, 8, 'right');
      press(state, 'escape');
      expect(state.mode).toEqual({ kind: 'normal' });
    });
  });
});

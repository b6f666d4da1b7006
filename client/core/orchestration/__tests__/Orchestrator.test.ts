/**
 * Tests for the Orchestrator keyboard paths
 *
 * Drives the state machine through whole key sequences, the way the terminal shell does,
 * and checks the resulting state, status line and effects.
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import { apply } from '../Orchestrator';
import type { EditorState } from '../state/EditorState';
import { createEditorState, toDiagram } from '../state/EditorState';
import type { ApplyContext, EditorEffect, SpecialKey } from '../types';

const context: ApplyContext = { viewport: { width: 77, height: 20 }, exportWidth: 79 };

function type(state: EditorState, text: string): EditorEffect[] {
  return Array.from(text).flatMap(char => apply(state, { type: 'char', char }, context));
}

function press(state: EditorState, ...keys: SpecialKey[]): EditorEffect[] {
  return keys.flatMap(key => apply(state, { type: 'key', key }, context));
}

/** Leader + shape key, some text, Esc back to Normal */
function spawn(state: EditorState, shapeKey: string, text = ''): void {
  type(state, ' ' + shapeKey + text);
  press(state, 'escape');
}

describe('Orchestrator', () => {
  let state: EditorState;

  beforeEach(() => {
    state = createEditorState('Flow');
  });

  describe('creating shapes', () => {
    test('Leader n, typing and Esc leaves a finished, unselected box', () => {
      type(state, ' n');
      expect(state.mode).toEqual({ kind: 'insert', nodeId: 1 });
      expect(state.statusMessage).toBe('New shape created below previous');

      type(state, 'Hi');
      press(state, 'escape');

      expect(state.mode).toEqual({ kind: 'normal' });
      expect(state.nodes).toEqual([
        { id: 1, shape: 'Box', x: 10, y: 10, width: 20, height: 5, text: 'Hi', selected: false },
      ]);
    });

    test('each new shape spawns two rows below the previous one', () => {
      spawn(state, 'n');
      spawn(state, 'd');
      spawn(state, 't');
      expect(state.nodes.map(n => [n.shape, n.x, n.y])).toEqual([
        ['Box', 10, 10],
        ['Diamond', 10, 17],
        ['Text', 10, 26],
      ]);
    });

    test('Leader f spawns a frame', () => {
      type(state, ' f');
      expect(state.nodes[0]).toMatchObject({ shape: 'Frame', width: 30, height: 10, selected: true });
    });

    test('an unknown leader key keeps the palette open', () => {
      type(state, ' z');
      expect(state.mode).toEqual({ kind: 'leader' });
      expect(state.nodes).toHaveLength(0);
    });

    test('Esc closes the palette', () => {
      type(state, ' ');
      press(state, 'escape');
      expect(state.mode).toEqual({ kind: 'normal' });
    });
  });

  describe('insert mode', () => {
    test('text nodes grow and shrink with their text', () => {
      type(state, ' tabc');
      expect([state.nodes[0].width, state.nodes[0].height]).toEqual([3, 1]);

      press(state, 'enter');
      type(state, 'hello');
      expect(state.nodes[0].text).toBe('abc\nhello');
      expect([state.nodes[0].width, state.nodes[0].height]).toEqual([5, 2]);

      press(state, 'backspace');
      expect(state.nodes[0].text).toBe('abc\nhell');
      expect(state.nodes[0].width).toBe(4);
    });

    test('Tab finishes editing and selects the next node', () => {
      spawn(state, 'n');
      type(state, ' n');
      press(state, 'tab');
      expect(state.mode).toEqual({ kind: 'normal' });
      expect(state.nodes.map(n => n.selected)).toEqual([true, false]);
    });

    test('typing into a node that no longer exists drops back to Normal', () => {
      state.mode = { kind: 'insert', nodeId: 99 };
      type(state, 'x');
      expect(state.mode).toEqual({ kind: 'normal' });
      expect(state.nodes).toHaveLength(0);
    });

    test('i re-enters a selected node', () => {
      spawn(state, 'n', 'A');
      press(state, 'tab');
      type(state, 'iB');
      expect(state.nodes[0].text).toBe('AB');
    });

    test('q is plain text while typing', () => {
      type(state, ' n');
      expect(type(state, 'q')).toEqual([]);
      expect(state.nodes[0].text).toBe('q');
    });
  });

  describe('selection and navigation', () => {
    beforeEach(() => {
      spawn(state, 'n');
      spawn(state, 'n');
      spawn(state, 'n');
    });

    test('Shift-Tab with nothing selected picks the last node', () => {
      press(state, 'backtab');
      expect(state.nodes.findIndex(n => n.selected)).toBe(2);
    });

    test('Tab wraps around', () => {
      press(state, 'backtab', 'tab');
      expect(state.nodes.findIndex(n => n.selected)).toBe(0);
    });

    test('arrows nudge the selected node and stop at the origin', () => {
      press(state, 'tab');
      state.nodes[0].x = 0;
      press(state, 'left', 'down');
      expect([state.nodes[0].x, state.nodes[0].y]).toEqual([0, 11]);
    });

    test('arrows pan the camera when nothing is selected', () => {
      press(state, 'up');
      expect(state.cameraOffset).toEqual({ x: 0, y: -1 });
      expect(state.statusMessage).toBe('Canvas Pan: 0, -1');
    });

    test('Esc clears every selection', () => {
      press(state, 'tab');
      type(state, 'c');
      press(state, 'escape');
      expect(state.nodes.some(n => n.selected)).toBe(false);
      expect(state.connectionSourceId).toBeNull();
      expect(state.statusMessage).toBe('Selection cleared');
    });
  });

  describe('keyboard connections', () => {
    beforeEach(() => {
      spawn(state, 'n', 'Start here');
      spawn(state, 'n', 'End');
    });

    test('c, Tab to the target, Enter', () => {
      press(state, 'tab');
      type(state, 'c');
      expect(state.statusMessage).toBe('Connector source: Start. Tab to target, Enter to finish.');

      press(state, 'tab', 'enter');
      expect(state.connections).toEqual([
        { fromId: 1, fromOffset: { x: 10, y: 4 }, toId: 2, toOffset: { x: 10, y: 0 }, hasArrow: false },
      ]);
      expect(state.connectionSourceId).toBeNull();
      expect(state.statusMessage).toBe('Keyboard connection created!');
    });

    test('a arms an arrowed connector', () => {
      press(state, 'tab');
      type(state, 'a');
      expect(state.statusMessage).toBe('Arrow source: Start. Tab to target, Enter to finish.');
      press(state, 'tab', 'enter');
      expect(state.connections[0].hasArrow).toBe(true);
    });

    test('Enter on the source itself does nothing', () => {
      press(state, 'tab');
      type(state, 'c');
      press(state, 'enter');
      expect(state.connections).toHaveLength(0);
      expect(state.connectionSourceId).toBe(1);
    });

    test('a on a selected connection toggles its arrow', () => {
      press(state, 'tab');
      type(state, 'c');
      press(state, 'tab', 'enter', 'escape');
      state.selectedConnectionIndex = 0;

      type(state, 'a');
      expect(state.connections[0].hasArrow).toBe(true);
      expect(state.statusMessage).toBe('Arrow enabled');
      type(state, 'a');
      expect(state.statusMessage).toBe('Arrow disabled');
    });

    test('a with nothing selected explains itself', () => {
      type(state, 'a');
      expect(state.statusMessage).toBe('Select a node (a) for Arrow or connection (a) to toggle');
    });
  });

  describe('deleting', () => {
    beforeEach(() => {
      spawn(state, 'n');
      spawn(state, 'n');
      press(state, 'tab');
      type(state, 'c');
      press(state, 'tab', 'enter');
    });

    test('Backspace deletes the selected node and its connections', () => {
      press(state, 'backspace');
      expect(state.nodes.map(n => n.id)).toEqual([1]);
      expect(state.connections).toHaveLength(0);
      expect(state.statusMessage).toBe('Shape and connections deleted');
    });

    test('a selected connection is deleted before the node', () => {
      state.selectedConnectionIndex = 0;
      press(state, 'delete');
      expect(state.connections).toHaveLength(0);
      expect(state.nodes).toHaveLength(2);
      expect(state.selectedConnectionIndex).toBeNull();
      expect(state.statusMessage).toBe('Connection deleted');
    });
  });

  describe('resize mode', () => {
    beforeEach(() => {
      spawn(state, 'n');
      press(state, 'tab');
      type(state, 'r');
    });

    test('enters with instructions', () => {
      expect(state.mode).toEqual({ kind: 'resize', nodeId: 1 });
      expect(state.statusMessage).toBe('Resize Mode: Use +/- to scale, Esc to finish');
    });

    test('+ grows by 2x1', () => {
      type(state, '+');
      expect(state.statusMessage).toBe('Resized: 22x6');
    });

    test('- never shrinks below 3x1', () => {
      type(state, '-'.repeat(20));
      expect([state.nodes[0].width, state.nodes[0].height]).toEqual([3, 1]);
    });

    test('Enter finishes', () => {
      press(state, 'enter');
      expect(state.mode).toEqual({ kind: 'normal' });
      expect(state.statusMessage).toBe('Resize finished');
    });
  });

  describe('help', () => {
    test('opens from the palette and only closes on Esc, Enter or Space', () => {
      type(state, ' h');
      expect(state.mode).toEqual({ kind: 'help' });
      type(state, 'nq');
      press(state, 'tab');
      expect(state.mode).toEqual({ kind: 'help' });
      expect(state.nodes).toHaveLength(0);
      type(state, ' ');
      expect(state.mode).toEqual({ kind: 'normal' });
    });
  });

  describe('effects', () => {
    test('q in Normal quits', () => {
      expect(type(state, 'q')).toEqual([{ type: 'quit' }]);
    });

    test('Leader q quits', () => {
      expect(type(state, ' q')).toEqual([{ type: 'quit' }]);
    });

    test('Leader w writes the diagram and its text export', () => {
      spawn(state, 'n', 'Hi');
      const effects = type(state, ' w');
      expect(state.mode).toEqual({ kind: 'normal' });
      expect(effects).toHaveLength(1);

      const [effect] = effects;
      if (effect.type !== 'write') throw new Error('expected a write effect');
      expect(effect.title).toBe('Flow');
      expect(effect.diagram).toEqual(toDiagram(state));

      const rows = effect.text.split('\n');
      expect(rows).toHaveLength(21);
      expect(rows[0]).toHaveLength(79);
      expect(rows[10]).toBe(' '.repeat(10) + '+' + '-'.repeat(18) + '+' + ' '.repeat(49));
      expect(rows[12]).toBe(' '.repeat(10) + '|' + ' '.repeat(8) + 'Hi' + ' '.repeat(8) + '|' + ' '.repeat(49));
    });

    test('Leader c copies the same text', () => {
      spawn(state, 'n');
      const effects = type(state, ' c');
      expect(effects).toHaveLength(1);
      expect(effects[0].type).toBe('copy');
      expect(state.mode).toEqual({ kind: 'normal' });
    });

    test('the write effect carries a snapshot, not live state', () => {
      spawn(state, 'n');
      const [effect] = type(state, ' w');
      state.nodes[0].text = 'changed';
      if (effect.type !== 'write') throw new Error('expected a write effect');
      expect(effect.diagram.nodes[0].text).toBe('');
    });
  });
});

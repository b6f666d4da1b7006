/**
 * Orchestration types: editor modes, input events and the effects handed back to the shell
 */

import type { Diagram, NodeId } from '../../domain/types';

/**
 * Editor mode. Modes that act on a node carry its id; the context menu carries its
 * anchor (canvas screen cell) and the highlighted entry.
 */
export type Mode =
  | { kind: 'normal' }
  | { kind: 'insert'; nodeId: NodeId }
  | { kind: 'leader' }
  | { kind: 'resize'; nodeId: NodeId }
  | { kind: 'help' }
  | { kind: 'context-menu'; x: number; y: number; selectedIndex: number };

export type ModeKind = Mode['kind'];

export type SpecialKey =
  | 'escape'
  | 'tab'
  | 'backtab'
  | 'enter'
  | 'backspace'
  | 'delete'
  | 'up'
  | 'down'
  | 'left'
  | 'right';

export type PointerAction = 'down' | 'drag' | 'up';
export type PointerButton = 'left' | 'right';

/**
 * Input event from the shell. Pointer coordinates are canvas screen cells (0,0 is the
 * top-left cell inside the border), before the camera offset is applied.
 */
export type EditorEvent =
  | { type: 'char'; char: string }
  | { type: 'key'; key: SpecialKey }
  | { type: 'pointer'; action: PointerAction; button: PointerButton; x: number; y: number };

export type KeyInput = Extract<EditorEvent, { type: 'char' | 'key' }>;
export type PointerInput = Extract<EditorEvent, { type: 'pointer' }>;

/**
 * Side effects the core asks the shell to perform. The core itself never touches the
 * file system, the clipboard or the process.
 */
export type EditorEffect =
  | { type: 'write'; title: string; diagram: Diagram; text: string }
  | { type: 'copy'; text: string }
  | { type: 'quit' };

export interface Viewport {
  width: number;
  height: number;
}

export interface ApplyContext {
  /** Size of the live canvas in cells */
  viewport: Viewport;
  /** Column count of the plain-text export */
  exportWidth: number;
}

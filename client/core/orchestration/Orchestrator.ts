/**
 * Orchestrator facade - the interaction state machine
 *
 * This is the central coordinator that:
 * - Routes each input event to the handler for the current mode
 * - Lets handlers mutate the editor state in place, synchronously, to completion
 * - Hands side effects (write, copy, quit) back to the caller instead of performing them
 *
 * The caller owns the state and runs the returned effects.
 */

import type { EditorState } from './state/EditorState';
import type { ApplyContext, EditorEffect, EditorEvent } from './types';
import {
  handleContextMenuKey,
  handleHelpKey,
  handleInsertKey,
  handleLeaderKey,
  handleNormalKey,
  handlePointer,
  handleResizeKey,
} from './handlers';
import { debugLog } from '../../utils/debugLog';

function describeEvent(event: EditorEvent): string {
  switch (event.type) {
    case 'char':
      return `char ${JSON.stringify(event.char)}`;
    case 'key':
      return `key ${event.key}`;
    case 'pointer':
      return `pointer ${event.button}-${event.action} (${event.x}, ${event.y})`;
  }
}

/**
 * Main orchestrator entry point.
 * Applies one input event to the state and returns the effects it produced.
 */
export function apply(state: EditorState, event: EditorEvent, context: ApplyContext): EditorEffect[] {
  debugLog('Orchestrator', `${state.mode.kind} <- ${describeEvent(event)}`);

  if (event.type === 'pointer') {
    handlePointer(state, event, context);
    return [];
  }

  const mode = state.mode;
  switch (mode.kind) {
    case 'normal':
      return handleNormalKey(state, event);
    case 'insert':
      return handleInsertKey(state, mode.nodeId, event);
    case 'leader':
      return handleLeaderKey(state, event, context);
    case 'resize':
      return handleResizeKey(state, mode.nodeId, event);
    case 'help':
      return handleHelpKey(state, event);
    case 'context-menu':
      return handleContextMenuKey(state, mode, event);
    default: {
      const unknown: never = mode;
      throw new Error(`[Orchestrator] Unknown mode: ${JSON.stringify(unknown)}`);
    }
  }
}

/** Applies events in order and collects every effect. */
export function applyAll(state: EditorState, events: readonly EditorEvent[], context: ApplyContext): EditorEffect[] {
  return events.flatMap(event => apply(state, event, context));
}

import type { EditorState } from '../../state/EditorState';
import type { EditorEffect, KeyInput } from '../../types';

/** Modal and read-only: only Esc, Space and Enter close it. */
export function handleHelpKey(state: EditorState, input: KeyInput): EditorEffect[] {
  const closes =
    (input.type === 'key' && (input.key === 'escape' || input.key === 'enter')) ||
    (input.type === 'char' && input.char === ' ');
  if (closes) state.mode = { kind: 'normal' };
  return [];
}

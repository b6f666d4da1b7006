/**
 * Runs the side effects the state machine hands back
 *
 * Best effort: a failed write or copy is logged and turned into a status message, never
 * rethrown into the event loop.
 */

import type { EditorEffect } from '../core/orchestration/types';
import { saveDiagram } from './diagramStore';
import { copyToClipboard } from '../utils/copyToClipboard';

export interface EffectRunnerDeps {
  /** Directory diagrams are written to */
  directory: string;
  exit: () => void;
  copy?: (text: string) => Promise<boolean>;
  save?: typeof saveDiagram;
}

/** Returns the status line describing the outcome, or null when there is nothing to say. */
export async function runEffect(effect: EditorEffect, deps: EffectRunnerDeps): Promise<string | null> {
  switch (effect.type) {
    case 'write': {
      const save = deps.save ?? saveDiagram;
      try {
        const { textFile, jsonFile } = await save(effect.diagram, effect.text, deps.directory);
        return `Saved ${textFile} and ${jsonFile}!`;
      } catch (error) {
        console.error('[effectRunner] Save failed:', error);
        const reason = error instanceof Error ? error.message : String(error);
        return `Save failed: ${reason}`;
      }
    }
    case 'copy': {
      if (effect.text.trim().length === 0) return 'Nothing to copy';
      const copy = deps.copy ?? ((text: string) => copyToClipboard(text));
      try {
        const copied = await copy(effect.text);
        return copied ? 'Copied to clipboard!' : 'Clipboard unavailable';
      } catch (error) {
        console.error('[effectRunner] Copy failed:', error);
        return 'Clipboard unavailable';
      }
    }
    case 'quit':
      deps.exit();
      return null;
  }
}

/**
 * Renderer - state → text for the views the orchestrator needs
 *
 * The live canvas is rendered by the shell on every frame; the orchestrator only renders
 * to produce the text carried by `write` and `copy` effects.
 */

import type { AsciiCanvas } from '../../renderer/AsciiCanvas';
import { renderDiagram } from '../../renderer/renderDiagram';
import type { EditorState } from '../state/EditorState';
import type { ApplyContext, Viewport } from '../types';

export function renderView(state: Readonly<EditorState>, viewport: Viewport): AsciiCanvas {
  return renderDiagram(state, viewport.width, viewport.height);
}

/** Current view (camera, selection) at the export width and the live canvas height */
export function renderExportText(state: Readonly<EditorState>, context: ApplyContext): string {
  return renderDiagram(state, context.exportWidth, context.viewport.height).toString();
}

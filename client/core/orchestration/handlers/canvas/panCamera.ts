import type { Point } from '../../../viewstate/CoordinateService';
import type { EditorState } from '../../state/EditorState';

/** The camera is signed: panning past the origin is allowed. */
export function panCamera(state: EditorState, delta: Point): void {
  state.cameraOffset = {
    x: state.cameraOffset.x + delta.x,
    y: state.cameraOffset.y + delta.y,
  };
  state.statusMessage = `Canvas Pan: ${state.cameraOffset.x}, ${state.cameraOffset.y}`;
}

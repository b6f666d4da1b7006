/**
 * Mode Handlers
 *
 * Keyboard routing for each editor mode. Pointer input is routed separately
 * (../pointer) because it crosses modes.
 */

export { handleNormalKey, ARROW_DELTAS } from './normal';
export { handleInsertKey } from './insert';
export { handleLeaderKey } from './leader';
export { handleResizeKey } from './resize';
export { handleHelpKey } from './help';
export { handleContextMenuKey, activateContextMenuEntry } from './contextMenu';

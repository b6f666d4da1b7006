/**
 * Canvas Handlers
 *
 * - panCamera: move the viewport over the world
 * - selection: clear, cycle and pick selections
 */

export { panCamera } from './panCamera';
export { clearSelection, selectNode, cycleSelection, selectNodeAfter, selectConnectionAt } from './selection';

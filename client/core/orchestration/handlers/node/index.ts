/**
 * Node Handlers
 *
 * - addNode: create a shape, select it, start editing its text
 * - deleteNode: remove a shape and every connection touching it
 * - moveNode: keyboard nudge and pointer drag
 * - resizeNode: Resize-mode steps and corner drag
 * - editText: Insert-mode typing
 */

export { addNode } from './addNode';
export { deleteNode } from './deleteNode';
export { nudgeNode, dragNodeTo } from './moveNode';
export { stepResize, dragResizeTo } from './resizeNode';
export type { ResizeStep } from './resizeNode';
export { appendText, deleteLastChar } from './editText';

/**
 * Edge Handlers
 *
 * - connectNodes: arm / commit keyboard connectors, commit pointer drags
 * - deleteEdge: remove a connection by index
 * - toggleArrow: flip the arrowhead of a connection
 */

export { startConnector, commitKeyboardConnection, commitPointerConnection } from './connectNodes';
export { deleteEdge } from './deleteEdge';
export { toggleArrow } from './toggleArrow';

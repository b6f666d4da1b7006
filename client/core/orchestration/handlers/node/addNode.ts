/**
 * Add Node Handler
 *
 * Flow: Domain.mutate → selection → Insert mode
 *
 * Used by Leader n/d/t/f (below the last node) and the context menu (at the click).
 */

import type { Point } from '../../../viewstate/CoordinateService';
import type { DiagramNode, ShapeType } from '../../../../domain/types';
import type { EditorState } from '../../state/EditorState';
import { addNode as domainAddNode, selectOnly } from '../../../../domain/mutations';
import { debugLog } from '../../../../utils/debugLog';

export function addNode(state: EditorState, shape: ShapeType, position: Point): DiagramNode {
  const node = domainAddNode(state, shape, position);
  debugLog('addNode', `${shape} ${node.id} at (${node.x}, ${node.y})`);

  // The new node is the only selection and immediately takes text
  selectOnly(state.nodes, node.id);
  state.selectedConnectionIndex = null;
  state.mode = { kind: 'insert', nodeId: node.id };
  return node;
}

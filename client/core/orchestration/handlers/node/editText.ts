/**
 * Edit Text Handler
 *
 * Every edit re-fits borderless Text nodes to their content.
 */

import type { DiagramNode } from '../../../../domain/types';
import { autoFitText } from '../../../../domain/mutations';
import { dropLastChar } from '../../../../utils/textMeasurement';

export function appendText(node: DiagramNode, text: string): void {
  node.text += text;
  autoFitText(node);
}

export function deleteLastChar(node: DiagramNode): void {
  node.text = dropLastChar(node.text);
  autoFitText(node);
}

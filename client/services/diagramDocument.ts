/**
 * Persisted diagram document
 *
 * The on-disk shape is snake_case with `[x, y]` offset pairs:
 *
 *   { title, nodes: [{ id, shape, x, y, width, height, text, selected }],
 *     connections: [{ from_id, from_offset, to_id, to_offset, has_arrow }] }
 *
 * Documents are validated with zod before they become a Diagram.
 */

import { z } from 'zod';
import type { Connection, Diagram, DiagramNode } from '../domain/types';
import { clampNodeSize } from '../domain/mutations';
import { debugLog } from '../utils/debugLog';

const Cell = z.number().int().nonnegative();

const OffsetSchema = z.tuple([Cell, Cell]);

export const NodeDocumentSchema = z.object({
  id: Cell,
  shape: z.enum(['Box', 'Diamond', 'Text', 'Frame']),
  x: Cell,
  y: Cell,
  width: Cell,
  height: Cell,
  text: z.string(),
  selected: z.boolean().default(false),
});

export const ConnectionDocumentSchema = z.object({
  from_id: Cell,
  from_offset: OffsetSchema,
  to_id: Cell,
  to_offset: OffsetSchema,
  has_arrow: z.boolean(),
});

export const DiagramDocumentSchema = z
  .object({
    title: z.string(),
    nodes: z.array(NodeDocumentSchema),
    connections: z.array(ConnectionDocumentSchema),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<number>();
    doc.nodes.forEach((node, index) => {
      if (seen.has(node.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['nodes', index, 'id'],
          message: `Duplicate node id ${node.id}`,
        });
      }
      seen.add(node.id);
    });
  });

export type DiagramDocument = z.infer<typeof DiagramDocumentSchema>;

export class DiagramDocumentError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(message: string, issues: z.ZodIssue[] = []) {
    super(message);
    this.name = 'DiagramDocumentError';
    this.issues = issues;
  }
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function fromDocument(doc: DiagramDocument): Diagram {
  const nodes: DiagramNode[] = doc.nodes.map(n => ({
    id: n.id,
    shape: n.shape,
    x: n.x,
    y: n.y,
    ...clampNodeSize(n.width, n.height),
    text: n.text,
    selected: n.selected,
  }));

  const ids = new Set(nodes.map(n => n.id));
  const connections: Connection[] = [];
  for (const c of doc.connections) {
    if (!ids.has(c.from_id) || !ids.has(c.to_id)) {
      debugLog('diagramDocument', `dropping connection ${c.from_id} -> ${c.to_id}: endpoint missing`);
      continue;
    }
    connections.push({
      fromId: c.from_id,
      fromOffset: { x: c.from_offset[0], y: c.from_offset[1] },
      toId: c.to_id,
      toOffset: { x: c.to_offset[0], y: c.to_offset[1] },
      hasArrow: c.has_arrow,
    });
  }

  return { title: doc.title, nodes, connections };
}

export function toDocument(diagram: Diagram): DiagramDocument {
  return {
    title: diagram.title,
    nodes: diagram.nodes.map(n => ({
      id: n.id,
      shape: n.shape,
      x: n.x,
      y: n.y,
      width: n.width,
      height: n.height,
      text: n.text,
      selected: n.selected,
    })),
    connections: diagram.connections.map(c => ({
      from_id: c.fromId,
      from_offset: [c.fromOffset.x, c.fromOffset.y],
      to_id: c.toId,
      to_offset: [c.toOffset.x, c.toOffset.y],
      has_arrow: c.hasArrow,
    })),
  };
}

/** @throws DiagramDocumentError on invalid JSON or a document of the wrong shape */
export function parseDiagramDocument(json: string): Diagram {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DiagramDocumentError(`[diagramDocument] Invalid JSON: ${reason}`);
  }

  const result = DiagramDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new DiagramDocumentError(
      `[diagramDocument] Invalid diagram: ${formatIssues(result.error.issues)}`,
      result.error.issues
    );
  }
  return fromDocument(result.data);
}

export function serializeDiagram(diagram: Diagram): string {
  return JSON.stringify(toDocument(diagram), null, 2);
}

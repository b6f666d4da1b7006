/**
 * Tests for the persisted document shape and its validation
 */

import { describe, test, expect } from '@jest/globals';
import type { Diagram } from '../../domain/types';
import { DiagramDocumentError, parseDiagramDocument, serializeDiagram, toDocument } from '../diagramDocument';

const diagram: Diagram = {
  title: 'Flow',
  nodes: [
    { id: 1, shape: 'Box', x: 10, y: 10, width: 20, height: 5, text: 'Start', selected: false },
    { id: 2, shape: 'Diamond', x: 10, y: 17, width: 15, height: 7, text: 'Ok?', selected: true },
  ],
  connections: [{ fromId: 1, fromOffset: { x: 10, y: 4 }, toId: 2, toOffset: { x: 7, y: 0 }, hasArrow: true }],
};

function documentWith(patch: Record<string, unknown>): string {
  return JSON.stringify({ ...toDocument(diagram), ...patch });
}

describe('diagramDocument', () => {
  test('connections are stored snake_case with offset pairs', () => {
    expect(JSON.parse(serializeDiagram(diagram)).connections).toEqual([
      { from_id: 1, from_offset: [10, 4], to_id: 2, to_offset: [7, 0], has_arrow: true },
    ]);
  });

  test('serialized documents are indented', () => {
    expect(serializeDiagram({ title: 'x', nodes: [], connections: [] })).toBe(
      '{\n  "title": "x",\n  "nodes": [],\n  "connections": []\n}'
    );
  });

  test('parse restores the diagram', () => {
    expect(parseDiagramDocument(serializeDiagram(diagram))).toEqual(diagram);
  });

  test('selected defaults to false', () => {
    const json = documentWith({
      nodes: [{ id: 1, shape: 'Text', x: 0, y: 0, width: 4, height: 1, text: 'note' }],
      connections: [],
    });
    expect(parseDiagramDocument(json).nodes[0].selected).toBe(false);
  });

  test('undersized nodes are clamped on load', () => {
    const json = documentWith({
      nodes: [{ id: 1, shape: 'Box', x: 0, y: 0, width: 0, height: 0, text: '', selected: false }],
      connections: [],
    });
    expect(parseDiagramDocument(json).nodes[0]).toMatchObject({ width: 3, height: 1 });
  });

  test('connections to missing nodes are dropped', () => {
    const json = documentWith({
      connections: [
        { from_id: 1, from_offset: [10, 4], to_id: 2, to_offset: [7, 0], has_arrow: false },
        { from_id: 1, from_offset: [10, 4], to_id: 9, to_offset: [0, 0], has_arrow: false },
      ],
    });
    expect(parseDiagramDocument(json).connections).toHaveLength(1);
  });

  describe('rejects', () => {
    test('malformed JSON', () => {
      expect(() => parseDiagramDocument('{ nope')).toThrow(DiagramDocumentError);
      expect(() => parseDiagramDocument('{ nope')).toThrow(/^\[diagramDocument\] Invalid JSON: /);
    });

    test('an unknown shape, naming the field', () => {
      const json = documentWith({
        nodes: [{ id: 1, shape: 'Circle', x: 0, y: 0, width: 4, height: 4, text: '', selected: false }],
        connections: [],
      });
      expect(() => parseDiagramDocument(json)).toThrow(/nodes\.0\.shape/);
    });

    test('negative coordinates', () => {
      const json = documentWith({
        nodes: [{ id: 1, shape: 'Box', x: -1, y: 0, width: 4, height: 4, text: '', selected: false }],
        connections: [],
      });
      expect(() => parseDiagramDocument(json)).toThrow(DiagramDocumentError);
    });

    test('duplicate node ids', () => {
      const json = documentWith({
        nodes: [
          { id: 1, shape: 'Box', x: 0, y: 0, width: 4, height: 4, text: '', selected: false },
          { id: 1, shape: 'Box', x: 9, y: 0, width: 4, height: 4, text: '', selected: false },
        ],
        connections: [],
      });
      expect(() => parseDiagramDocument(json)).toThrow('nodes.1.id: Duplicate node id 1');
    });

    test('a missing connection list', () => {
      try {
        parseDiagramDocument(JSON.stringify({ title: 'x', nodes: [] }));
        throw new Error('expected parse to fail');
      } catch (error) {
        expect(error).toBeInstanceOf(DiagramDocumentError);
        if (!(error instanceof DiagramDocumentError)) return;
        expect(error.issues.map(issue => issue.path.join('.'))).toEqual(['connections']);
      }
    });
  });
});

/**
 * Diagram files on disk
 *
 * A diagram titled T lives in `<dir>/T.json` (the model) next to `<dir>/T.txt` (its
 * plain-text render). Loading never throws for a missing or broken document: the editor
 * starts an empty diagram under the requested title and reports why.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import type { Diagram } from '../domain/types';
import { DiagramDocumentError, parseDiagramDocument, serializeDiagram } from './diagramDocument';
import { debugLog } from '../utils/debugLog';

export type LoadStatus = 'loaded' | 'missing' | 'invalid';

export interface LoadResult {
  diagram: Diagram;
  status: LoadStatus;
  /** Human-readable reason when the diagram had to start empty */
  warning: string | null;
}

export interface SaveResult {
  textFile: string;
  jsonFile: string;
}

export function diagramFileNames(title: string): SaveResult {
  return { textFile: `${title}.txt`, jsonFile: `${title}.json` };
}

export function emptyDiagram(title: string): Diagram {
  return { title, nodes: [], connections: [] };
}

export async function loadDiagram(title: string, directory: string): Promise<LoadResult> {
  const { jsonFile } = diagramFileNames(title);
  const filePath = path.join(directory, jsonFile);

  if (!(await fs.pathExists(filePath))) {
    debugLog('diagramStore', `${filePath} does not exist`);
    return {
      diagram: emptyDiagram(title),
      status: 'missing',
      warning: `File ${jsonFile} not found. Starting new instead.`,
    };
  }

  let json: string;
  try {
    json = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    console.error(`[diagramStore] Could not read ${filePath}:`, error);
    return {
      diagram: emptyDiagram(title),
      status: 'invalid',
      warning: `Failed to read ${jsonFile}. Starting new instead.`,
    };
  }

  try {
    const diagram = parseDiagramDocument(json);
    debugLog('diagramStore', `loaded ${filePath}`, {
      nodes: diagram.nodes.length,
      connections: diagram.connections.length,
    });
    return { diagram, status: 'loaded', warning: null };
  } catch (error) {
    if (!(error instanceof DiagramDocumentError)) throw error;
    console.error(`[diagramStore] ${filePath}: ${error.message}`);
    return {
      diagram: emptyDiagram(title),
      status: 'invalid',
      warning: `Failed to parse ${jsonFile}. Starting new instead.`,
    };
  }
}

/** Writes the text render and the model side by side. */
export async function saveDiagram(diagram: Diagram, text: string, directory: string): Promise<SaveResult> {
  const names = diagramFileNames(diagram.title);
  await fs.ensureDir(directory);
  await fs.writeFile(path.join(directory, names.textFile), text, 'utf8');
  await fs.writeFile(path.join(directory, names.jsonFile), serializeDiagram(diagram), 'utf8');
  debugLog('diagramStore', `saved ${names.textFile} and ${names.jsonFile} in ${directory}`);
  return names;
}

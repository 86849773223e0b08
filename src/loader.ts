import fs from 'fs-extra';
import { FamilyGraph } from './types.js';
import { GedcomError, describeError } from './errors.js';
import { classifyRecord, parseGedcom } from './parser.js';
import { buildGraph } from './graph.js';

/**
 * Result of loading a GEDCOM file
 */
export interface LoadResult {
  /** The resolved graph */
  graph: FamilyGraph;
  /** Number of top-level records in the file */
  recordCount: number;
  /** Top-level records that are neither individuals nor families, by tag */
  otherRecords: Record<string, number>;
}

/**
 * Parse GEDCOM text and resolve it into a graph. Throws on the first lexing,
 * structural or reference error.
 */
export function loadGedcomText(content: string): LoadResult {
  const roots = parseGedcom(content);
  const graph = buildGraph(roots);

  const otherRecords: Record<string, number> = {};
  for (const root of roots) {
    if (classifyRecord(root) === 'other') {
      otherRecords[root.tag] = (otherRecords[root.tag] ?? 0) + 1;
    }
  }

  return { graph, recordCount: roots.length, otherRecords };
}

/**
 * Read and load a GEDCOM file (UTF-8).
 */
export async function loadGedcomFile(filePath: string): Promise<LoadResult> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    throw new GedcomError(`Cannot read GEDCOM file ${filePath}: ${describeError(err)}`);
  }
  return loadGedcomText(content);
}

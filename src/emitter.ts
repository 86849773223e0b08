import fs from 'fs-extra';
import * as path from 'node:path';
import { FamilyGraph, Individual, ProfileDocument } from './types.js';
import { AmbiguousBiographyMatchError, BiographyReadError, describeError, WriteError } from './errors.js';
import { BiographyStore } from './biography.js';
import {
  FAMILIES_DIR,
  PEOPLE_DIR,
  RenderOptions,
  familyPath,
  profilePath,
  renderBiographyIndex,
  renderFamily,
  renderPeopleIndex,
  renderProfile
} from './renderer.js';

/**
 * Options for emitting the site content
 */
export interface EmitOptions extends RenderOptions {
  /** Directory the documents are written into */
  outputDir: string;
  /** Also write one page per family (default: false) */
  emitFamilies?: boolean;
  /** Write People/index.md and People/bios.md (default: true) */
  indexPages?: boolean;
  /** Remove previously generated People/ and Families/ before writing (default: false) */
  cleanOutput?: boolean;
  /** Called after each document is written */
  onWrite?: (filePath: string) => void;
}

/**
 * All documents for a graph, before anything touches the disk
 */
export interface RenderedSite {
  documents: ProfileDocument[];
  /** Ids of individuals whose profile carries a biography */
  withBiography: Set<string>;
  /** Recoverable per-individual problems */
  warnings: string[];
}

export interface EmitResult {
  /** Written paths, relative to the output directory */
  written: string[];
  warnings: string[];
  biographies: number;
}

/**
 * Fail if two records would be written to the same file on a case-insensitive
 * file system.
 */
export function assertUniquePaths(graph: FamilyGraph): void {
  const seen = new Map<string, string>();
  const ids = [
    ...Array.from(graph.individuals.keys(), id => [id, profilePath(id)] as const),
    ...Array.from(graph.families.keys(), id => [id, familyPath(id)] as const)
  ];
  for (const [id, filePath] of ids) {
    const key = filePath.toLowerCase();
    const owner = seen.get(key);
    if (owner !== undefined) {
      throw new WriteError(filePath, `records @${owner}@ and @${id}@ map to the same file`);
    }
    seen.set(key, id);
  }
}

async function renderIndividual(
  graph: FamilyGraph,
  individual: Individual,
  biographies: BiographyStore,
  options: RenderOptions
): Promise<{ id: string; document: ProfileDocument; hasBiography: boolean; warning?: string }> {
  try {
    const biography = await biographies.lookup(individual, graph);
    return {
      id: individual.id,
      document: renderProfile(graph, individual, biography, options),
      hasBiography: biography !== undefined
    };
  } catch (err) {
    if (err instanceof AmbiguousBiographyMatchError || err instanceof BiographyReadError) {
      return {
        id: individual.id,
        document: renderProfile(graph, individual, undefined, options),
        hasBiography: false,
        warning: `${err.name}: ${err.message}`
      };
    }
    throw err;
  }
}

/**
 * Render every document. Biography lookups run concurrently; each profile
 * depends only on the read-only graph and its own biography.
 */
export async function renderSite(
  graph: FamilyGraph,
  biographies: BiographyStore,
  options: Omit<EmitOptions, 'outputDir'> = {}
): Promise<RenderedSite> {
  const rendered = await Promise.all(
    Array.from(graph.individuals.values(), individual =>
      renderIndividual(graph, individual, biographies, options))
  );

  const documents = rendered.map(result => result.document);
  const withBiography = new Set<string>();
  const warnings: string[] = [];
  for (const result of rendered) {
    if (result.hasBiography) withBiography.add(result.id);
    if (result.warning) warnings.push(result.warning);
  }

  if (options.emitFamilies) {
    for (const family of graph.families.values()) {
      documents.push(renderFamily(graph, family, options));
    }
  }

  if (options.indexPages ?? true) {
    documents.push(renderPeopleIndex(graph));
    documents.push(renderBiographyIndex(graph, withBiography));
  }

  return { documents, withBiography, warnings };
}

async function writeDocument(outputDir: string, document: ProfileDocument): Promise<string> {
  const filePath = path.join(outputDir, ...document.path.split('/'));
  try {
    await fs.outputFile(filePath, document.content, 'utf8');
  } catch (err) {
    throw new WriteError(filePath, describeError(err));
  }
  return filePath;
}

/**
 * Render and write the whole site. Writing is idempotent: the same graph and
 * biography directory always produce byte-identical files.
 */
export async function emitSite(
  graph: FamilyGraph,
  biographies: BiographyStore,
  options: EmitOptions
): Promise<EmitResult> {
  assertUniquePaths(graph);
  const site = await renderSite(graph, biographies, options);

  if (options.cleanOutput) {
    for (const dir of [PEOPLE_DIR, FAMILIES_DIR]) {
      const target = path.join(options.outputDir, dir);
      try {
        await fs.remove(target);
      } catch (err) {
        throw new WriteError(target, describeError(err));
      }
    }
  }

  await Promise.all(site.documents.map(async document => {
    const filePath = await writeDocument(options.outputDir, document);
    options.onWrite?.(filePath);
  }));

  return {
    written: site.documents.map(document => document.path).sort(),
    warnings: site.warnings,
    biographies: site.withBiography.size
  };
}

import { FamilyGraph } from './types.js';
import { SiteConfig } from './config.js';
import { loadGedcomFile } from './loader.js';
import { BiographyStore } from './biography.js';
import { emitSite, EmitResult } from './emitter.js';

export interface PipelineResult extends EmitResult {
  graph: FamilyGraph;
}

export type LogFn = (message: string) => void;

/**
 * Convert one GEDCOM file into site documents.
 *
 * Everything that can fail fatally (reading, lexing, nesting, pointer
 * resolution) happens before the first document is written.
 */
export async function runPipeline(config: SiteConfig, log: LogFn = () => {}): Promise<PipelineResult> {
  log(`Loading GEDCOM file: ${config.gedcomFile}`);
  const { graph } = await loadGedcomFile(config.gedcomFile);
  log(`${graph.individuals.size} individuals, ${graph.families.size} families`);

  const biographies = await BiographyStore.open(config.biographyDir);
  log(biographies.directory
    ? `Biography directory: ${biographies.directory} (${biographies.size} files)`
    : `No biography directory at ${config.biographyDir}`);

  const result = await emitSite(graph, biographies, {
    outputDir: config.outputDir,
    emitFamilies: config.emitFamilies,
    familyDiagrams: config.familyDiagrams,
    indexPages: config.indexPages,
    cleanOutput: config.cleanOutput,
    placeLinks: config.placeLinks,
    placeLinkBase: config.placeLinkBase,
    onWrite: config.verbose ? filePath => log(`Wrote ${filePath}`) : undefined
  });
  log(`Wrote ${result.written.length} documents (${result.biographies} with biography) to ${config.outputDir}`);

  return { ...result, graph };
}

export { loadGedcomFile, loadGedcomText } from './loader.js';
export { BiographyStore } from './biography.js';
export { emitSite, renderSite } from './emitter.js';
export { countPlaces } from './places.js';
export * from './errors.js';
export type * from './types.js';

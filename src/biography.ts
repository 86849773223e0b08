import fs from 'fs-extra';
import * as path from 'node:path';
import { BiographyRecord, FamilyGraph, Individual } from './types.js';
import { AmbiguousBiographyMatchError, BiographyReadError, ConfigError, describeError } from './errors.js';
import { displayName, slugify } from './names.js';

/**
 * Biography file extensions, in order of precedence
 */
export const BIOGRAPHY_EXTENSIONS = ['.md', '.MD', '.markdown', '.txt'] as const;

// slug -> ids of every individual whose display name produces it
const slugOwnersCache = new WeakMap<FamilyGraph, Map<string, string[]>>();

function slugOwners(graph: FamilyGraph): Map<string, string[]> {
  let owners = slugOwnersCache.get(graph);
  if (!owners) {
    owners = new Map();
    for (const individual of graph.individuals.values()) {
      const slug = slugify(displayName(individual));
      owners.set(slug, [...(owners.get(slug) ?? []), individual.id]);
    }
    slugOwnersCache.set(graph, owners);
  }
  return owners;
}

/**
 * Read-only view of a directory of per-person biography files.
 *
 * A file named after the individual's id (I12.md) always wins; otherwise a
 * file named after the slug of the display name (john-smith.md) is used,
 * unless several individuals share that slug.
 */
export class BiographyStore {
  private constructor(
    readonly directory: string | undefined,
    private readonly fileNames: ReadonlySet<string>
  ) {}

  static empty(): BiographyStore {
    return new BiographyStore(undefined, new Set());
  }

  /**
   * Index a biography directory. A missing directory gives an empty store.
   */
  static async open(directory?: string): Promise<BiographyStore> {
    if (!directory || !(await fs.pathExists(directory))) {
      return BiographyStore.empty();
    }
    const stat = await fs.stat(directory);
    if (!stat.isDirectory()) {
      throw new ConfigError(`Biography path is not a directory: ${directory}`);
    }
    const entries = await fs.readdir(directory, { withFileTypes: true });
    const fileNames = entries
      .filter(entry => entry.isFile())
      .map(entry => entry.name)
      .sort();
    return new BiographyStore(directory, new Set(fileNames));
  }

  get size(): number {
    return this.fileNames.size;
  }

  private findFile(stem: string): string | undefined {
    for (const extension of BIOGRAPHY_EXTENSIONS) {
      const fileName = `${stem}${extension}`;
      if (this.fileNames.has(fileName)) {
        return fileName;
      }
    }
    return undefined;
  }

  /**
   * Find and read the biography for one individual.
   * Resolves to undefined when there is none; rejects with
   * AmbiguousBiographyMatchError or BiographyReadError, both recoverable.
   */
  async lookup(individual: Individual, graph: FamilyGraph): Promise<BiographyRecord | undefined> {
    if (!this.directory) {
      return undefined;
    }

    const byId = this.findFile(individual.id);
    if (byId) {
      return this.read(individual, byId, 'id');
    }

    const slug = slugify(displayName(individual));
    const bySlug = slug ? this.findFile(slug) : undefined;
    if (!bySlug) {
      return undefined;
    }
    const owners = slugOwners(graph).get(slug) ?? [];
    if (owners.length > 1) {
      throw new AmbiguousBiographyMatchError(individual.id, owners.map(id => `${id} (${bySlug})`));
    }
    return this.read(individual, bySlug, 'slug');
  }

  private async read(
    individual: Individual,
    fileName: string,
    matchedBy: BiographyRecord['matchedBy']
  ): Promise<BiographyRecord | undefined> {
    const directory = this.directory ?? '.';
    const filePath = path.join(directory, fileName);

    let text: string;
    try {
      const bytes = await fs.readFile(filePath);
      text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (err) {
      throw new BiographyReadError(filePath, describeError(err));
    }

    text = text.replace(/\r/g, '').trim();
    if (!text) {
      return undefined;
    }
    return { individualId: individual.id, text, source: fileName, matchedBy };
  }
}

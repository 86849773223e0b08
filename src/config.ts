/**
 * Run configuration.
 *
 * Values come from (highest precedence first) command-line flags, an optional
 * JSON config file, and the defaults below. The config file is
 * gedcom-pages.config.json in the working directory unless --config or
 * GEDCOM_PAGES_CONFIG names another one.
 */

import fs from 'fs-extra';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';
import { CliArgs } from './args.js';

export const DEFAULT_CONFIG_FILE = 'gedcom-pages.config.json';
export const DEFAULT_OUTPUT_DIR = path.join('site', 'content', 'profiles');
export const WIKIPEDIA_BASE = 'https://en.wikipedia.org/wiki/';

export const ConfigFileSchema = z.object({
  outputDir: z.string().min(1).optional(),
  /** Defaults to <outputDir>/bios */
  biographyDir: z.string().min(1).optional(),
  emitFamilies: z.boolean().optional(),
  familyDiagrams: z.boolean().optional(),
  indexPages: z.boolean().optional(),
  cleanOutput: z.boolean().optional(),
  /** Exact place text -> URL */
  placeLinks: z.record(z.string(), z.string().url()).optional(),
  placeLinkBase: z.string().url().optional(),
  verbose: z.boolean().optional()
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface SiteConfig {
  gedcomFile: string;
  outputDir: string;
  biographyDir: string;
  emitFamilies: boolean;
  familyDiagrams: boolean;
  indexPages: boolean;
  cleanOutput: boolean;
  placeLinks: Record<string, string>;
  placeLinkBase?: string;
  verbose: boolean;
  analyzePlaces: boolean;
}

export interface LoadedConfigFile {
  config: ConfigFile;
  /** The file that was read, if any */
  source?: string;
}

/**
 * Read and validate a config file. A file named explicitly must exist; the
 * default one is optional.
 */
export async function loadConfigFile(explicitPath?: string): Promise<LoadedConfigFile> {
  const configPath = explicitPath ?? process.env.GEDCOM_PAGES_CONFIG;
  const filePath = configPath ?? DEFAULT_CONFIG_FILE;

  if (!(await fs.pathExists(filePath))) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
    return { config: {} };
  }

  let json: unknown;
  try {
    json = await fs.readJson(filePath);
  } catch (err) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON: ${describeError(err)}`);
  }

  const parsed = ConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Config file ${filePath} is invalid: ${problems}`);
  }
  return { config: parsed.data, source: filePath };
}

/**
 * Merge flags over file values over defaults.
 */
export function resolveConfig(args: CliArgs, file: ConfigFile = {}): SiteConfig {
  if (!args.gedcomFile) {
    throw new ConfigError('No GEDCOM file given');
  }
  const outputDir = args.outputDir ?? file.outputDir ?? DEFAULT_OUTPUT_DIR;

  const config: SiteConfig = {
    gedcomFile: args.gedcomFile,
    outputDir,
    biographyDir: args.biographyDir ?? file.biographyDir ?? path.join(outputDir, 'bios'),
    emitFamilies: args.emitFamilies ?? file.emitFamilies ?? false,
    familyDiagrams: args.familyDiagrams ?? file.familyDiagrams ?? true,
    indexPages: args.indexPages ?? file.indexPages ?? true,
    cleanOutput: args.cleanOutput ?? file.cleanOutput ?? false,
    placeLinks: file.placeLinks ?? {},
    verbose: args.verbose ?? file.verbose ?? false,
    analyzePlaces: args.analyzePlaces
  };
  const placeLinkBase = args.wikiPlaces ? WIKIPEDIA_BASE : file.placeLinkBase;
  if (placeLinkBase) config.placeLinkBase = placeLinkBase;
  return config;
}

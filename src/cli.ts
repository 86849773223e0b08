#!/usr/bin/env node
import { parseArgs, USAGE } from './args.js';
import { loadConfigFile, resolveConfig } from './config.js';
import { GedcomError } from './errors.js';
import { loadGedcomFile } from './loader.js';
import { countPlaces } from './places.js';
import { runPipeline } from './pipeline.js';

/**
 * Print every place with its number of mentions, most frequent first
 */
async function analyzePlaces(gedcomFile: string): Promise<void> {
  const { graph } = await loadGedcomFile(gedcomFile);
  const places = countPlaces(graph);

  console.log('\nPlace Analysis:');
  console.log('===============');
  for (const { place, count } of places) {
    console.log(`${String(count).padStart(3)}x ${place}`);
  }
  console.log(`\nTotal unique places: ${places.length}`);
}

/**
 * Convert the GEDCOM file named on the command line
 */
async function bootstrap(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help || !args.gedcomFile) {
    console.log(USAGE);
    if (!args.help) process.exitCode = 1;
    return;
  }

  const { config: fileConfig, source } = await loadConfigFile(args.configPath);
  console.log(source ? `Loaded config from ${source}` : 'No config file found, using defaults');
  const config = resolveConfig(args, fileConfig);

  if (config.analyzePlaces) {
    await analyzePlaces(config.gedcomFile);
    return;
  }

  const result = await runPipeline(config, message => console.log(message));

  if (result.warnings.length > 0) {
    console.warn(`${result.warnings.length} warning(s):`);
    for (const warning of result.warnings) {
      console.warn(`  ${warning}`);
    }
  }
  console.log(`Done → ${config.outputDir}`);
}

bootstrap().catch((err: unknown) => {
  if (err instanceof GedcomError) {
    console.error(`${err.name}: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
});

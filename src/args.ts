import { ConfigError } from './errors.js';

/**
 * Command-line flags. Unset optional fields fall through to the config file.
 */
export interface CliArgs {
  gedcomFile?: string;
  outputDir?: string;
  biographyDir?: string;
  configPath?: string;
  emitFamilies?: boolean;
  familyDiagrams?: boolean;
  indexPages?: boolean;
  cleanOutput?: boolean;
  verbose?: boolean;
  /** Link places without a configured URL to Wikipedia */
  wikiPlaces?: boolean;
  analyzePlaces: boolean;
  help: boolean;
}

export const USAGE = `Usage: gedcom-pages <file.ged> [options]

Options:
  -o, --output=DIR    Output directory (default: site/content/profiles)
  --bios-dir=DIR      Directory with biography files (default: <output>/bios)
  --config=FILE       JSON config file (default: gedcom-pages.config.json)
  --families          Also write one page per family
  --no-diagrams       Leave out the Mermaid family diagrams
  --no-index          Do not write People/index.md and People/bios.md
  --clean             Remove previously generated pages first
  --wiki-places       Link places without a configured URL to Wikipedia
  --analyze-places    List the places in the file instead of writing pages
  --verbose           Log every written file
  -h, --help          Show this help

Places are plain text unless the config file sets placeLinks or
placeLinkBase, or --wiki-places is given.`;

// --name=value flags
const VALUE_FLAGS: Record<string, 'outputDir' | 'biographyDir' | 'configPath'> = {
  '--output': 'outputDir',
  '--bios-dir': 'biographyDir',
  '--config': 'configPath'
};

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { analyzePlaces: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-o') {
      const value = argv[++i];
      if (!value) throw new ConfigError('-o needs a directory');
      args.outputDir = value;
      continue;
    }

    const eq = arg.indexOf('=');
    if (arg.startsWith('--') && eq > 0) {
      const key = VALUE_FLAGS[arg.slice(0, eq)];
      const value = arg.slice(eq + 1);
      if (!key) throw new ConfigError(`Unknown option: ${arg.slice(0, eq)}`);
      if (!value) throw new ConfigError(`${arg.slice(0, eq)} needs a value`);
      args[key] = value;
      continue;
    }

    switch (arg) {
      case '--families':
        args.emitFamilies = true;
        break;
      case '--no-diagrams':
        args.familyDiagrams = false;
        break;
      case '--no-index':
        args.indexPages = false;
        break;
      case '--clean':
        args.cleanOutput = true;
        break;
      case '--wiki-places':
        args.wikiPlaces = true;
        break;
      case '--analyze-places':
        args.analyzePlaces = true;
        break;
      case '--verbose':
        args.verbose = true;
        break;
      case '-h':
      case '--help':
        args.help = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new ConfigError(`Unknown option: ${arg}`);
        }
        if (args.gedcomFile) {
          throw new ConfigError(`Only one GEDCOM file can be converted per run (got ${args.gedcomFile} and ${arg})`);
        }
        args.gedcomFile = arg;
    }
  }

  return args;
}

import type { DocsConfigOverrides } from '../config/docsConfig.js';

export type OutputOption = 'outputPath' | 'codeOutputPath';

export interface CliOptions {
  check: boolean;
  help: boolean;
  overrides: DocsConfigOverrides;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/** `outputOption` picks which config field `--out` sets for the calling script. */
export function parseCliArgs(argv: string[], outputOption: OutputOption): CliOptions {
  const options: CliOptions = { check: false, help: false, overrides: {} };

  const requireValue = (flag: string, index: number): string => {
    const next = argv[index + 1];
    if (!next || next.startsWith('--')) {
      throw new Error(`${flag} requires a value`);
    }
    return next;
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--check':
        options.check = true;
        break;
      case '--root':
        options.overrides.rootDir = requireValue(arg, i);
        i += 1;
        break;
      case '--spec':
        options.overrides.specPath = requireValue(arg, i);
        i += 1;
        break;
      case '--out':
        options.overrides[outputOption] = requireValue(arg, i);
        i += 1;
        break;
      case '--scan':
        options.overrides.scanRoots = splitList(requireValue(arg, i));
        i += 1;
        break;
      case '--controllers':
        options.overrides.controllerDirs = splitList(requireValue(arg, i));
        i += 1;
        break;
      case '--time-zone':
        options.overrides.timeZone = requireValue(arg, i);
        i += 1;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        if (arg?.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
    }
  }
  return options;
}

/**
 * CLI argument parsing
 */

import type { Settings } from '../base/config/index.js';
import { OUTPUT_FORMATS, type OutputFormat } from '../core/rules/renderer.js';

export type CliCommand = 'compose' | 'list' | 'check' | 'config';

export const CLI_COMMANDS: readonly CliCommand[] = ['compose', 'list', 'check', 'config'];

export interface CliOptions {
  command: CliCommand | null;
  /** Target path for `compose` */
  target?: string;
  format: OutputFormat;
  explain: boolean;
  cwd?: string;
  /** Settings given on the command line (highest priority) */
  overrides: Settings;
  help: boolean;
  version: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const HELP_TEXT = `Usage: rulesmith <command> [options]

Commands:
  compose <path>      Print the composed guidance for a file path
  list                List every rule and how it is selected
  check               Load all rules and resolve every reference
  config              Show the effective configuration

Options:
  -r, --rules <dir>       Rules directory (default: .cursor/rules)
      --root-doc <file>   Always-applied document outside the rules directory
      --ext <list>        Comma-separated rule extensions (default: .mdc,.md)
      --strict            Fail on rules that can never be selected
  -f, --format <md|json>  Output format for compose (default: md)
      --explain           Print why each rule was selected (compose)
      --cwd <dir>         Working directory for relative paths
  -h, --help              Show this help
  -v, --version           Show the version
`;

function isCommand(value: string): value is CliCommand {
  return CLI_COMMANDS.some((command) => command === value);
}

function isFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    command: null,
    format: 'md',
    explain: false,
    overrides: {},
    help: false,
    version: false,
  };
  const positional: string[] = [];

  const takeValue = (flag: string, index: number): string => {
    const value = argv[index];
    if (value === undefined || value.startsWith('-')) {
      throw new UsageError(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '-r':
      case '--rules':
        options.overrides.rulesDir = takeValue(arg, ++i);
        break;
      case '--root-doc':
        options.overrides.rootDocument = takeValue(arg, ++i);
        break;
      case '--ext':
        options.overrides.extensions = takeValue(arg, ++i)
          .split(',')
          .map((ext) => ext.trim())
          .filter((ext) => ext.length > 0);
        break;
      case '--strict':
        options.overrides.strict = true;
        break;
      case '-f':
      case '--format': {
        const format = takeValue(arg, ++i);
        if (!isFormat(format)) {
          throw new UsageError(`Unknown format "${format}" (expected ${OUTPUT_FORMATS.join(' or ')})`);
        }
        options.format = format;
        break;
      }
      case '--explain':
        options.explain = true;
        break;
      case '--cwd':
        options.cwd = takeValue(arg, ++i);
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '-v':
      case '--version':
        options.version = true;
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new UsageError(`Unknown flag: ${arg}`);
        }
        positional.push(arg);
    }
  }

  if (options.help || options.version) {
    return options;
  }

  const [command, ...rest] = positional;
  if (command === undefined) {
    throw new UsageError('No command given');
  }
  if (!isCommand(command)) {
    throw new UsageError(`Unknown command: ${command}`);
  }
  options.command = command;

  if (command === 'compose') {
    if (rest.length !== 1) {
      throw new UsageError('compose takes exactly one target path');
    }
    options.target = rest[0];
  } else if (rest.length > 0) {
    throw new UsageError(`${command} takes no arguments`);
  }

  return options;
}

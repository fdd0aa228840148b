/**
 * CLI command runner
 *
 * Exit codes: 0 success, 1 load/resolution/config failure, 2 usage error.
 */

import * as path from 'path';
import chalk from 'chalk';
import { parseArgs, UsageError, HELP_TEXT, type CliOptions } from './args.js';
import {
  createPalette,
  formatCheckResult,
  formatConfig,
  formatError,
  formatRuleList,
  formatSelection,
  formatWarning,
  type Palette,
} from './ui.js';
import { resolveConfig, createMergeSummary, type ResolvedConfig } from '../base/config/index.js';
import { RuleEngine } from '../core/rules/engine.js';
import { RulesmithError } from '../core/rules/errors.js';
import { renderDocument } from '../core/rules/renderer.js';
import { toMatchPath } from '../base/utils/path-utils.js';
import { logger } from '../base/utils/logger.js';
import { VERSION } from '../version.js';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Emit ANSI colors */
  color: boolean;
  env: NodeJS.ProcessEnv;
  /** User-level settings directory; defaults to ~/.rulesmith */
  userDir?: string;
}

export const defaultIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  color: chalk.level > 0,
  env: process.env,
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Target paths are matched relative to the working directory
 */
export function toTargetPath(target: string, cwd: string): string {
  const relative = path.isAbsolute(target) ? path.relative(cwd, target) : target;
  return toMatchPath(relative);
}

function createEngine(config: ResolvedConfig): RuleEngine {
  return new RuleEngine({
    rulesDir: config.rulesDir,
    rootDocument: config.rootDocument,
    extensions: config.extensions,
    strict: config.strict,
  });
}

async function runCompose(
  options: CliOptions,
  config: ResolvedConfig,
  io: CliIO,
  colors: Palette
): Promise<number> {
  const engine = createEngine(config);
  await engine.load();

  const target = toTargetPath(options.target ?? '', config.cwd);
  if (options.explain) {
    io.stderr(formatSelection(engine.select(target), colors) + '\n');
  }

  const document = engine.compose(target);
  if (options.format === 'md') {
    for (const warning of document.warnings) {
      io.stderr(formatWarning(warning, colors) + '\n');
    }
  }

  io.stdout(renderDocument(document, options.format));
  return EXIT_OK;
}

async function runList(config: ResolvedConfig, io: CliIO, colors: Palette): Promise<number> {
  const engine = createEngine(config);
  await engine.load();
  io.stdout(formatRuleList(engine.rules(), colors) + '\n');
  return EXIT_OK;
}

async function runCheck(config: ResolvedConfig, io: CliIO, colors: Palette): Promise<number> {
  const engine = createEngine(config);
  await engine.load();

  const result = engine.check();
  io.stdout(formatCheckResult(result, colors) + '\n');
  return result.errors.length > 0 ? EXIT_FAILURE : EXIT_OK;
}

function runConfig(config: ResolvedConfig, io: CliIO, colors: Palette): number {
  io.stdout(formatConfig(config, createMergeSummary(config.sources), colors) + '\n');
  return EXIT_OK;
}

export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const colors = createPalette(io.color);

  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(formatError(error, colors) + '\n\n' + HELP_TEXT);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (options.help) {
    io.stdout(HELP_TEXT);
    return EXIT_OK;
  }
  if (options.version) {
    io.stdout(`rulesmith ${VERSION}\n`);
    return EXIT_OK;
  }

  try {
    const config = await resolveConfig({
      cwd: options.cwd,
      overrides: options.overrides,
      env: io.env,
      userDir: io.userDir,
    });
    logger.debug('cli', `Running ${options.command ?? 'none'}`, {
      rulesDir: config.rulesDir,
      rootDocument: config.rootDocument,
    });

    switch (options.command) {
      case 'compose':
        return await runCompose(options, config, io, colors);
      case 'list':
        return await runList(config, io, colors);
      case 'check':
        return await runCheck(config, io, colors);
      case 'config':
        return runConfig(config, io, colors);
      default:
        io.stderr(HELP_TEXT);
        return EXIT_USAGE;
    }
  } catch (error) {
    if (error instanceof RulesmithError) {
      io.stderr(formatError(error, colors) + '\n');
      return EXIT_FAILURE;
    }
    throw error;
  }
}

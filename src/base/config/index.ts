/**
 * Configuration Module
 *
 * Resolves where the rules live and how they are loaded by layering
 * defaults, user/project/local settings files, the environment and CLI
 * arguments.
 */

import * as path from 'path';
import type { ConfigSource, ResolvedConfig, Settings } from './types.js';
import { loadEnvSource, loadFileSources, validateSettings } from './loader.js';
import { mergeSettings } from './merger.js';
import { DEFAULT_RULES_DIR, DEFAULT_RULE_EXTENSIONS } from '../../core/rules/types.js';
import { getUserConfigDir, resolveFrom } from '../utils/path-utils.js';

export type {
  Settings,
  ConfigLevelType,
  ConfigSource,
  ResolvedConfig,
} from './types.js';

export {
  SettingsSchema,
  SETTINGS_FILE_NAME,
  SETTINGS_LOCAL_FILE_NAME,
  ENV_RULES_DIR,
  ENV_ROOT_DOCUMENT,
  ENV_EXTENSIONS,
  ENV_STRICT,
} from './types.js';

export {
  loadFileSources,
  loadEnvSource,
  validateSettings,
  getSettingsFiles,
  type SettingsFileInfo,
} from './loader.js';

export { overlaySettings, mergeSettings, createMergeSummary } from './merger.js';

export interface ResolveConfigOptions {
  /** Working directory; relative paths resolve against it */
  cwd?: string;
  /** Highest-priority overrides, typically from CLI flags */
  overrides?: Settings;
  env?: NodeJS.ProcessEnv;
  /** User-level settings directory (defaults to ~/.rulesmith) */
  userDir?: string;
}

/**
 * Load and merge every configuration source
 *
 * @throws ConfigError when a settings file or variable is invalid
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const sources: ConfigSource[] = await loadFileSources(cwd, options.userDir ?? getUserConfigDir());

  const envSource = loadEnvSource(options.env ?? process.env);
  if (envSource) {
    sources.push(envSource);
  }

  if (options.overrides && Object.keys(options.overrides).length > 0) {
    sources.push({ level: 'cli', settings: validateSettings(options.overrides, 'command line') });
  }

  const merged = mergeSettings(sources);

  const resolved: ResolvedConfig = {
    cwd,
    rulesDir: resolveFrom(cwd, merged.rulesDir ?? DEFAULT_RULES_DIR),
    extensions: merged.extensions ?? [...DEFAULT_RULE_EXTENSIONS],
    strict: merged.strict ?? false,
    sources,
  };
  if (merged.rootDocument !== undefined) {
    resolved.rootDocument = resolveFrom(cwd, merged.rootDocument);
  }

  return resolved;
}

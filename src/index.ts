/**
 * rulesmith - select, resolve and compose rule documents
 *
 * Given a target file path and a directory of rule documents, produce one
 * consolidated guidance document.
 */

// Rules
export * from './core/rules/index.js';

// Configuration
export {
  resolveConfig,
  loadFileSources,
  loadEnvSource,
  mergeSettings,
  createMergeSummary,
  SettingsSchema,
  type ResolveConfigOptions,
  type ResolvedConfig,
  type Settings,
  type ConfigSource,
  type ConfigLevelType,
} from './base/config/index.js';

// CLI
export { runCli, type CliIO } from './cli/run.js';

export { VERSION } from './version.js';

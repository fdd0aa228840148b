/**
 * Configuration Types
 *
 * Configuration hierarchy (priority from low to high):
 * 1. Defaults
 * 2. User Level:    ~/.rulesmith/settings.json
 * 3. Project Level: <cwd>/.rulesmith/settings.json
 * 4. Local Level:   <cwd>/.rulesmith/settings.local.json (gitignored)
 * 5. Environment:   RULESMITH_* variables
 * 6. CLI Arguments: command line overrides
 */

import { z } from 'zod';

export const SettingsSchema = z.object({
  rulesDir: z.string().min(1, 'rulesDir must not be empty').optional(),
  rootDocument: z.string().min(1, 'rootDocument must not be empty').optional(),
  extensions: z
    .array(
      z.string().regex(/^\.[A-Za-z0-9_-]+(\.[A-Za-z0-9_-]+)*$/, 'extensions must look like ".mdc"')
    )
    .min(1, 'at least one extension is required')
    .optional(),
  strict: z.boolean().optional(),
});

/**
 * Settings file structure (every field optional, later sources win)
 */
export type Settings = z.infer<typeof SettingsSchema>;

export type ConfigLevelType = 'user' | 'project' | 'local' | 'env' | 'cli';

export interface ConfigSource {
  level: ConfigLevelType;
  /** Settings file the values came from; absent for env and cli */
  path?: string;
  settings: Settings;
}

/**
 * Fully resolved configuration with absolute paths
 */
export interface ResolvedConfig {
  cwd: string;
  rulesDir: string;
  rootDocument?: string;
  extensions: string[];
  strict: boolean;
  /** Sources that contributed, lowest priority first */
  sources: ConfigSource[];
}

export const SETTINGS_FILE_NAME = 'settings.json';
export const SETTINGS_LOCAL_FILE_NAME = 'settings.local.json';

export const ENV_RULES_DIR = 'RULESMITH_RULES_DIR';
export const ENV_ROOT_DOCUMENT = 'RULESMITH_ROOT_DOCUMENT';
export const ENV_EXTENSIONS = 'RULESMITH_EXTENSIONS';
export const ENV_STRICT = 'RULESMITH_STRICT';

/**
 * Configuration Loader - Load settings from files and the environment
 *
 * Missing settings files are skipped. A file that exists but cannot be
 * parsed or validated is a ConfigError.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { z } from 'zod';
import {
  SettingsSchema,
  SETTINGS_FILE_NAME,
  SETTINGS_LOCAL_FILE_NAME,
  ENV_RULES_DIR,
  ENV_ROOT_DOCUMENT,
  ENV_EXTENSIONS,
  ENV_STRICT,
  type ConfigLevelType,
  type ConfigSource,
  type Settings,
} from './types.js';
import { ConfigError, errorMessage } from '../../core/rules/errors.js';
import { CONFIG_DIR, getUserConfigDir } from '../utils/path-utils.js';
import { logger } from '../utils/logger.js';

export interface SettingsFileInfo {
  level: Extract<ConfigLevelType, 'user' | 'project' | 'local'>;
  path: string;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const key = issue.path.join('.');
      return key ? `${key}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Validate raw settings data
 *
 * @param origin File path or variable name for error messages
 */
export function validateSettings(data: unknown, origin: string): Settings {
  const result = SettingsSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid settings in ${origin}: ${formatIssues(result.error)}`, origin);
  }
  return result.data;
}

/**
 * Load a single JSON settings file, or undefined when it does not exist
 */
async function loadJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return undefined;
    }
    throw new ConfigError(`Failed to read ${filePath}: ${errorMessage(error)}`, filePath, error);
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${filePath}: ${errorMessage(error)}`, filePath, error);
  }
}

/**
 * Settings file locations in priority order (lowest first)
 */
export function getSettingsFiles(cwd: string, userDir: string = getUserConfigDir()): SettingsFileInfo[] {
  const projectDir = path.join(cwd, CONFIG_DIR);
  return [
    { level: 'user', path: path.join(userDir, SETTINGS_FILE_NAME) },
    { level: 'project', path: path.join(projectDir, SETTINGS_FILE_NAME) },
    { level: 'local', path: path.join(projectDir, SETTINGS_LOCAL_FILE_NAME) },
  ];
}

/**
 * Load all settings files that exist, lowest priority first
 */
export async function loadFileSources(
  cwd: string,
  userDir: string = getUserConfigDir()
): Promise<ConfigSource[]> {
  const sources: ConfigSource[] = [];

  for (const file of getSettingsFiles(cwd, userDir)) {
    const data = await loadJsonFile(file.path);
    if (data === undefined) {
      continue;
    }

    sources.push({
      level: file.level,
      path: file.path,
      settings: validateSettings(data, file.path),
    });
    logger.debug('config', 'Loaded settings file', { level: file.level, file: file.path });
  }

  return sources;
}

function parseBoolean(value: string, name: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  throw new ConfigError(`${name} must be one of 1, 0, true, false (got "${value}")`, name);
}

/**
 * Build a settings source from RULESMITH_* environment variables
 */
export function loadEnvSource(env: NodeJS.ProcessEnv = process.env): ConfigSource | null {
  const raw: Record<string, unknown> = {};

  const rulesDir = env[ENV_RULES_DIR]?.trim();
  if (rulesDir) raw.rulesDir = rulesDir;

  const rootDocument = env[ENV_ROOT_DOCUMENT]?.trim();
  if (rootDocument) raw.rootDocument = rootDocument;

  const extensions = env[ENV_EXTENSIONS]?.trim();
  if (extensions) {
    raw.extensions = extensions
      .split(',')
      .map((ext) => ext.trim())
      .filter((ext) => ext.length > 0);
  }

  const strict = env[ENV_STRICT];
  if (strict !== undefined && strict.trim() !== '') {
    raw.strict = parseBoolean(strict, ENV_STRICT);
  }

  if (Object.keys(raw).length === 0) {
    return null;
  }

  return { level: 'env', settings: validateSettings(raw, 'environment') };
}

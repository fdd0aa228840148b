// src/base/utils/path-utils.ts
import * as os from 'os';
import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Directory name for rulesmith settings (user and project level)
 */
export const CONFIG_DIR = '.rulesmith';

/**
 * Check if a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Get the user-level config directory (~/.rulesmith)
 */
export function getUserConfigDir(): string {
  return path.join(os.homedir(), CONFIG_DIR);
}

/**
 * Resolve a possibly relative path against a base directory.
 * A leading `~/` expands to the home directory.
 */
export function resolveFrom(baseDir: string, target: string): string {
  if (target === '~' || target.startsWith('~/')) {
    return path.join(os.homedir(), target.slice(1));
  }
  return path.resolve(baseDir, target);
}

/**
 * Normalize a target path for glob matching: forward slashes, no leading `./`
 */
export function toMatchPath(filePath: string): string {
  let normalized = filePath.replace(/\\/g, '/');
  while (normalized.startsWith('./')) {
    normalized = normalized.slice(2);
  }
  return normalized;
}

/**
 * Strip a known extension from a file name, returning null when none matches.
 * The longest matching extension wins so `.rules.md` beats `.md`.
 */
export function stripExtension(fileName: string, extensions: readonly string[]): string | null {
  const sorted = [...extensions].sort((a, b) => b.length - a.length);
  for (const ext of sorted) {
    if (fileName.endsWith(ext) && fileName.length > ext.length) {
      return fileName.slice(0, -ext.length);
    }
  }
  return null;
}

/**
 * Shared test utilities for config tests
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { CONFIG_DIR } from '../utils/path-utils.js';

export interface TestProject {
  tempDir: string;
  projectDir: string;
  /** Stands in for ~/.rulesmith */
  userDir: string;
  cleanup: () => Promise<void>;
}

/**
 * Create a test project with separate project and user directories
 */
export async function createTestProject(prefix = 'rulesmith-test-'): Promise<TestProject> {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  const projectDir = path.join(tempDir, 'project');
  const userDir = path.join(tempDir, 'home', CONFIG_DIR);

  await fs.mkdir(projectDir, { recursive: true });
  await fs.mkdir(userDir, { recursive: true });

  return {
    tempDir,
    projectDir,
    userDir,
    cleanup: async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    },
  };
}

/**
 * Write settings JSON (or raw text) into the project's .rulesmith directory
 */
export async function writeSettings(
  projectDir: string,
  settings: Record<string, unknown> | string,
  local = false
): Promise<string> {
  const dir = path.join(projectDir, CONFIG_DIR);
  await fs.mkdir(dir, { recursive: true });

  const filename = local ? 'settings.local.json' : 'settings.json';
  const filePath = path.join(dir, filename);
  await fs.writeFile(filePath, typeof settings === 'string' ? settings : JSON.stringify(settings));

  return filePath;
}

export async function writeUserSettings(
  userDir: string,
  settings: Record<string, unknown>
): Promise<string> {
  const filePath = path.join(userDir, 'settings.json');
  await fs.writeFile(filePath, JSON.stringify(settings));
  return filePath;
}

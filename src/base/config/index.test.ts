/**
 * Config Resolution Tests
 */

import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { resolveConfig } from './index.js';
import { ConfigError } from '../../core/rules/errors.js';
import { createTestProject, writeSettings, writeUserSettings, type TestProject } from './test-utils.js';

describe('resolveConfig', () => {
  let test: TestProject;

  beforeEach(async () => {
    test = await createTestProject('rulesmith-resolve-');
  });

  afterEach(() => test.cleanup());

  it('should fall back to defaults', async () => {
    const config = await resolveConfig({ cwd: test.projectDir, env: {}, userDir: test.userDir });

    expect(config).toEqual({
      cwd: test.projectDir,
      rulesDir: path.join(test.projectDir, '.cursor', 'rules'),
      extensions: ['.mdc', '.md'],
      strict: false,
      sources: [],
    });
  });

  it('should layer files, environment and overrides', async () => {
    await writeUserSettings(test.userDir, { rulesDir: 'user-rules', strict: true });
    await writeSettings(test.projectDir, { rulesDir: 'project-rules' });
    await writeSettings(test.projectDir, { extensions: ['.mdc'] }, true);

    const config = await resolveConfig({
      cwd: test.projectDir,
      env: { RULESMITH_ROOT_DOCUMENT: 'AGENTS.md' },
      userDir: test.userDir,
      overrides: { strict: false },
    });

    expect(config.rulesDir).toBe(path.join(test.projectDir, 'project-rules'));
    expect(config.rootDocument).toBe(path.join(test.projectDir, 'AGENTS.md'));
    expect(config.extensions).toEqual(['.mdc']);
    expect(config.strict).toBe(false);
    expect(config.sources.map((source) => source.level)).toEqual([
      'user',
      'project',
      'local',
      'env',
      'cli',
    ]);
  });

  it('should keep absolute paths as given', async () => {
    const rulesDir = path.join(test.tempDir, 'elsewhere');

    const config = await resolveConfig({
      cwd: test.projectDir,
      env: {},
      userDir: test.userDir,
      overrides: { rulesDir },
    });

    expect(config.rulesDir).toBe(rulesDir);
  });

  it('should skip empty overrides', async () => {
    const config = await resolveConfig({
      cwd: test.projectDir,
      env: {},
      userDir: test.userDir,
      overrides: {},
    });

    expect(config.sources).toEqual([]);
  });

  it('should validate overrides', async () => {
    await expect(
      resolveConfig({
        cwd: test.projectDir,
        env: {},
        userDir: test.userDir,
        overrides: { extensions: ['mdc'] },
      })
    ).rejects.toThrow(ConfigError);
  });
});

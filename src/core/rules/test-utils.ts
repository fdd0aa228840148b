/**
 * Shared test utilities for rule tests
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import type { BodySegment, RuleDocument } from './types.js';
import { RuleStore } from './store.js';

export interface RulesFixture {
  tempDir: string;
  rulesDir: string;
  cleanup: () => Promise<void>;
}

export async function createRulesFixture(prefix = 'rulesmith-rules-'): Promise<RulesFixture> {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  const rulesDir = path.join(tempDir, '.cursor', 'rules');
  await fs.mkdir(rulesDir, { recursive: true });

  return {
    tempDir,
    rulesDir,
    cleanup: async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    },
  };
}

/**
 * Write a file below `dir`, creating parent directories
 */
export async function writeFile(dir: string, relativePath: string, content: string): Promise<string> {
  const filePath = path.join(dir, relativePath);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
  return filePath;
}

export interface RuleHeaderInput {
  description?: string;
  globs?: string[];
  alwaysApply?: boolean;
}

/**
 * Render a rule file with a YAML header
 */
export function ruleFile(header: RuleHeaderInput, body: string): string {
  const lines = ['---'];
  if (header.description !== undefined) {
    lines.push(`description: ${header.description}`);
  }
  if (header.globs !== undefined) {
    lines.push('globs:');
    for (const glob of header.globs) {
      lines.push(`  - "${glob}"`);
    }
  }
  if (header.alwaysApply !== undefined) {
    lines.push(`alwaysApply: ${header.alwaysApply}`);
  }
  lines.push('---', '', body);
  return lines.join('\n');
}

/**
 * Body shorthand: `@name` entries become references, everything else text
 */
export function body(...parts: string[]): BodySegment[] {
  return parts.map((part): BodySegment =>
    part.startsWith('@')
      ? { kind: 'reference', name: part.slice(1), token: `@rule:${part.slice(1)}` }
      : { kind: 'text', text: part }
  );
}

export function makeRule(
  name: string,
  options: { globs?: string[]; alwaysApply?: boolean; body?: BodySegment[] } = {}
): RuleDocument {
  return {
    name,
    globs: options.globs ?? [],
    alwaysApply: options.alwaysApply ?? false,
    body: options.body ?? [],
    source: { path: `/rules/${name}.mdc`, kind: 'directory' },
  };
}

export function makeStore(...rules: RuleDocument[]): RuleStore {
  return RuleStore.fromDocuments(rules, { root: '/rules' });
}

/**
 * Rule Store - Load and index every rule document under a root directory
 *
 * The store is immutable once built. Reloading means building a new store;
 * a failed load never yields a partial one.
 *
 * Discovery:
 * - recursive, files with a recognized extension (default .mdc, .md)
 * - hidden directories and node_modules are skipped
 * - rule name = file stem, directories do not contribute
 * - an optional root document (AGENTS.md, .cursorrules, ...) always applies
 */

import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import * as path from 'path';
import fg from 'fast-glob';
import type { RuleDocument, RuleSource, RuleStoreOptions } from './types.js';
import { DEFAULT_RULE_EXTENSIONS } from './types.js';
import { parseRuleFile } from './rules-parser.js';
import { DuplicateNameError, LoadError, UnreachableRuleError, errorMessage } from './errors.js';
import { pathExists, stripExtension } from '../../base/utils/path-utils.js';
import { logger } from '../../base/utils/logger.js';
import { isDebugEnabled } from '../../base/utils/debug.js';

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function freezeDocument(document: RuleDocument): RuleDocument {
  Object.freeze(document.globs);
  document.body.forEach((segment) => Object.freeze(segment));
  Object.freeze(document.body);
  Object.freeze(document.source);
  return Object.freeze(document);
}

export class RuleStore {
  private readonly documents: ReadonlyMap<string, RuleDocument>;
  private readonly ordered: readonly RuleDocument[];

  /** Non-fatal issues found while loading */
  readonly warnings: readonly string[];

  /** Directory the store was built from */
  readonly root: string;

  private constructor(documents: Map<string, RuleDocument>, root: string, warnings: string[]) {
    this.documents = documents;
    this.ordered = Object.freeze(
      [...documents.values()].sort((a, b) => compareNames(a.name, b.name))
    );
    this.root = root;
    this.warnings = Object.freeze([...warnings]);
  }

  /**
   * Build a store from already-parsed documents
   *
   * @throws DuplicateNameError when two documents share a name
   */
  static fromDocuments(
    documents: RuleDocument[],
    options: { root?: string; warnings?: string[] } = {}
  ): RuleStore {
    const byName = new Map<string, RuleDocument>();

    for (const document of documents) {
      const existing = byName.get(document.name);
      if (existing) {
        throw new DuplicateNameError(document.name, existing.source.path, document.source.path);
      }
      byName.set(document.name, freezeDocument(document));
    }

    return new RuleStore(byName, options.root ?? '', options.warnings ?? []);
  }

  get(name: string): RuleDocument | undefined {
    return this.documents.get(name);
  }

  has(name: string): boolean {
    return this.documents.has(name);
  }

  /**
   * All documents, lexicographic by name
   */
  all(): readonly RuleDocument[] {
    return this.ordered;
  }

  names(): string[] {
    return this.ordered.map((document) => document.name);
  }

  get size(): number {
    return this.documents.size;
  }
}

/**
 * Find rule files under a directory, sorted by relative path
 */
export async function discoverRuleFiles(
  rootDirectory: string,
  extensions: readonly string[]
): Promise<string[]> {
  const patterns = extensions.map((ext) => `**/*${ext}`);
  const files = await fg(patterns, {
    cwd: rootDirectory,
    onlyFiles: true,
    dot: false,
    followSymbolicLinks: true,
    ignore: ['**/node_modules/**'],
  });

  return [...new Set(files)].sort(compareNames).map((file) => path.join(rootDirectory, file));
}

async function readRuleFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new LoadError(`Failed to read rule file ${filePath}: ${errorMessage(error)}`, {
      filePath,
      cause: error,
    });
  }
}

async function loadDocument(
  filePath: string,
  name: string,
  source: RuleSource,
  extensions: readonly string[],
  warnings: string[]
): Promise<RuleDocument> {
  const content = await readRuleFile(filePath);
  const parsed = parseRuleFile(content, name, filePath, extensions);

  for (const key of parsed.unknownKeys) {
    warnings.push(`Rule "${name}" (${filePath}): unknown header key "${key}" ignored`);
  }

  const document: RuleDocument = {
    name,
    globs: parsed.globs,
    alwaysApply: parsed.alwaysApply,
    body: parsed.body,
    source,
  };
  if (parsed.description !== undefined) {
    document.description = parsed.description;
  }
  return document;
}

/**
 * Load every rule document under `rootDirectory`
 *
 * @throws LoadError (ParseError, DuplicateNameError, UnreachableRuleError)
 */
export async function loadRuleStore(
  rootDirectory: string,
  options: RuleStoreOptions = {}
): Promise<RuleStore> {
  const root = path.resolve(rootDirectory);
  const extensions = options.extensions ?? DEFAULT_RULE_EXTENSIONS;
  const warnings: string[] = [];

  let stat: Stats;
  try {
    stat = await fs.stat(root);
  } catch (error) {
    throw new LoadError(`Rules directory not found: ${root}`, { filePath: root, cause: error });
  }
  if (!stat.isDirectory()) {
    throw new LoadError(`Rules path is not a directory: ${root}`, { filePath: root });
  }

  const documents: RuleDocument[] = [];
  const seen = new Map<string, string>();

  const claimName = (name: string, filePath: string) => {
    const existing = seen.get(name);
    if (existing !== undefined) {
      throw new DuplicateNameError(name, existing, filePath);
    }
    seen.set(name, filePath);
  };

  for (const filePath of await discoverRuleFiles(root, extensions)) {
    const name = stripExtension(path.basename(filePath), extensions);
    if (!name) {
      continue;
    }
    claimName(name, filePath);

    const document = await loadDocument(
      filePath,
      name,
      { path: filePath, kind: 'directory' },
      extensions,
      warnings
    );

    if (!document.alwaysApply && document.globs.length === 0) {
      if (options.strict) {
        throw new UnreachableRuleError(name, filePath);
      }
      warnings.push(
        `Rule "${name}" (${filePath}) has no globs and alwaysApply is false; it is never selected`
      );
    }

    documents.push(document);

    if (isDebugEnabled('store')) {
      logger.debug('store', `Loaded rule "${name}"`, {
        file: filePath,
        alwaysApply: document.alwaysApply,
        globs: document.globs,
      });
    }
  }

  if (options.rootDocument) {
    const rootPath = path.resolve(options.rootDocument);

    if (await pathExists(rootPath)) {
      const base = path.basename(rootPath);
      const name = stripExtension(base, extensions) ?? base;
      claimName(name, rootPath);

      const document = await loadDocument(
        rootPath,
        name,
        { path: rootPath, kind: 'root-document' },
        extensions,
        warnings
      );
      document.alwaysApply = true;
      document.globs = [];
      documents.push(document);

      logger.debug('store', `Loaded root document "${name}"`, { file: rootPath });
    } else {
      logger.debug('store', 'Root document not found, skipping', { file: rootPath });
    }
  }

  return RuleStore.fromDocuments(documents, { root, warnings });
}

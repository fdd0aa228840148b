/**
 * Rule Engine - Holds the active rule store and answers queries
 *
 * The store reference is swapped only after a new store has loaded
 * completely; a failed reload leaves the previous store in place.
 */

import type { ResolvedDocument, RuleDocument, RuleStoreOptions } from './types.js';
import { loadRuleStore, type RuleStore } from './store.js';
import { compose } from './composer.js';
import { explainSelection, type Selection } from './selector.js';
import { ReferenceResolver } from './reference-resolver.js';
import { EngineNotLoadedError, ReferenceError } from './errors.js';
import { logger } from '../../base/utils/logger.js';

export interface RuleEngineConfig extends RuleStoreOptions {
  /** Directory holding the rule files */
  rulesDir: string;
}

export interface CheckResult {
  /** Number of rules examined */
  checked: number;
  errors: ReferenceError[];
  warnings: string[];
}

export class RuleEngine {
  private readonly config: RuleEngineConfig;
  private current: RuleStore | null = null;

  constructor(config: RuleEngineConfig) {
    this.config = { ...config };
  }

  /**
   * Load the store if it has not been loaded yet
   */
  async load(): Promise<RuleStore> {
    if (this.current) {
      return this.current;
    }
    return this.reload();
  }

  /**
   * Build a fresh store and make it the active one
   */
  async reload(): Promise<RuleStore> {
    const { rulesDir, ...options } = this.config;
    const next = await loadRuleStore(rulesDir, options);
    this.current = next;

    logger.debug('store', 'Rule store ready', {
      rulesDir: next.root,
      rules: next.size,
      warnings: next.warnings.length,
    });
    return next;
  }

  get store(): RuleStore {
    if (!this.current) {
      throw new EngineNotLoadedError();
    }
    return this.current;
  }

  get isLoaded(): boolean {
    return this.current !== null;
  }

  compose(targetPath: string): ResolvedDocument {
    return compose(this.store, targetPath);
  }

  select(targetPath: string): Selection[] {
    return explainSelection(this.store, targetPath);
  }

  /**
   * Resolve every rule once, collecting reference errors instead of throwing
   */
  check(): CheckResult {
    const store = this.store;
    const resolver = new ReferenceResolver(store);
    const errors: ReferenceError[] = [];

    for (const rule of store.all()) {
      try {
        resolver.resolve(rule);
      } catch (error) {
        if (error instanceof ReferenceError) {
          errors.push(error);
          continue;
        }
        throw error;
      }
    }

    return { checked: store.size, errors, warnings: [...store.warnings] };
  }

  rules(): readonly RuleDocument[] {
    return this.store.all();
  }
}

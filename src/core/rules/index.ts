/**
 * Rule System - select, resolve and compose rule documents for a file path
 */

export * from './types.js';
export * from './errors.js';
export { RuleStore, loadRuleStore, discoverRuleFiles } from './store.js';
export { parseRuleFile, parseBody, splitGlobList, RuleHeaderSchema } from './rules-parser.js';
export { matches, matchesAny } from './glob-matcher.js';
export { selectRules, explainSelection, type Selection, type SelectionReason } from './selector.js';
export { ReferenceResolver, resolveRule } from './reference-resolver.js';
export { compose } from './composer.js';
export { RuleEngine, type RuleEngineConfig, type CheckResult } from './engine.js';
export {
  renderMarkdown,
  renderJson,
  renderDocument,
  OUTPUT_FORMATS,
  type OutputFormat,
} from './renderer.js';

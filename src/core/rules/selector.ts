/**
 * Rule Selector - Pick the rules that apply to a target path
 *
 * Order: always-apply rules first, then glob-matched rules, each group
 * lexicographic by name. A rule appears at most once.
 */

import type { RuleDocument } from './types.js';
import type { RuleStore } from './store.js';
import { matches } from './glob-matcher.js';

export type SelectionReason =
  | { kind: 'always' }
  | { kind: 'glob'; pattern: string };

export interface Selection {
  rule: RuleDocument;
  reason: SelectionReason;
}

/**
 * Select rules with the reason each one applies
 */
export function explainSelection(store: RuleStore, targetPath: string): Selection[] {
  const always: Selection[] = [];
  const matched: Selection[] = [];

  for (const rule of store.all()) {
    if (rule.alwaysApply) {
      always.push({ rule, reason: { kind: 'always' } });
      continue;
    }

    const pattern = rule.globs.find((glob) => matches(glob, targetPath));
    if (pattern !== undefined) {
      matched.push({ rule, reason: { kind: 'glob', pattern } });
    }
  }

  return [...always, ...matched];
}

export function selectRules(store: RuleStore, targetPath: string): RuleDocument[] {
  return explainSelection(store, targetPath).map((selection) => selection.rule);
}

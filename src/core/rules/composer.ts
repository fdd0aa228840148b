/**
 * Composer - Build one consolidated guidance document for a target path
 */

import type { ResolvedDocument, ResolvedSegment } from './types.js';
import type { RuleStore } from './store.js';
import { selectRules } from './selector.js';
import { ReferenceResolver } from './reference-resolver.js';

/**
 * Compose the guidance for `targetPath`
 *
 * Selected rules are resolved in selection order. Literal segments are
 * trimmed; blank ones are dropped and a segment whose text already appeared
 * earlier in the document is dropped too, so the first occurrence wins.
 * A segment that continues the line of the one emitted just before it,
 * within one selected rule, is marked `inline`.
 *
 * @throws ResolutionError when any selected rule fails to resolve
 */
export function compose(store: RuleStore, targetPath: string): ResolvedDocument {
  const selected = selectRules(store, targetPath);
  const resolver = new ReferenceResolver(store);

  const seen = new Set<string>();
  const segments: ResolvedSegment[] = [];

  for (const rule of selected) {
    let previous: { raw: string; emitted: boolean } | null = null;

    for (const segment of resolver.resolve(rule)) {
      const text = segment.text.trim();
      if (text === '') {
        if (previous) {
          previous = { raw: previous.raw + segment.text, emitted: previous.emitted };
        }
        continue;
      }

      const emitted = !seen.has(text);
      if (emitted) {
        seen.add(text);
        const inline =
          previous !== null && previous.emitted && sharesLine(previous.raw, segment.text);
        segments.push(
          inline ? { source: segment.source, text, inline: true } : { source: segment.source, text }
        );
      }
      previous = { raw: segment.text, emitted };
    }
  }

  return {
    targetPath,
    rules: selected.map((rule) => rule.name),
    segments,
    warnings: [...store.warnings],
  };
}

const FENCE_LINE = /^ {0,3}(`{3,}|~{3,})/;
const BLOCK_START = /^ {0,3}(`{3,}|~{3,}|#{1,6}(\s|$)|>|[-*+]\s|\d+[.)]\s|\|)/;

/**
 * Whether `after` began on the line where `before` ended, and gluing them
 * keeps fences and block starts on lines of their own
 */
function sharesLine(before: string, after: string): boolean {
  if (/\n[ \t]*$/.test(before) || /^[ \t]*\n/.test(after)) {
    return false;
  }
  const lastLine = before.trim().split('\n').pop() ?? '';
  const firstLine = after.trim().split('\n')[0] ?? '';
  return !FENCE_LINE.test(lastLine) && !BLOCK_START.test(firstLine);
}

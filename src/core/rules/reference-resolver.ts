/**
 * Reference Resolver - Expand rule references into literal text
 *
 * References are replaced in place, depth-first. Cycle detection tracks the
 * names on the current expansion path for one top-level call only, so a rule
 * reached through two different branches is expanded twice and is not a
 * cycle. Nothing is cached between calls.
 */

import type { RuleDocument, ResolvedSegment } from './types.js';
import type { RuleStore } from './store.js';
import { CycleError, MissingReferenceError } from './errors.js';
import { logger } from '../../base/utils/logger.js';

export class ReferenceResolver {
  private readonly store: RuleStore;

  constructor(store: RuleStore) {
    this.store = store;
  }

  /**
   * Resolve a document's body into literal segments
   *
   * @throws CycleError when the document transitively references itself
   * @throws MissingReferenceError when a referenced rule is not in the store
   */
  resolve(document: RuleDocument): ResolvedSegment[] {
    const segments: ResolvedSegment[] = [];
    this.expand(document, [], new Set<string>(), segments);
    return segments;
  }

  private expand(
    document: RuleDocument,
    trail: string[],
    active: Set<string>,
    out: ResolvedSegment[]
  ): void {
    trail.push(document.name);
    active.add(document.name);

    for (const segment of document.body) {
      if (segment.kind === 'text') {
        out.push({ source: document.name, text: segment.text });
        continue;
      }

      if (active.has(segment.name)) {
        const start = trail.indexOf(segment.name);
        throw new CycleError([...trail.slice(start), segment.name]);
      }

      const referenced = this.store.get(segment.name);
      if (!referenced) {
        throw new MissingReferenceError(document.name, segment.name);
      }

      logger.verbose('resolver', 'Expanding reference', {
        from: document.name,
        to: segment.name,
        depth: trail.length,
      });

      this.expand(referenced, trail, active, out);
    }

    trail.pop();
    active.delete(document.name);
  }
}

/**
 * Resolve a single document against a store
 */
export function resolveRule(store: RuleStore, document: RuleDocument): ResolvedSegment[] {
  return new ReferenceResolver(store).resolve(document);
}

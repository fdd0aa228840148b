/**
 * Reference Resolver Tests
 */

import { describe, it, expect } from '@jest/globals';
import { ReferenceResolver, resolveRule } from './reference-resolver.js';
import { CycleError, MissingReferenceError, ReferenceError } from './errors.js';
import { body, makeRule, makeStore } from './test-utils.js';
import type { RuleStore } from './store.js';

function resolveByName(store: RuleStore, name: string) {
  const rule = store.get(name);
  if (!rule) {
    throw new Error(`test setup: no rule ${name}`);
  }
  return resolveRule(store, rule);
}

function cycleOf(store: RuleStore, name: string): string[] | undefined {
  try {
    resolveByName(store, name);
  } catch (error) {
    if (error instanceof CycleError) {
      return error.cycle;
    }
    throw error;
  }
  return undefined;
}

describe('ReferenceResolver', () => {
  it('should return literal text unchanged', () => {
    const store = makeStore(makeRule('a', { body: body('Hello') }));

    expect(resolveByName(store, 'a')).toEqual([{ source: 'a', text: 'Hello' }]);
  });

  it('should expand references in place, depth-first', () => {
    const store = makeStore(
      makeRule('a', { body: body('A1', '@b', 'A2') }),
      makeRule('b', { body: body('B1', '@c', 'B2') }),
      makeRule('c', { body: body('C') })
    );

    expect(resolveByName(store, 'a')).toEqual([
      { source: 'a', text: 'A1' },
      { source: 'b', text: 'B1' },
      { source: 'c', text: 'C' },
      { source: 'b', text: 'B2' },
      { source: 'a', text: 'A2' },
    ]);
  });

  it('should expand a diamond twice without reporting a cycle', () => {
    const store = makeStore(
      makeRule('top', { body: body('@left', '@right') }),
      makeRule('left', { body: body('L', '@shared') }),
      makeRule('right', { body: body('R', '@shared') }),
      makeRule('shared', { body: body('S') })
    );

    expect(resolveByName(store, 'top').map((segment) => segment.text)).toEqual([
      'L',
      'S',
      'R',
      'S',
    ]);
  });

  it('should report a two-rule cycle with its path', () => {
    const store = makeStore(
      makeRule('a', { body: body('@b') }),
      makeRule('b', { body: body('@a') })
    );

    expect(cycleOf(store, 'a')).toEqual(['a', 'b', 'a']);
    expect(cycleOf(store, 'b')).toEqual(['b', 'a', 'b']);
  });

  it('should report a self reference', () => {
    const store = makeStore(makeRule('loop', { body: body('x', '@loop') }));

    expect(cycleOf(store, 'loop')).toEqual(['loop', 'loop']);
  });

  it('should report only the cycle part of a longer path', () => {
    const store = makeStore(
      makeRule('entry', { body: body('@a') }),
      makeRule('a', { body: body('@b') }),
      makeRule('b', { body: body('@c') }),
      makeRule('c', { body: body('@a') })
    );

    let caught: unknown;
    try {
      resolveByName(store, 'entry');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CycleError);
    expect(caught).toBeInstanceOf(ReferenceError);
    expect(caught).toMatchObject({
      cycle: ['a', 'b', 'c', 'a'],
      code: 'REFERENCE_CYCLE',
      message: 'Reference cycle detected: a -> b -> c -> a',
    });
  });

  it('should report a missing reference with the referencing rule', () => {
    const store = makeStore(makeRule('a', { body: body('x', '@ghost') }));

    expect(() => resolveByName(store, 'a')).toThrow(MissingReferenceError);
    expect(() => resolveByName(store, 'a')).toThrow('Rule "a" references unknown rule "ghost"');
  });

  it('should not carry state between calls', () => {
    const store = makeStore(
      makeRule('a', { body: body('@b') }),
      makeRule('b', { body: body('B') })
    );
    const resolver = new ReferenceResolver(store);
    const rule = store.get('a');
    if (!rule) throw new Error('test setup: no rule a');

    expect(resolver.resolve(rule)).toEqual([{ source: 'b', text: 'B' }]);
    expect(resolver.resolve(rule)).toEqual([{ source: 'b', text: 'B' }]);
  });

  it('should keep the store usable after a failed resolution', () => {
    const store = makeStore(
      makeRule('bad', { body: body('@missing') }),
      makeRule('good', { body: body('fine') })
    );

    expect(() => resolveByName(store, 'bad')).toThrow(MissingReferenceError);
    expect(resolveByName(store, 'good')).toEqual([{ source: 'good', text: 'fine' }]);
  });
});

/**
 * Glob Matcher - Decide whether a relative file path satisfies rule globs
 *
 * Semantics (minimatch, anchored to the whole path, case-sensitive):
 * - `*`     any run of characters except `/`
 * - `**`    zero or more whole path segments
 * - `?`     exactly one character except `/`
 * - `[...]` character classes, `{a,b}` alternatives
 * Dot-files and dot-directories match like any other name.
 */

import { minimatch, type MinimatchOptions } from 'minimatch';
import { toMatchPath } from '../../base/utils/path-utils.js';

const MATCH_OPTIONS: MinimatchOptions = {
  dot: true,
  nocase: false,
  matchBase: false,
  nocomment: true,
  nonegate: true,
};

/**
 * True when a pattern consists only of `**` segments (`**`, `**\/**`, ...)
 */
function isGlobstarOnly(pattern: string): boolean {
  return pattern.split('/').every((segment) => segment === '**');
}

function normalizePattern(pattern: string): string {
  let normalized = pattern.trim();
  while (normalized.startsWith('./')) {
    normalized = normalized.slice(2);
  }
  return normalized;
}

/**
 * Check whether a single pattern matches the given path
 */
export function matches(pattern: string, filePath: string): boolean {
  const normalizedPattern = normalizePattern(pattern);
  if (normalizedPattern === '') {
    return false;
  }
  if (isGlobstarOnly(normalizedPattern)) {
    return true;
  }

  const target = toMatchPath(filePath);
  if (target === '') {
    return false;
  }

  return minimatch(target, normalizedPattern, MATCH_OPTIONS);
}

/**
 * Check if a file path matches any of the glob patterns.
 * An empty pattern list never matches.
 */
export function matchesAny(patterns: readonly string[], filePath: string): boolean {
  return patterns.some((pattern) => matches(pattern, filePath));
}

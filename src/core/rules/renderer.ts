/**
 * Render a resolved document for output
 */

import type { ResolvedDocument } from './types.js';

export type OutputFormat = 'md' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['md', 'json'];

/**
 * Segments separated by a blank line, or by a space for an `inline` one,
 * with a trailing newline. An empty document renders as the empty string.
 */
export function renderMarkdown(document: ResolvedDocument): string {
  if (document.segments.length === 0) {
    return '';
  }
  const parts = document.segments.map((segment, index) => {
    if (index === 0) return segment.text;
    return (segment.inline ? ' ' : '\n\n') + segment.text;
  });
  return parts.join('') + '\n';
}

export function renderJson(document: ResolvedDocument): string {
  const payload = {
    targetPath: document.targetPath,
    rules: document.rules,
    segments: document.segments.map(({ source, text }) => ({ source, text })),
    warnings: document.warnings,
  };
  return JSON.stringify(payload, null, 2) + '\n';
}

export function renderDocument(document: ResolvedDocument, format: OutputFormat): string {
  return format === 'json' ? renderJson(document) : renderMarkdown(document);
}

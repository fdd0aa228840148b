/**
 * Rules Parser - Parse rule files into header metadata and body segments
 *
 * Uses gray-matter for the YAML header and a fixed zod schema for its
 * recognized keys (description, globs, alwaysApply).
 *
 * Example rule file:
 * ---
 * description: API conventions
 * globs:
 *   - "src/api/**\/*.ts"
 * alwaysApply: false
 * ---
 *
 * Validate every request body. @rule:error-handling
 *
 * References inside the body:
 * - @rule:<name>                  inline token naming a rule by file stem
 * - [label](mdc:path/to/name.mdc) editor link to another rule file
 * Tokens inside fenced code blocks and inline code spans are left as
 * literal text.
 */

import * as path from 'path';
import matter from 'gray-matter';
import { z } from 'zod';
import type { BodySegment } from './types.js';
import { ParseError } from './errors.js';
import { stripExtension } from '../../base/utils/path-utils.js';

export const RECOGNIZED_HEADER_KEYS: readonly string[] = ['description', 'globs', 'alwaysApply'];

const GlobEntrySchema = z
  .string({ invalid_type_error: 'entries must be strings' })
  .trim()
  .min(1, 'entries must be non-empty strings');

/**
 * Rule header schema. Empty values (`globs:` with nothing after it) parse
 * as null and mean "not set".
 */
export const RuleHeaderSchema = z.object({
  description: z.string({ invalid_type_error: 'must be a string' }).nullish(),
  globs: z
    .union([z.string(), z.array(GlobEntrySchema)], {
      errorMap: () => ({ message: 'must be a list of strings or a comma-separated string' }),
    })
    .nullish(),
  alwaysApply: z.boolean({ invalid_type_error: 'must be true or false' }).nullish(),
});

export type RuleHeader = z.infer<typeof RuleHeaderSchema>;

export interface ParsedRuleFile {
  description?: string;
  globs: string[];
  alwaysApply: boolean;
  body: BodySegment[];
  /** Header keys that were present but not recognized */
  unknownKeys: string[];
}

const OPENING_LINE = /^---([^\r\n]*)(?:\r?\n|$)/;
const CLOSING_DELIMITER = /^---[ \t]*\r?$/m;
const BARE_GLOB_LINE = /^(globs:[ \t]*)(\*[^\r\n]*)/gm;

function rejectEngine(): object {
  throw new Error('only YAML headers are supported');
}

const HEADER_ENGINES = { js: rejectEngine, javascript: rejectEngine };

/**
 * Parse a rule file's header and body
 *
 * @param ruleName Name used in error messages
 * @param filePath Path used in error messages
 * @param extensions Rule extensions, used to recognize `mdc:` links to rules
 */
export function parseRuleFile(
  fileContent: string,
  ruleName: string,
  filePath: string,
  extensions: readonly string[]
): ParsedRuleFile {
  let raw = fileContent.replace(/^\uFEFF/, '');

  // `---js` would select gray-matter's eval-based engine
  const opening = OPENING_LINE.exec(raw);
  if (opening && !opening[1].startsWith('-')) {
    const language = opening[1].trim();
    if (language !== '' && language !== 'yaml') {
      throw new ParseError(ruleName, filePath, `unsupported header language "${language}"`);
    }
    const afterOpening = raw.slice(opening[0].length);
    const closing = CLOSING_DELIMITER.exec(afterOpening);
    if (!closing) {
      throw new ParseError(ruleName, filePath, 'missing closing --- delimiter');
    }
    const header = afterOpening.slice(0, closing.index);
    raw = opening[0] + quoteBareGlobs(header) + afterOpening.slice(closing.index);
  }

  let data: unknown;
  let content: string;
  try {
    // Passing options disables gray-matter's input cache
    const parsed = matter(raw, { language: 'yaml', engines: HEADER_ENGINES });
    data = parsed.data ?? {};
    content = parsed.content;
  } catch (error) {
    const detail = error instanceof Error ? error.message.split('\n')[0] : String(error);
    throw new ParseError(ruleName, filePath, `malformed YAML: ${detail}`, error);
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new ParseError(ruleName, filePath, 'header must be a key/value mapping');
  }

  const result = RuleHeaderSchema.safeParse(data);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => {
        const key = issue.path.join('.');
        return key ? `${key}: ${issue.message}` : issue.message;
      })
      .join('; ');
    throw new ParseError(ruleName, filePath, detail, result.error);
  }

  const header = result.data;
  const unknownKeys = Object.keys(data).filter((key) => !RECOGNIZED_HEADER_KEYS.includes(key));
  const description = header.description?.trim();

  return {
    description: description ? description : undefined,
    globs: normalizeGlobs(header.globs),
    alwaysApply: header.alwaysApply ?? false,
    body: parseBody(content.trim(), extensions),
    unknownKeys,
  };
}

/**
 * Editors write `globs: **\/*.ts` unquoted, which YAML reads as an alias.
 * Quote such values before parsing.
 */
function quoteBareGlobs(header: string): string {
  return header.replace(BARE_GLOB_LINE, (_line, key: string, value: string) => {
    return `${key}'${value.trimEnd().replace(/'/g, "''")}'`;
  });
}

function normalizeGlobs(globs: RuleHeader['globs']): string[] {
  if (globs === null || globs === undefined) {
    return [];
  }
  if (Array.isArray(globs)) {
    return globs;
  }
  return splitGlobList(globs);
}

/**
 * Split a comma-separated glob string, keeping commas inside `{a,b}` intact
 */
export function splitGlobList(value: string): string[] {
  const globs: string[] = [];
  let depth = 0;
  let current = '';

  for (const char of value) {
    if (char === '{') depth++;
    if (char === '}' && depth > 0) depth--;

    if (char === ',' && depth === 0) {
      globs.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  globs.push(current);

  return globs.map((glob) => glob.trim()).filter((glob) => glob.length > 0);
}

// =============================================================================
// Body segmentation
// =============================================================================

/** A backtick run up to the next run of the same length, within one paragraph */
const CODE_SPAN = /(?<!`)(`+)(?!`)(?:(?!\n[ \t]*\n)[\s\S])*?(?<!`)\1(?!`)/;
const RULE_TOKEN = /(?<![\w@])@rule:([A-Za-z0-9_-]+(?:\.[A-Za-z0-9_-]+)*)/;
const MDC_LINK = /\[[^\]\n]*\]\(mdc:([^)\s]+)\)/;

// Code spans come first so that tokens inside them are consumed as literal text
const REFERENCE_PATTERN = new RegExp(
  [CODE_SPAN.source, RULE_TOKEN.source, MDC_LINK.source].join('|'),
  'g'
);

const FENCE_PATTERN = /^ {0,3}(`{3,}|~{3,})/;

interface BodyChunk {
  text: string;
  fenced: boolean;
}

/**
 * Split body text into fenced code blocks and everything else
 */
function splitFences(body: string): BodyChunk[] {
  const chunks: BodyChunk[] = [];
  let current = '';
  let fence: string | null = null;

  for (const line of body.split(/(?<=\n)/)) {
    const marker = FENCE_PATTERN.exec(line)?.[1];

    if (fence === null) {
      if (marker) {
        if (current) chunks.push({ text: current, fenced: false });
        current = line;
        fence = marker;
      } else {
        current += line;
      }
      continue;
    }

    current += line;
    const closes =
      marker !== undefined &&
      marker[0] === fence[0] &&
      marker.length >= fence.length &&
      line.trim() === marker;
    if (closes) {
      chunks.push({ text: current, fenced: true });
      current = '';
      fence = null;
    }
  }

  if (current) {
    chunks.push({ text: current, fenced: fence !== null });
  }
  return chunks;
}

/**
 * Split a rule body into literal text and references to other rules
 */
export function parseBody(body: string, extensions: readonly string[]): BodySegment[] {
  const segments: BodySegment[] = [];

  const pushText = (text: string) => {
    if (!text) return;
    const last = segments[segments.length - 1];
    if (last?.kind === 'text') {
      last.text += text;
    } else {
      segments.push({ kind: 'text', text });
    }
  };

  for (const chunk of splitFences(body)) {
    if (chunk.fenced) {
      pushText(chunk.text);
      continue;
    }

    let cursor = 0;
    for (const match of chunk.text.matchAll(REFERENCE_PATTERN)) {
      if (match[1] !== undefined) {
        continue;
      }
      const index = match.index ?? 0;
      const name = match[2] ?? referencedRuleName(match[3], extensions);
      if (!name) {
        continue;
      }
      pushText(chunk.text.slice(cursor, index));
      segments.push({ kind: 'reference', name, token: match[0] });
      cursor = index + match[0].length;
    }
    pushText(chunk.text.slice(cursor));
  }

  return segments;
}

/**
 * Rule name for an `mdc:` link target, or null when it points at a non-rule file
 */
function referencedRuleName(
  target: string | undefined,
  extensions: readonly string[]
): string | null {
  if (!target) return null;
  return stripExtension(path.posix.basename(target.replace(/\\/g, '/')), extensions);
}

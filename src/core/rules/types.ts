/**
 * Rule System Types
 *
 * A rule document is a named unit of guidance text with selection metadata.
 * Rules live in a directory tree (one file per rule, name = file stem) plus
 * an optional root document that always applies.
 *
 * Example rule file (.cursor/rules/react.mdc):
 * ---
 * description: React component conventions
 * globs:
 *   - "**\/*.tsx"
 * alwaysApply: false
 * ---
 *
 * Prefer function components. @rule:typescript
 */

export interface TextSegment {
  kind: 'text';
  text: string;
}

export interface ReferenceSegment {
  kind: 'reference';
  /** Name of the referenced rule (a file stem) */
  name: string;
  /** Token exactly as written in the body */
  token: string;
}

export type BodySegment = TextSegment | ReferenceSegment;

export type RuleSourceKind = 'directory' | 'root-document';

export interface RuleSource {
  /** Absolute path of the file the rule was loaded from */
  path: string;
  kind: RuleSourceKind;
}

export interface RuleDocument {
  name: string;
  description?: string;
  globs: string[];
  alwaysApply: boolean;
  body: BodySegment[];
  source: RuleSource;
}

/**
 * A piece of literal text together with the rule that contributed it
 */
export interface ResolvedSegment {
  source: string;
  text: string;
  /** Continues the previous segment's line, as with a mid-sentence reference */
  inline?: boolean;
}

export interface ResolvedDocument {
  targetPath: string;
  /** Selected rule names in selection order */
  rules: string[];
  segments: ResolvedSegment[];
  warnings: string[];
}

export interface RuleStoreOptions {
  /** Recognized rule file extensions, including the dot */
  extensions?: string[];
  /** Optional always-apply document outside the rules directory */
  rootDocument?: string;
  /** Treat unreachable rules as load errors instead of warnings */
  strict?: boolean;
}

export const DEFAULT_RULE_EXTENSIONS: readonly string[] = ['.mdc', '.md'];

export const DEFAULT_RULES_DIR = '.cursor/rules';

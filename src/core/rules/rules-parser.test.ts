/**
 * Rules Parser Tests
 */

import { describe, it, expect } from '@jest/globals';
import { parseRuleFile, parseBody, splitGlobList } from './rules-parser.js';
import { ParseError } from './errors.js';

const EXTENSIONS = ['.mdc', '.md'];

function parse(content: string) {
  return parseRuleFile(content, 'sample', '/rules/sample.mdc', EXTENSIONS);
}

describe('Rules Parser', () => {
  describe('parseRuleFile', () => {
    it('should parse description, globs and alwaysApply', () => {
      const result = parse(`---
description: API conventions
globs:
  - "src/api/**/*.ts"
  - "lib/**/*.ts"
alwaysApply: false
---

# API

Validate every request body.`);

      expect(result.description).toBe('API conventions');
      expect(result.globs).toEqual(['src/api/**/*.ts', 'lib/**/*.ts']);
      expect(result.alwaysApply).toBe(false);
      expect(result.body).toEqual([{ kind: 'text', text: '# API\n\nValidate every request body.' }]);
      expect(result.unknownKeys).toEqual([]);
    });

    it('should treat a file without a header as an empty header', () => {
      const result = parse('# Plain\n\nJust text.');

      expect(result.description).toBeUndefined();
      expect(result.globs).toEqual([]);
      expect(result.alwaysApply).toBe(false);
      expect(result.body).toEqual([{ kind: 'text', text: '# Plain\n\nJust text.' }]);
    });

    it('should treat empty values as not set', () => {
      const result = parse(`---
description:
globs:
alwaysApply:
---
Body`);

      expect(result.description).toBeUndefined();
      expect(result.globs).toEqual([]);
      expect(result.alwaysApply).toBe(false);
    });

    it('should split a comma-separated globs string', () => {
      const result = parse(`---
globs: "src/**/*.ts, test/**/*.ts"
---
Body`);

      expect(result.globs).toEqual(['src/**/*.ts', 'test/**/*.ts']);
    });

    it('should accept unquoted globs starting with a star', () => {
      const result = parse(`---
globs: **/*.tsx, **/*.jsx
alwaysApply: false
---
Body`);

      expect(result.globs).toEqual(['**/*.tsx', '**/*.jsx']);
    });

    it('should trim glob entries', () => {
      const result = parse(`---
globs:
  - "  src/**  "
---
Body`);

      expect(result.globs).toEqual(['src/**']);
    });

    it('should report unknown header keys without failing', () => {
      const result = parse(`---
title: Extra
priority: 3
alwaysApply: true
---
Body`);

      expect(result.alwaysApply).toBe(true);
      expect(result.unknownKeys).toEqual(['title', 'priority']);
    });

    it('should strip a byte order mark', () => {
      const result = parse('\uFEFF---\nalwaysApply: true\n---\nBody');

      expect(result.alwaysApply).toBe(true);
      expect(result.body).toEqual([{ kind: 'text', text: 'Body' }]);
    });

    it('should handle CRLF line endings', () => {
      const result = parse('---\r\ndescription: Windows\r\nalwaysApply: true\r\n---\r\nBody\r\n');

      expect(result.description).toBe('Windows');
      expect(result.alwaysApply).toBe(true);
    });

    it('should fail when the closing delimiter is missing', () => {
      expect(() => parse('---\ndescription: Broken\n\nBody')).toThrow(
        'Invalid header in rule "sample" (/rules/sample.mdc): missing closing --- delimiter'
      );
    });

    it('should fail when alwaysApply is not a boolean', () => {
      expect(() => parse('---\nalwaysApply: "yes"\n---\nBody')).toThrow(
        'Invalid header in rule "sample" (/rules/sample.mdc): alwaysApply: must be true or false'
      );
    });

    it('should fail when globs has the wrong shape', () => {
      expect(() => parse('---\nglobs: 42\n---\nBody')).toThrow(
        'globs: must be a list of strings or a comma-separated string'
      );
    });

    it('should fail when a glob entry is empty', () => {
      expect(() => parse('---\nglobs:\n  - "  "\n---\nBody')).toThrow(ParseError);
    });

    it('should fail on malformed YAML', () => {
      let caught: unknown;
      try {
        parse('---\nglobs: [unclosed\n---\nBody');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ParseError);
      expect(caught).toMatchObject({ code: 'PARSE_ERROR', ruleName: 'sample' });
      expect(String(caught)).toContain('malformed YAML');
    });

    it('should fail when the header is not a mapping', () => {
      expect(() => parse('---\n- a\n- b\n---\nBody')).toThrow('header must be a key/value mapping');
    });

    it('should accept a header opener that names yaml', () => {
      const result = parse('---yaml\nalwaysApply: true\n---\nBody');

      expect(result.alwaysApply).toBe(true);
      expect(result.body).toEqual([{ kind: 'text', text: 'Body' }]);
    });

    it('should reject a JavaScript header without evaluating it', () => {
      const header = "{ description: (globalThis.rulesmithHeaderRan = true, 'x'), alwaysApply: true }";

      for (const language of ['js', 'javascript']) {
        const content = `---${language}\n${header}\n---\nBody`;
        expect(() => parse(content)).toThrow(ParseError);
        expect(() => parse(content)).toThrow(
          `Invalid header in rule "sample" (/rules/sample.mdc): unsupported header language "${language}"`
        );
      }
      expect('rulesmithHeaderRan' in globalThis).toBe(false);
    });
  });

  describe('splitGlobList', () => {
    it('should keep commas inside braces', () => {
      expect(splitGlobList('src/**/*.{ts,tsx}, docs/*.md')).toEqual([
        'src/**/*.{ts,tsx}',
        'docs/*.md',
      ]);
    });

    it('should drop empty entries', () => {
      expect(splitGlobList(' , a ,, b ,')).toEqual(['a', 'b']);
    });
  });

  describe('parseBody', () => {
    it('should split inline rule references', () => {
      expect(parseBody('Before @rule:base after.', EXTENSIONS)).toEqual([
        { kind: 'text', text: 'Before ' },
        { kind: 'reference', name: 'base', token: '@rule:base' },
        { kind: 'text', text: ' after.' },
      ]);
    });

    it('should recognize mdc links to rule files', () => {
      expect(parseBody('See [styles](mdc:.cursor/rules/style.mdc).', EXTENSIONS)).toEqual([
        { kind: 'text', text: 'See ' },
        {
          kind: 'reference',
          name: 'style',
          token: '[styles](mdc:.cursor/rules/style.mdc)',
        },
        { kind: 'text', text: '.' },
      ]);
    });

    it('should leave mdc links to non-rule files as text', () => {
      const text = 'Open [config](mdc:package.json) first.';
      expect(parseBody(text, EXTENSIONS)).toEqual([{ kind: 'text', text }]);
    });

    it('should not treat email-like text as a reference', () => {
      const text = 'Mail admin@rule:x or foo@@rule:y';
      expect(parseBody(text, EXTENSIONS)).toEqual([{ kind: 'text', text }]);
    });

    it('should keep references inside fenced code blocks literal', () => {
      const text = 'Intro @rule:a\n```md\n@rule:b\n```\nOutro';
      expect(parseBody(text, EXTENSIONS)).toEqual([
        { kind: 'text', text: 'Intro ' },
        { kind: 'reference', name: 'a', token: '@rule:a' },
        { kind: 'text', text: '\n```md\n@rule:b\n```\nOutro' },
      ]);
    });

    it('should keep an unterminated fence literal to the end', () => {
      const text = '~~~\n@rule:a\n';
      expect(parseBody(text, EXTENSIONS)).toEqual([{ kind: 'text', text }]);
    });

    it('should keep references inside inline code spans literal', () => {
      const text = 'Write `@rule:name` to include a rule.';
      expect(parseBody(text, EXTENSIONS)).toEqual([{ kind: 'text', text }]);
    });

    it('should match code spans by backtick run length', () => {
      expect(parseBody('Use ``a ` @rule:x`` and @rule:y', EXTENSIONS)).toEqual([
        { kind: 'text', text: 'Use ``a ` @rule:x`` and ' },
        { kind: 'reference', name: 'y', token: '@rule:y' },
      ]);
    });

    it('should resolve a reference after an unmatched backtick', () => {
      expect(parseBody('A stray ` then @rule:z', EXTENSIONS)).toEqual([
        { kind: 'text', text: 'A stray ` then ' },
        { kind: 'reference', name: 'z', token: '@rule:z' },
      ]);
    });

    it('should return no segments for an empty body', () => {
      expect(parseBody('', EXTENSIONS)).toEqual([]);
    });
  });
});

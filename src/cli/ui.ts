/**
 * CLI UI - Terminal formatting for rulesmith output
 *
 * Every function returns a string; the caller decides which stream it goes to.
 */

import chalk from 'chalk';
import type { Selection } from '../core/rules/selector.js';
import type { CheckResult } from '../core/rules/engine.js';
import type { RuleDocument } from '../core/rules/types.js';
import type { ResolvedConfig, Settings } from '../base/config/index.js';
import { RulesmithError, CycleError, LoadError, errorMessage } from '../core/rules/errors.js';

// ============================================================================
// Colors & Styles
// ============================================================================

export interface Palette {
  primary: (text: string) => string;
  secondary: (text: string) => string;
  success: (text: string) => string;
  error: (text: string) => string;
  warning: (text: string) => string;
  muted: (text: string) => string;
  highlight: (text: string) => string;
}

export function createPalette(enabled: boolean): Palette {
  const c = new chalk.Instance({ level: enabled ? chalk.level || 1 : 0 });
  return {
    primary: c.cyan,
    secondary: c.gray,
    success: c.green,
    error: c.red,
    warning: c.yellow,
    muted: c.dim,
    highlight: c.bold.white,
  };
}

// ============================================================================
// Messages
// ============================================================================

export function formatWarning(message: string, colors: Palette): string {
  return colors.warning('⚠ warning: ') + message;
}

export function formatError(error: unknown, colors: Palette): string {
  const lines = [colors.error('✗ Error: ') + errorMessage(error)];

  if (error instanceof CycleError) {
    lines.push(colors.muted(`  cycle: ${error.cycle.join(' -> ')}`));
  }
  if (error instanceof LoadError && error.filePath) {
    lines.push(colors.muted(`  file: ${error.filePath}`));
  }
  if (error instanceof RulesmithError) {
    lines.push(colors.muted(`  code: ${error.code}`));
  }

  return lines.join('\n');
}

// ============================================================================
// Rule listings
// ============================================================================

export function describeMode(rule: RuleDocument): string {
  if (rule.alwaysApply) return 'always';
  if (rule.globs.length === 0) return 'unreachable';
  return `globs: ${rule.globs.join(', ')}`;
}

export function formatRuleList(rules: readonly RuleDocument[], colors: Palette): string {
  if (rules.length === 0) {
    return colors.muted('No rules found.');
  }

  const width = Math.max(...rules.map((rule) => rule.name.length));
  return rules
    .map((rule) => {
      const mode = describeMode(rule);
      const modeText = mode === 'unreachable' ? colors.warning(mode) : colors.secondary(mode);
      const description = rule.description ? `  ${rule.description}` : '';
      return `${colors.highlight(rule.name.padEnd(width))}  ${modeText}${description}`;
    })
    .join('\n');
}

export function formatSelection(selections: readonly Selection[], colors: Palette): string {
  if (selections.length === 0) {
    return colors.muted('No rules selected.');
  }

  return selections
    .map(({ rule, reason }) => {
      const why = reason.kind === 'always' ? 'alwaysApply' : `matched ${reason.pattern}`;
      return `${colors.primary('▶')} ${colors.highlight(rule.name)} ${colors.muted(`(${why})`)}`;
    })
    .join('\n');
}

export function formatCheckResult(result: CheckResult, colors: Palette): string {
  const lines: string[] = [];

  for (const error of result.errors) {
    lines.push(formatError(error, colors));
  }
  for (const warning of result.warnings) {
    lines.push(formatWarning(warning, colors));
  }

  const summary = `${result.checked} rules checked, ${result.errors.length} errors, ${result.warnings.length} warnings`;
  lines.push(result.errors.length > 0 ? colors.error(summary) : colors.success(`✓ ${summary}`));

  return lines.join('\n');
}

export function formatConfig(
  config: ResolvedConfig,
  origins: Record<keyof Settings, string>,
  colors: Palette
): string {
  const rows: Array<[string, string, string]> = [
    ['cwd', config.cwd, ''],
    ['rulesDir', config.rulesDir, origins.rulesDir],
    ['rootDocument', config.rootDocument ?? '(none)', origins.rootDocument],
    ['extensions', config.extensions.join(', '), origins.extensions],
    ['strict', String(config.strict), origins.strict],
  ];

  const width = Math.max(...rows.map(([key]) => key.length));
  return rows
    .map(([key, value, origin]) => {
      const from = origin ? colors.muted(`  [${origin}]`) : '';
      return `${colors.highlight(key.padEnd(width))}  ${value}${from}`;
    })
    .join('\n');
}

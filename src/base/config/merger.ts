/**
 * Configuration Merger - Merge settings from multiple sources
 *
 * Sources are applied lowest priority first. A value set by a later source
 * replaces the earlier one; `extensions` is replaced as a whole, never
 * concatenated.
 */

import type { ConfigSource, Settings } from './types.js';

/**
 * Overlay one settings object on another, skipping unset values
 */
export function overlaySettings(base: Settings, override: Settings): Settings {
  const result: Settings = { ...base };

  if (override.rulesDir !== undefined) result.rulesDir = override.rulesDir;
  if (override.rootDocument !== undefined) result.rootDocument = override.rootDocument;
  if (override.extensions !== undefined) result.extensions = [...override.extensions];
  if (override.strict !== undefined) result.strict = override.strict;

  return result;
}

export function mergeSettings(sources: ConfigSource[]): Settings {
  let merged: Settings = {};

  for (const source of sources) {
    merged = overlaySettings(merged, source.settings);
  }

  return merged;
}

/**
 * Describe which source set each effective value (shown by `rulesmith config`)
 */
export function createMergeSummary(sources: ConfigSource[]): Record<keyof Settings, string> {
  const summary: Record<keyof Settings, string> = {
    rulesDir: 'default',
    rootDocument: 'default',
    extensions: 'default',
    strict: 'default',
  };

  for (const source of sources) {
    const origin = source.path ? `${source.level} (${source.path})` : source.level;
    if (source.settings.rulesDir !== undefined) summary.rulesDir = origin;
    if (source.settings.rootDocument !== undefined) summary.rootDocument = origin;
    if (source.settings.extensions !== undefined) summary.extensions = origin;
    if (source.settings.strict !== undefined) summary.strict = origin;
  }

  return summary;
}

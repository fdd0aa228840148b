/**
 * Rule Errors
 *
 * LoadError        - store construction failed (no partial store exists)
 *   ParseError, DuplicateNameError, UnreachableRuleError
 * ResolutionError  - a single query failed (the store stays usable)
 *   ReferenceError > MissingReferenceError, CycleError
 *   EngineNotLoadedError
 */

export type RulesmithErrorCode =
  | 'LOAD_FAILED'
  | 'PARSE_ERROR'
  | 'DUPLICATE_NAME'
  | 'UNREACHABLE_RULE'
  | 'RESOLUTION_FAILED'
  | 'REFERENCE_ERROR'
  | 'MISSING_REFERENCE'
  | 'REFERENCE_CYCLE'
  | 'ENGINE_NOT_LOADED'
  | 'CONFIG_ERROR';

export class RulesmithError extends Error {
  readonly code: RulesmithErrorCode;

  constructor(code: RulesmithErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// =============================================================================
// Load errors
// =============================================================================

export class LoadError extends RulesmithError {
  /** File that caused the failure, when one is known */
  readonly filePath?: string;

  constructor(
    message: string,
    options: { filePath?: string; cause?: unknown; code?: RulesmithErrorCode } = {}
  ) {
    super(options.code ?? 'LOAD_FAILED', message, { cause: options.cause });
    this.filePath = options.filePath;
  }
}

export class ParseError extends LoadError {
  readonly ruleName: string;

  constructor(ruleName: string, filePath: string, detail: string, cause?: unknown) {
    super(`Invalid header in rule "${ruleName}" (${filePath}): ${detail}`, {
      filePath,
      cause,
      code: 'PARSE_ERROR',
    });
    this.ruleName = ruleName;
  }
}

export class DuplicateNameError extends LoadError {
  readonly ruleName: string;
  readonly paths: [string, string];

  constructor(ruleName: string, firstPath: string, secondPath: string) {
    super(`Duplicate rule name "${ruleName}": ${firstPath} and ${secondPath}`, {
      filePath: secondPath,
      code: 'DUPLICATE_NAME',
    });
    this.ruleName = ruleName;
    this.paths = [firstPath, secondPath];
  }
}

/**
 * Raised in strict mode for a rule that no query can ever select
 */
export class UnreachableRuleError extends LoadError {
  readonly ruleName: string;

  constructor(ruleName: string, filePath: string) {
    super(`Rule "${ruleName}" has no globs and alwaysApply is false (${filePath})`, {
      filePath,
      code: 'UNREACHABLE_RULE',
    });
    this.ruleName = ruleName;
  }
}

// =============================================================================
// Resolution errors
// =============================================================================

export class ResolutionError extends RulesmithError {
  constructor(message: string, code: RulesmithErrorCode = 'RESOLUTION_FAILED') {
    super(code, message);
  }
}

export class ReferenceError extends ResolutionError {
  /** Rule whose body holds the failing reference */
  readonly ruleName: string;

  constructor(ruleName: string, message: string, code: RulesmithErrorCode = 'REFERENCE_ERROR') {
    super(message, code);
    this.ruleName = ruleName;
  }
}

export class MissingReferenceError extends ReferenceError {
  readonly missingName: string;

  constructor(ruleName: string, missingName: string) {
    super(
      ruleName,
      `Rule "${ruleName}" references unknown rule "${missingName}"`,
      'MISSING_REFERENCE'
    );
    this.missingName = missingName;
  }
}

export class CycleError extends ReferenceError {
  /** Rule names along the cycle, ending where it started: ['a', 'b', 'a'] */
  readonly cycle: string[];

  constructor(cycle: string[]) {
    const start = cycle[0] ?? '';
    super(start, `Reference cycle detected: ${cycle.join(' -> ')}`, 'REFERENCE_CYCLE');
    this.cycle = cycle;
  }
}

export class EngineNotLoadedError extends ResolutionError {
  constructor() {
    super('Rule store has not been loaded; call load() first', 'ENGINE_NOT_LOADED');
  }
}

// =============================================================================
// Configuration errors
// =============================================================================

export class ConfigError extends RulesmithError {
  readonly filePath?: string;

  constructor(message: string, filePath?: string, cause?: unknown) {
    super('CONFIG_ERROR', message, { cause });
    this.filePath = filePath;
  }
}

/**
 * Format an unknown thrown value for display
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

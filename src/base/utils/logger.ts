/**
 * Structured logging for rulesmith
 *
 * Lines read `[time] component:level - message [key="value"]` and go to
 * stderr; stdout is reserved for rendered documents.
 */

import { debugLevel, type DebugComponent, type DebugLevel } from './debug.js';

export interface LogContext {
  [key: string]: unknown;
}

export function formatContext(context: LogContext): string {
  const entries = Object.entries(context);
  if (entries.length === 0) {
    return '';
  }

  const formatted = entries
    .map(([key, value]) => {
      if (typeof value === 'string') {
        return `${key}="${value}"`;
      }
      if (typeof value === 'object' && value !== null) {
        return `${key}=${JSON.stringify(value)}`;
      }
      return `${key}=${String(value)}`;
    })
    .join(' ');

  return ` [${formatted}]`;
}

export function formatLogLine(
  component: DebugComponent,
  label: 'error' | 'debug',
  message: string,
  context?: LogContext
): string {
  const contextStr = context ? formatContext(context) : '';
  return `[${new Date().toISOString()}] ${component}:${label} - ${message}${contextStr}`;
}

function writeDebug(
  minimum: DebugLevel,
  component: DebugComponent,
  message: string,
  context?: LogContext
): void {
  if (debugLevel(component) >= minimum) {
    console.error(formatLogLine(component, 'debug', message, context));
  }
}

export const logger = {
  /** Written regardless of debug settings */
  error: (component: DebugComponent, message: string, context?: LogContext) =>
    console.error(formatLogLine(component, 'error', message, context)),

  /** Written when the component's debug level is 1 or more */
  debug: (component: DebugComponent, message: string, context?: LogContext) =>
    writeDebug(1, component, message, context),

  /** Written only at debug level 2 */
  verbose: (component: DebugComponent, message: string, context?: LogContext) =>
    writeDebug(2, component, message, context),
};

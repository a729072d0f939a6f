/**
 * Structured logging module
 * Provides consistent logging across the merger, the extractor and the CLI
 *
 * Every level is written to stderr: stdout carries merged documents only.
 */

import { isDebugEnabled, type DebugComponent } from './debug.js';

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

export interface LogContext {
  [key: string]: unknown;
}

/**
 * Format context object for readable output
 */
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
      if (value === undefined || value === null) {
        return `${key}=${value}`;
      }
      if (typeof value === 'object') {
        return `${key}=${JSON.stringify(value)}`;
      }
      return `${key}=${String(value)}`;
    })
    .join(' ');

  return ` [${formatted}]`;
}

function toDebugComponent(component: string): DebugComponent | null {
  const key = component.toLowerCase();
  return key === 'merger' || key === 'extractor' || key === 'cli' ? key : null;
}

function debugEnabledFor(component: string): boolean {
  const debugComponent = toDebugComponent(component);
  return debugComponent ? isDebugEnabled(debugComponent) : isDebugEnabled('cli');
}

/**
 * Log a message with structured context
 *
 * @param component - Component name (e.g., 'Merger', 'Extractor', 'CLI')
 */
export function log(
  level: LogLevel,
  component: string,
  message: string,
  context?: LogContext
): void {
  if (level === LogLevel.DEBUG && !debugEnabledFor(component)) {
    return;
  }

  const timestamp = new Date().toISOString();
  const contextStr = context ? formatContext(context) : '';
  console.error(`[${timestamp}] ${component}:${level} - ${message}${contextStr}`);
}

/**
 * Convenience functions for each log level
 */
export const logger = {
  error: (component: string, message: string, context?: LogContext) =>
    log(LogLevel.ERROR, component, message, context),

  warn: (component: string, message: string, context?: LogContext) =>
    log(LogLevel.WARN, component, message, context),

  info: (component: string, message: string, context?: LogContext) =>
    log(LogLevel.INFO, component, message, context),

  debug: (component: string, message: string, context?: LogContext) =>
    log(LogLevel.DEBUG, component, message, context),
};

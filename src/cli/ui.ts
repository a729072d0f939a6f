/**
 * CLI UI - Colored status lines for both commands
 */

import chalk from 'chalk';

// ============================================================================
// Colors & Styles
// ============================================================================

export const colors = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.blue,
  muted: chalk.dim,
  highlight: chalk.bold.white,
};

// ============================================================================
// Streams
// ============================================================================

/**
 * Line-oriented output sinks. stdout carries data (merged documents),
 * stderr carries status and errors.
 */
export interface CliStreams {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export const processStreams: CliStreams = {
  stdout: (line) => {
    process.stdout.write(`${line}\n`);
  },
  stderr: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

// ============================================================================
// Messages
// ============================================================================

export function formatError(message: string): string {
  return colors.error('Error: ') + message;
}

export function formatWarning(message: string): string {
  return colors.warning('Warning: ') + message;
}

export function formatSuccess(message: string): string {
  return colors.success('✓ ') + message;
}

export function formatInfo(message: string): string {
  return colors.info('ℹ ') + message;
}

export function formatSeparator(width = 50): string {
  return colors.muted('-'.repeat(width));
}

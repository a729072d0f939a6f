/**
 * Pattern Parser - Pull command patterns out of markdown bullet lists
 *
 * Example catalog:
 *
 * # GitHub pull requests
 * * Allow listing PRs: `Bash(gh pr list:*)`
 * - `Bash(gh pr view:*)`
 *
 * Only `*` and `-` bullets count, and only the first backtick span of each.
 */

import type { CategoryDocument } from '../base/config/types.js';

const BULLET_PATTERN = /^[*-]\s/;
const QUOTED_SPAN_PATTERN = /`([^`]*)`/g;

/**
 * Extract the pattern from one line, or null when the line is not a bullet
 * or has no backtick span
 */
export function extractPattern(line: string): string | null {
  const trimmed = line.trimStart();
  if (!BULLET_PATTERN.test(trimmed)) {
    return null;
  }

  // Backticks pair up left to right; an empty pair is skipped
  for (const match of trimmed.matchAll(QUOTED_SPAN_PATTERN)) {
    if (match[1]) {
      return match[1];
    }
  }
  return null;
}

/**
 * Extract patterns in line order. Repeats are kept.
 */
export function extractPatterns(input: string | readonly string[]): string[] {
  const lines = typeof input === 'string' ? input.split(/\r?\n/) : input;
  const patterns: string[] = [];

  for (const line of lines) {
    const pattern = extractPattern(line);
    if (pattern !== null) {
      patterns.push(pattern);
    }
  }

  return patterns;
}

export function toCategoryDocument(patterns: readonly string[]): CategoryDocument {
  return { permissions: { allow: [...patterns] } };
}

/**
 * Settings Loader - Resolve input expressions and read settings documents
 *
 * Files are resolved and read strictly in argument order: the first file
 * supplies the extra settings and the first-seen order of every pattern.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import fastGlob from 'fast-glob';
import { SettingsError, getErrorCode, getErrorMessage } from '../base/utils/errors.js';
import { logger } from '../base/utils/logger.js';
import {
  SettingsDocumentSchema,
  isSettingsDocument,
  validateConfig,
} from '../base/config/schema.js';
import type { LoadedSettings, SettingsDocument } from '../base/config/types.js';

export interface ResolveOptions {
  /** Directory that relative paths and glob expressions are resolved against */
  cwd?: string;
}

/**
 * Expand glob expressions and drop repeated files, keeping first position.
 *
 * Literal paths are returned as given (existence is checked when loading);
 * glob matches are returned relative to `cwd`, sorted.
 */
export async function resolveInputFiles(
  expressions: readonly string[],
  options: ResolveOptions = {}
): Promise<string[]> {
  const cwd = options.cwd ?? process.cwd();

  if (expressions.length === 0) {
    throw new SettingsError('EMPTY_INPUT_LIST', 'No files to merge');
  }

  const expanded: string[] = [];
  for (const expression of expressions) {
    if (!fastGlob.isDynamicPattern(expression)) {
      expanded.push(expression);
      continue;
    }

    const matches = await fastGlob(expression, { cwd, onlyFiles: true });
    if (matches.length === 0) {
      throw new SettingsError(
        'NO_MATCHING_FILES',
        `No files match pattern '${expression}'`,
        expression
      );
    }

    logger.debug('Merger', 'Expanded glob expression', { expression, matches: matches.length });
    expanded.push(...matches.sort());
  }

  const seen = new Set<string>();
  const unique: string[] = [];
  for (const file of expanded) {
    const key = path.resolve(cwd, file);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(file);
    }
  }

  if (unique.length === 0) {
    throw new SettingsError('NO_MATCHING_FILES', 'No files to merge');
  }

  return unique;
}

/**
 * Load and validate a single settings document
 */
export async function loadSettingsFile(
  filePath: string,
  options: ResolveOptions = {}
): Promise<SettingsDocument> {
  const absolutePath = path.resolve(options.cwd ?? process.cwd(), filePath);

  let content: string;
  try {
    content = await fs.readFile(absolutePath, 'utf-8');
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      throw new SettingsError('FILE_NOT_FOUND', `File '${filePath}' not found`, filePath, error);
    }
    throw new SettingsError(
      'READ_FAILED',
      `Error reading '${filePath}': ${getErrorMessage(error)}`,
      filePath,
      error
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new SettingsError(
      'INVALID_JSON',
      `Invalid JSON in '${filePath}': ${getErrorMessage(error)}`,
      filePath,
      error
    );
  }

  // Return the parsed value itself; zod's output moves declared keys first
  const result = validateConfig(SettingsDocumentSchema, data, filePath);
  if (!result.valid || !isSettingsDocument(data)) {
    throw new SettingsError(
      'INVALID_SETTINGS',
      `Invalid settings in '${filePath}': ${(result.errors ?? []).join('; ')}`,
      filePath
    );
  }

  return data;
}

/**
 * Load every file in order. The first failure aborts the whole load.
 */
export async function loadSettingsFiles(
  files: readonly string[],
  options: ResolveOptions = {}
): Promise<LoadedSettings[]> {
  const loaded: LoadedSettings[] = [];
  for (const file of files) {
    loaded.push({ path: file, settings: await loadSettingsFile(file, options) });
  }
  return loaded;
}

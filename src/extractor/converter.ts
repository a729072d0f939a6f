/**
 * Catalog Converter - Turn markdown pattern catalogs into permission documents
 *
 * gh-pr.md -> gh-pr.json, one file per catalog. Each catalog is converted on
 * its own: a failure is recorded and the remaining catalogs still run.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import fastGlob from 'fast-glob';
import { getErrorMessage } from '../base/utils/errors.js';
import { logger } from '../base/utils/logger.js';
import { replaceExtension } from '../base/utils/path-utils.js';
import {
  DEFAULT_SOURCE_PREFIX,
  DEFAULT_SOURCE_SUFFIX,
  OUTPUT_EXTENSION,
} from '../base/config/types.js';
import { extractPatterns, toCategoryDocument } from './parser.js';

export interface ConversionResult {
  source: string;
  output: string;
  patterns: string[];
}

export interface ConversionFailure {
  source: string;
  error: string;
}

export interface ConvertAllOptions {
  /** Directory to scan (default: process.cwd()) */
  cwd?: string;
  prefix?: string;
  suffix?: string;
  /** Called after each successful conversion */
  onConverted?: (result: ConversionResult) => void;
}

export interface ConvertAllResult {
  sources: string[];
  converted: ConversionResult[];
  failed: ConversionFailure[];
}

export function outputPathFor(sourcePath: string): string {
  return replaceExtension(sourcePath, OUTPUT_EXTENSION);
}

/**
 * Convert one catalog and write its permission document beside it
 */
export async function convertFile(sourcePath: string): Promise<ConversionResult> {
  const content = await fs.readFile(sourcePath, 'utf-8');
  const patterns = extractPatterns(content);
  const output = outputPathFor(sourcePath);

  await fs.writeFile(output, `${JSON.stringify(toCategoryDocument(patterns), null, 2)}\n`, 'utf-8');
  logger.debug('Extractor', 'Converted catalog', { source: sourcePath, output, patterns: patterns.length });

  return { source: sourcePath, output, patterns };
}

/**
 * Find catalogs named `<prefix>*<suffix>` directly inside `cwd`, sorted by name
 */
export async function findCatalogs(
  cwd: string,
  prefix: string = DEFAULT_SOURCE_PREFIX,
  suffix: string = DEFAULT_SOURCE_SUFFIX
): Promise<string[]> {
  const pattern = `${fastGlob.escapePath(prefix)}*${fastGlob.escapePath(suffix)}`;
  const matches = await fastGlob(pattern, { cwd, onlyFiles: true, deep: 1 });
  return matches.sort().map((match) => path.join(cwd, match));
}

/**
 * Convert every catalog in a directory
 */
export async function convertAll(options: ConvertAllOptions = {}): Promise<ConvertAllResult> {
  const cwd = options.cwd ?? process.cwd();
  const sources = await findCatalogs(cwd, options.prefix, options.suffix);

  const converted: ConversionResult[] = [];
  const failed: ConversionFailure[] = [];

  for (const source of sources) {
    try {
      const result = await convertFile(source);
      converted.push(result);
      options.onConverted?.(result);
    } catch (error) {
      const message = getErrorMessage(error);
      logger.debug('Extractor', 'Skipped catalog', { source, error: message });
      failed.push({ source, error: message });
    }
  }

  return { sources, converted, failed };
}

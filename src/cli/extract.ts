/**
 * settings-extract - Convert markdown pattern catalogs into permission files
 */

import * as path from 'path';
import { ArgumentError } from '../base/utils/errors.js';
import type { ExtractOptions } from '../base/config/schema.js';
import { convertAll } from '../extractor/index.js';
import { extractUsage, parseExtractArgs } from './args.js';
import { EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE, type RunOptions } from './merge.js';
import {
  formatError,
  formatSeparator,
  formatSuccess,
  formatWarning,
  processStreams,
} from './ui.js';

/**
 * Run the extract command and return its exit status
 */
export async function runExtract(args: readonly string[], options: RunOptions = {}): Promise<number> {
  const streams = options.streams ?? processStreams;

  let parsed: ExtractOptions;
  try {
    parsed = parseExtractArgs(args);
  } catch (error) {
    if (error instanceof ArgumentError) {
      streams.stderr(formatError(error.message));
      streams.stderr(extractUsage());
      return EXIT_USAGE;
    }
    throw error;
  }

  if (parsed.help) {
    streams.stdout(extractUsage());
    return EXIT_SUCCESS;
  }

  const baseDir = options.cwd ?? process.cwd();
  const cwd = parsed.dir ? path.resolve(baseDir, parsed.dir) : baseDir;
  const namePattern = `${parsed.prefix}*${parsed.suffix}`;

  const result = await convertAll({
    cwd,
    prefix: parsed.prefix,
    suffix: parsed.suffix,
    onConverted: (converted) => {
      streams.stdout(
        `Created ${path.relative(cwd, converted.output)} with ${converted.patterns.length} patterns`
      );
    },
  });

  if (result.sources.length === 0) {
    streams.stdout(formatWarning(`No ${namePattern} files found in ${cwd}`));
    return EXIT_SUCCESS;
  }

  for (const failure of result.failed) {
    streams.stderr(formatError(`Error processing ${path.relative(cwd, failure.source)}: ${failure.error}`));
  }

  streams.stdout(formatSeparator());
  streams.stdout(formatSuccess(`Successfully created ${result.converted.length} JSON files`));

  return result.failed.length > 0 ? EXIT_FAILURE : EXIT_SUCCESS;
}

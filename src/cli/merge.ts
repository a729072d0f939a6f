/**
 * settings-merge - Merge permission lists from several settings files
 */

import * as path from 'path';
import { ArgumentError, SettingsError } from '../base/utils/errors.js';
import { logger } from '../base/utils/logger.js';
import { mergeFiles, serializeSettings, writeMergedSettings } from '../merger/index.js';
import { mergeUsage, parseMergeArgs } from './args.js';
import { formatError, formatInfo, formatSuccess, processStreams, type CliStreams } from './ui.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface RunOptions {
  streams?: CliStreams;
  cwd?: string;
}

/**
 * Run the merge command and return its exit status
 */
export async function runMerge(args: readonly string[], options: RunOptions = {}): Promise<number> {
  const streams = options.streams ?? processStreams;

  try {
    const parsed = parseMergeArgs(args);
    if (parsed.help) {
      streams.stdout(mergeUsage());
      return EXIT_SUCCESS;
    }

    logger.debug('CLI', 'Parsed merge options', { ...parsed });

    const { settings } = await mergeFiles(parsed.files, {
      cwd: options.cwd,
      onResolved: (files) => {
        streams.stderr(formatInfo(`Merging ${files.length} files...`));
      },
    });

    const content = serializeSettings(settings, {
      indent: parsed.indent,
      compact: parsed.compact,
    });

    if (!parsed.output) {
      streams.stdout(content);
      return EXIT_SUCCESS;
    }

    const written = await writeMergedSettings(content, resolveOutput(parsed.output, options.cwd), {
      backup: parsed.backup,
    });
    if (written.backupPath) {
      streams.stderr(formatInfo(`Created backup '${written.backupPath}'`));
    }
    streams.stderr(formatSuccess(`Successfully wrote merged settings to '${parsed.output}'`));
    return EXIT_SUCCESS;
  } catch (error) {
    if (error instanceof ArgumentError) {
      streams.stderr(formatError(error.message));
      streams.stderr(mergeUsage());
      return EXIT_USAGE;
    }
    if (error instanceof SettingsError) {
      streams.stderr(formatError(error.message));
      return EXIT_FAILURE;
    }
    throw error;
  }
}

function resolveOutput(output: string, cwd: string | undefined): string {
  return cwd ? path.resolve(cwd, output) : output;
}

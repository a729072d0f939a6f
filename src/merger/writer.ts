/**
 * Settings Writer - Serialize merged settings and write them to their destination
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { SettingsError, getErrorMessage } from '../base/utils/errors.js';
import { logger } from '../base/utils/logger.js';
import { findBackupPath, pathExists } from '../base/utils/path-utils.js';
import { DEFAULT_INDENT } from '../base/config/types.js';

export interface SerializeOptions {
  indent?: number;
  /** Overrides indent: no whitespace between tokens */
  compact?: boolean;
}

export interface WriteOptions {
  /** Copy an existing destination to a `.bak` file first (default: true) */
  backup?: boolean;
}

export interface WriteResult {
  path: string;
  backupPath?: string;
}

export function serializeSettings(settings: unknown, options: SerializeOptions = {}): string {
  if (options.compact) {
    return JSON.stringify(settings);
  }
  return JSON.stringify(settings, null, options.indent ?? DEFAULT_INDENT);
}

/**
 * Write serialized settings to a file, with a trailing newline.
 *
 * The backup copy is taken before the destination is touched, so a failed
 * backup leaves the existing file as it was.
 */
export async function writeMergedSettings(
  content: string,
  outputPath: string,
  options: WriteOptions = {}
): Promise<WriteResult> {
  const backup = options.backup ?? true;
  const result: WriteResult = { path: outputPath };

  try {
    await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });

    if (backup && (await pathExists(outputPath))) {
      const backupPath = await findBackupPath(outputPath);
      await fs.copyFile(outputPath, backupPath);
      result.backupPath = backupPath;
      logger.debug('Merger', 'Created backup', { path: outputPath, backup: backupPath });
    }

    await fs.writeFile(outputPath, `${content}\n`, 'utf-8');
  } catch (error) {
    throw new SettingsError(
      'UNWRITABLE_OUTPUT',
      `Cannot write output '${outputPath}': ${getErrorMessage(error)}`,
      outputPath,
      error
    );
  }

  return result;
}

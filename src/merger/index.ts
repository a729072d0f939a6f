/**
 * Settings Merger
 *
 * resolveInputFiles -> loadSettingsFiles -> mergeSettingsDocuments
 */

import { logger } from '../base/utils/logger.js';
import type { PermissionSet } from '../base/config/types.js';
import { loadSettingsFiles, resolveInputFiles, type ResolveOptions } from './loader.js';
import { mergeSettingsDocuments } from './merger.js';

export { mergePermissionLists, mergeSettingsDocuments } from './merger.js';
export { resolveInputFiles, loadSettingsFile, loadSettingsFiles } from './loader.js';
export type { ResolveOptions } from './loader.js';
export { serializeSettings, writeMergedSettings } from './writer.js';
export type { SerializeOptions, WriteOptions, WriteResult } from './writer.js';

export interface MergeFilesOptions extends ResolveOptions {
  /** Called once the input files are known, before any is read */
  onResolved?: (files: readonly string[]) => void;
}

export interface MergeResult {
  /** Files in the order they were merged */
  files: string[];
  settings: PermissionSet;
}

/**
 * Resolve, load and merge settings files. Nothing is merged unless every
 * file resolves and parses.
 */
export async function mergeFiles(
  expressions: readonly string[],
  options: MergeFilesOptions = {}
): Promise<MergeResult> {
  const files = await resolveInputFiles(expressions, options);
  logger.debug('Merger', 'Resolved input files', { files });
  options.onResolved?.(files);

  const loaded = await loadSettingsFiles(files, options);
  const settings = mergeSettingsDocuments(loaded.map((entry) => entry.settings));

  return { files, settings };
}

/**
 * Settings Merger - Combine permission lists from several settings documents
 *
 * Merge strategy:
 * - permissions.allow / permissions.deny: concatenate in input order, first occurrence wins
 * - Every other top-level key: taken from the first document only
 * - permissions is always emitted with both lists, allow before deny
 */

import { SettingsError } from '../base/utils/errors.js';
import { logger } from '../base/utils/logger.js';
import { isVerboseDebugEnabled } from '../base/utils/debug.js';
import {
  PERMISSIONS_KEY,
  type PermissionSet,
  type SettingsDocument,
} from '../base/config/types.js';

/**
 * Merge permission lists, removing duplicates while preserving the order of
 * first appearance
 */
export function mergePermissionLists(lists: ReadonlyArray<readonly string[]>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const list of lists) {
    for (const item of list) {
      if (!seen.has(item)) {
        seen.add(item);
        result.push(item);
      } else if (isVerboseDebugEnabled('merger')) {
        logger.debug('Merger', 'Dropped duplicate pattern', { pattern: item });
      }
    }
  }

  return result;
}

/**
 * Merge settings documents in order.
 *
 * Non-permission keys come from the first document; later documents only
 * contribute to the allow and deny lists.
 */
export function mergeSettingsDocuments(documents: readonly SettingsDocument[]): PermissionSet {
  const [first] = documents;
  if (!first) {
    throw new SettingsError('EMPTY_INPUT_LIST', 'No files provided to merge');
  }

  const allow = mergePermissionLists(documents.map((doc) => doc.permissions?.allow ?? []));
  const deny = mergePermissionLists(documents.map((doc) => doc.permissions?.deny ?? []));
  const permissions = { allow, deny };

  // First document's key order; permissions keeps its place or goes last.
  // defineProperty keeps a "__proto__" key as an own setting.
  const extras: Record<string, unknown> = {};
  for (const key of Object.keys(first)) {
    Object.defineProperty(extras, key, {
      value: key === PERMISSIONS_KEY ? permissions : structuredClone(first[key]),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }

  logger.debug('Merger', 'Merged settings documents', {
    documents: documents.length,
    allow: allow.length,
    deny: deny.length,
  });

  return Object.assign(extras, { permissions });
}

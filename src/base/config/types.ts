/**
 * Settings Types - Permission documents read and written by both tools
 *
 * A settings document is a JSON object with an optional `permissions` object.
 * Only `permissions.allow` and `permissions.deny` are interpreted; every other
 * top-level key is carried as an opaque JSON value.
 */

// =============================================================================
// Settings Types
// =============================================================================

/**
 * Permission rules as found in a source document
 */
export interface PermissionRules {
  allow?: string[];
  deny?: string[];
  [key: string]: unknown;
}

/**
 * Source settings document (Claude-style settings.json)
 */
export interface SettingsDocument {
  permissions?: PermissionRules;
  [key: string]: unknown;
}

/**
 * Merge result: both lists always present, allow before deny
 */
export interface PermissionSet {
  permissions: {
    allow: string[];
    deny: string[];
  };
  [key: string]: unknown;
}

/**
 * Extractor output: one allow list per category document
 */
export interface CategoryDocument {
  permissions: {
    allow: string[];
  };
}

/**
 * A document together with the file it was read from
 */
export interface LoadedSettings {
  path: string;
  settings: SettingsDocument;
}

// =============================================================================
// Constants
// =============================================================================

export const PERMISSIONS_KEY = 'permissions';
export const DEFAULT_INDENT = 2;
export const DEFAULT_SOURCE_PREFIX = 'gh-';
export const DEFAULT_SOURCE_SUFFIX = '.md';
export const OUTPUT_EXTENSION = '.json';

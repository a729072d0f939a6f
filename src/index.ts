/**
 * settings-merge - Merge permission settings files and build them from
 * markdown pattern catalogs
 */

export * from './base/config/index.js';
export { SettingsError, ArgumentError, getErrorMessage } from './base/utils/errors.js';
export type { SettingsErrorCode } from './base/utils/errors.js';
export { logger, LogLevel } from './base/utils/logger.js';
export * from './merger/index.js';
export * from './extractor/index.js';
export * from './cli/index.js';

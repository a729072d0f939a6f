/**
 * Error types shared by the merger and the extractor
 */

export type SettingsErrorCode =
  | 'EMPTY_INPUT_LIST'
  | 'NO_MATCHING_FILES'
  | 'FILE_NOT_FOUND'
  | 'READ_FAILED'
  | 'INVALID_JSON'
  | 'INVALID_SETTINGS'
  | 'UNWRITABLE_OUTPUT';

/**
 * A failure that aborts a merge run. `path` names the offending file,
 * glob expression or output destination when there is one.
 */
export class SettingsError extends Error {
  constructor(
    public readonly code: SettingsErrorCode,
    message: string,
    public readonly path?: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SettingsError';
  }
}

/**
 * Invalid command-line usage
 */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Node errno code of a filesystem error, if any
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Logger Tests
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { formatContext, logger } from './logger.js';
import { resetDebugConfig } from './debug.js';

describe('formatContext', () => {
  it('should format each value type', () => {
    expect(formatContext({ file: 'a.json', count: 2, files: ['a', 'b'], missing: undefined })).toBe(
      ' [file="a.json" count=2 files=["a","b"] missing=undefined]'
    );
  });

  it('should return nothing for an empty context', () => {
    expect(formatContext({})).toBe('');
  });
});

describe('logger', () => {
  const originalDebug = process.env.SETTINGS_MERGE_DEBUG;

  const spyOnStderr = () => jest.spyOn(console, 'error').mockImplementation(() => undefined);

  beforeEach(() => {
    delete process.env.SETTINGS_MERGE_DEBUG;
    resetDebugConfig();
  });

  afterEach(() => {
    jest.restoreAllMocks();
    if (originalDebug === undefined) {
      delete process.env.SETTINGS_MERGE_DEBUG;
    } else {
      process.env.SETTINGS_MERGE_DEBUG = originalDebug;
    }
    resetDebugConfig();
  });

  it('should write info lines to stderr', () => {
    const errorSpy = spyOnStderr();
    logger.info('Merger', 'Merged settings documents', { documents: 2 });

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0][0])).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] Merger:info - Merged settings documents \[documents=2\]$/
    );
  });

  it('should drop debug lines unless debugging is enabled', () => {
    const errorSpy = spyOnStderr();
    logger.debug('Merger', 'hidden');
    expect(errorSpy).not.toHaveBeenCalled();

    process.env.SETTINGS_MERGE_DEBUG = '1';
    resetDebugConfig();
    logger.debug('Merger', 'shown');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0][0])).toContain('Merger:debug - shown');
  });
});

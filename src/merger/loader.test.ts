/**
 * Settings Loader Tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as path from 'path';
import { loadSettingsFile, loadSettingsFiles, resolveInputFiles } from './loader.js';
import { SettingsError } from '../base/utils/errors.js';
import { createTestDir, writeJson, writeText, type TestDir } from '../test/test-utils.js';

describe('resolveInputFiles', () => {
  let testDir: TestDir;

  beforeEach(async () => {
    testDir = await createTestDir();
    await writeJson(testDir.dir, 'base.json', {});
    await writeJson(testDir.dir, 'gh-pr.json', {});
    await writeJson(testDir.dir, 'gh-issue.json', {});
    await writeText(testDir.dir, 'notes.md', '# notes');
  });

  afterEach(async () => {
    await testDir.cleanup();
  });

  it('should keep literal paths in argument order', async () => {
    const files = await resolveInputFiles(['gh-pr.json', 'base.json'], { cwd: testDir.dir });

    expect(files).toEqual(['gh-pr.json', 'base.json']);
  });

  it('should not check literal paths for existence', async () => {
    const files = await resolveInputFiles(['missing.json'], { cwd: testDir.dir });

    expect(files).toEqual(['missing.json']);
  });

  it('should expand glob expressions in sorted order', async () => {
    const files = await resolveInputFiles(['base.json', 'gh-*.json'], { cwd: testDir.dir });

    expect(files).toEqual(['base.json', 'gh-issue.json', 'gh-pr.json']);
  });

  it('should drop repeated files keeping the first position', async () => {
    const files = await resolveInputFiles(['gh-pr.json', '*.json', './base.json'], {
      cwd: testDir.dir,
    });

    expect(files).toEqual(['gh-pr.json', 'base.json', 'gh-issue.json']);
  });

  it('should fail when a glob expression matches nothing', async () => {
    await expect(
      resolveInputFiles(['base.json', 'perm-*.json'], { cwd: testDir.dir })
    ).rejects.toMatchObject({
      code: 'NO_MATCHING_FILES',
      path: 'perm-*.json',
      message: "No files match pattern 'perm-*.json'",
    });
  });

  it('should fail when no expressions are given', async () => {
    await expect(resolveInputFiles([], { cwd: testDir.dir })).rejects.toBeInstanceOf(SettingsError);
    await expect(resolveInputFiles([], { cwd: testDir.dir })).rejects.toMatchObject({
      code: 'EMPTY_INPUT_LIST',
    });
  });
});

describe('loadSettingsFile', () => {
  let testDir: TestDir;

  beforeEach(async () => {
    testDir = await createTestDir();
  });

  afterEach(async () => {
    await testDir.cleanup();
  });

  it('should load a settings document with extra keys', async () => {
    await writeJson(testDir.dir, 'settings.json', {
      permissions: { allow: ['Read'], ask: ['Bash(npm run:*)'] },
      model: 'opus',
      env: { DEBUG: '1' },
    });

    const settings = await loadSettingsFile('settings.json', { cwd: testDir.dir });

    expect(settings).toEqual({
      permissions: { allow: ['Read'], ask: ['Bash(npm run:*)'] },
      model: 'opus',
      env: { DEBUG: '1' },
    });
  });

  it('should accept an absolute path', async () => {
    const filePath = await writeJson(testDir.dir, 'settings.json', { model: 'opus' });

    await expect(loadSettingsFile(filePath)).resolves.toEqual({ model: 'opus' });
  });

  it('should report a missing file', async () => {
    await expect(loadSettingsFile('missing.json', { cwd: testDir.dir })).rejects.toMatchObject({
      code: 'FILE_NOT_FOUND',
      path: 'missing.json',
      message: "File 'missing.json' not found",
    });
  });

  it('should report invalid JSON naming the file', async () => {
    await writeText(testDir.dir, 'broken.json', '{not valid json');

    const rejection = loadSettingsFile('broken.json', { cwd: testDir.dir });

    await expect(rejection).rejects.toMatchObject({ code: 'INVALID_JSON', path: 'broken.json' });
    await expect(loadSettingsFile('broken.json', { cwd: testDir.dir })).rejects.toThrow(
      "Invalid JSON in 'broken.json'"
    );
  });

  it('should reject a document that is not an object', async () => {
    await writeJson(testDir.dir, 'list.json', ['Read']);

    await expect(loadSettingsFile('list.json', { cwd: testDir.dir })).rejects.toMatchObject({
      code: 'INVALID_SETTINGS',
    });
  });

  it('should reject permission lists that are not string arrays', async () => {
    await writeJson(testDir.dir, 'bad.json', { permissions: { allow: 'Read' } });

    await expect(loadSettingsFile('bad.json', { cwd: testDir.dir })).rejects.toMatchObject({
      code: 'INVALID_SETTINGS',
      path: 'bad.json',
    });
  });

  it('should report a directory as unreadable', async () => {
    await writeJson(testDir.dir, path.join('nested', 'settings.json'), {});

    await expect(loadSettingsFile('nested', { cwd: testDir.dir })).rejects.toMatchObject({
      code: 'READ_FAILED',
    });
  });
});

describe('loadSettingsFiles', () => {
  let testDir: TestDir;

  beforeEach(async () => {
    testDir = await createTestDir();
  });

  afterEach(async () => {
    await testDir.cleanup();
  });

  it('should load files in order', async () => {
    await writeJson(testDir.dir, 'a.json', { model: 'opus' });
    await writeJson(testDir.dir, 'b.json', { model: 'haiku' });

    const loaded = await loadSettingsFiles(['b.json', 'a.json'], { cwd: testDir.dir });

    expect(loaded).toEqual([
      { path: 'b.json', settings: { model: 'haiku' } },
      { path: 'a.json', settings: { model: 'opus' } },
    ]);
  });

  it('should abort on the first bad file', async () => {
    await writeJson(testDir.dir, 'a.json', {});
    await writeText(testDir.dir, 'b.json', '{');

    await expect(
      loadSettingsFiles(['a.json', 'b.json', 'missing.json'], { cwd: testDir.dir })
    ).rejects.toMatchObject({ code: 'INVALID_JSON', path: 'b.json' });
  });
});

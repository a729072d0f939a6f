/**
 * Settings Writer Tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { serializeSettings, writeMergedSettings } from './writer.js';
import { createTestDir, writeText, type TestDir } from '../test/test-utils.js';

const settings = {
  permissions: { allow: ['Read', 'Bash(git:*)'], deny: [] },
  model: 'opus',
};

describe('serializeSettings', () => {
  it('should indent with two spaces by default', () => {
    expect(serializeSettings(settings)).toBe(
      [
        '{',
        '  "permissions": {',
        '    "allow": [',
        '      "Read",',
        '      "Bash(git:*)"',
        '    ],',
        '    "deny": []',
        '  },',
        '  "model": "opus"',
        '}',
      ].join('\n')
    );
  });

  it('should honour a custom indent width', () => {
    expect(serializeSettings({ model: 'opus' }, { indent: 4 })).toBe('{\n    "model": "opus"\n}');
  });

  it('should write compact output without whitespace', () => {
    expect(serializeSettings(settings, { compact: true })).toBe(
      '{"permissions":{"allow":["Read","Bash(git:*)"],"deny":[]},"model":"opus"}'
    );
  });

  it('should let compact override indent', () => {
    expect(serializeSettings({ model: 'opus' }, { compact: true, indent: 8 })).toBe(
      '{"model":"opus"}'
    );
  });

  it('should not change content between modes', () => {
    const pretty = serializeSettings(settings, { indent: 3 });
    const compact = serializeSettings(settings, { compact: true });

    expect(JSON.parse(pretty)).toEqual(JSON.parse(compact));
  });
});

describe('writeMergedSettings', () => {
  let testDir: TestDir;

  beforeEach(async () => {
    testDir = await createTestDir();
  });

  afterEach(async () => {
    await testDir.cleanup();
  });

  it('should write content with a trailing newline', async () => {
    const output = path.join(testDir.dir, 'merged.json');

    const result = await writeMergedSettings('{"model":"opus"}', output);

    expect(result).toEqual({ path: output });
    expect(await fs.readFile(output, 'utf-8')).toBe('{"model":"opus"}\n');
  });

  it('should create missing parent directories', async () => {
    const output = path.join(testDir.dir, 'out', 'nested', 'merged.json');

    await writeMergedSettings('{}', output);

    expect(await fs.readFile(output, 'utf-8')).toBe('{}\n');
  });

  it('should back up an existing destination', async () => {
    const output = await writeText(testDir.dir, 'merged.json', 'old');

    const result = await writeMergedSettings('new', output);

    expect(result.backupPath).toBe(`${output}.bak`);
    expect(await fs.readFile(`${output}.bak`, 'utf-8')).toBe('old');
    expect(await fs.readFile(output, 'utf-8')).toBe('new\n');
  });

  it('should number backups when earlier ones exist', async () => {
    const output = await writeText(testDir.dir, 'merged.json', 'third');
    await writeText(testDir.dir, 'merged.json.bak', 'first');
    await writeText(testDir.dir, 'merged.json.bak.1', 'second');

    const result = await writeMergedSettings('fourth', output);

    expect(result.backupPath).toBe(`${output}.bak.2`);
    expect(await fs.readFile(`${output}.bak.2`, 'utf-8')).toBe('third');
    expect(await fs.readFile(`${output}.bak`, 'utf-8')).toBe('first');
  });

  it('should skip the backup when disabled', async () => {
    const output = await writeText(testDir.dir, 'merged.json', 'old');

    const result = await writeMergedSettings('new', output, { backup: false });

    expect(result.backupPath).toBeUndefined();
    expect((await fs.readdir(testDir.dir)).sort()).toEqual(['merged.json']);
  });

  it('should report an unwritable destination', async () => {
    await writeText(testDir.dir, 'blocker', 'a file, not a directory');
    const output = path.join(testDir.dir, 'blocker', 'merged.json');

    await expect(writeMergedSettings('{}', output)).rejects.toMatchObject({
      code: 'UNWRITABLE_OUTPUT',
      path: output,
    });
  });
});

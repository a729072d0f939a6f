import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Check if a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Swap the extension of a file name, keeping directory and base name.
 * A name without extension gets the new one appended.
 */
export function replaceExtension(filePath: string, extension: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, parsed.name + extension);
}

/**
 * First free backup name for a file: `<file>.bak`, then `<file>.bak.1`, `<file>.bak.2`, ...
 */
export async function findBackupPath(filePath: string): Promise<string> {
  const backupPath = `${filePath}.bak`;
  if (!(await pathExists(backupPath))) {
    return backupPath;
  }

  for (let index = 1; ; index++) {
    const candidate = `${backupPath}.${index}`;
    if (!(await pathExists(candidate))) {
      return candidate;
    }
  }
}

/**
 * Backup Store
 *
 * Moves converted originals out of the sync folder. Files keep their
 * original name; a taken name gets " (1)", " (2)", ... and an existing
 * backup is never overwritten.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { hasErrorCode } from './errors';

const MAX_SUFFIX = 10000;

export function numberedName(fileName: string, counter: number): string {
  if (counter === 0) return fileName;
  const ext = path.extname(fileName);
  const stem = fileName.slice(0, fileName.length - ext.length);
  return `${stem} (${counter})${ext}`;
}

/**
 * Move `sourcePath` into `backupFolder`. Returns where it ended up.
 *
 * The copy uses COPYFILE_EXCL so a name that appears concurrently is
 * skipped rather than clobbered; the source is removed only after the
 * copy landed.
 */
export async function moveToBackup(sourcePath: string, backupFolder: string): Promise<string> {
  await fs.mkdir(backupFolder, { recursive: true });
  const fileName = path.basename(sourcePath);

  for (let counter = 0; counter < MAX_SUFFIX; counter++) {
    const target = path.join(backupFolder, numberedName(fileName, counter));
    try {
      await fs.copyFile(sourcePath, target, fs.constants.COPYFILE_EXCL);
    } catch (err) {
      if (hasErrorCode(err, 'EEXIST')) continue;
      throw err;
    }
    await fs.unlink(sourcePath);
    return target;
  }

  throw new Error(`No free backup name for ${fileName} in ${backupFolder}`);
}

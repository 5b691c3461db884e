/**
 * Filesystem Checks
 *
 * @module storage/files
 */

import * as fs from 'node:fs/promises';

/**
 * Check whether any filesystem entry (file, directory, link target)
 * exists at a path.
 *
 * Only "does not exist" answers false; other errors (e.g. EACCES on a
 * parent directory) are rethrown so an unreadable checkpoint is not
 * mistaken for a missing one.
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return false;
    }
    throw error;
  }
}

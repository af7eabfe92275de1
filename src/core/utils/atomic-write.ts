/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename, so a reader sees either no file or the complete
 * file, never a partial one. The rename is atomic on POSIX systems.
 *
 * **Pattern:**
 * 1. Write to a temporary sibling (unique name with PID)
 * 2. Rename temp file to target path
 * 3. Remove the temp file on error, then rethrow
 *
 * The parent directory is not created: writing into a missing directory is
 * an error the caller sees.
 */

import { renameSync, rmSync, writeFileSync } from 'node:fs';

/**
 * Atomically write string data to file
 *
 * @param filePath - Target file path
 * @param data - String data to write
 * @param encoding - File encoding (default: 'utf-8')
 * @throws Error if write or rename fails
 */
export function atomicWriteFileSync(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): void {
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    writeFileSync(tempPath, data, encoding);
    renameSync(tempPath, filePath);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw error;
  }
}

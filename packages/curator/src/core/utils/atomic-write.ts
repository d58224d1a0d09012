/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename, so a crash mid-write leaves either the old
 * partition file or the new one on disk, never a truncated one.
 *
 * **Pattern:**
 * 1. Write to temporary file (unique name with PID to prevent conflicts)
 * 2. Rename temp file to target path (atomic on POSIX)
 * 3. Remove the temp file if either step fails
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Atomically write string data to file
 *
 * @example
 * ```typescript
 * await atomicWriteFile('data/partitions/CO.json', JSON.stringify(doc, null, 2));
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch(() => {
      /* temp file may never have been created */
    });
    throw error;
  }
}

/**
 * Atomically write JSON data to file (pretty-printed, trailing newline)
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  const json = `${JSON.stringify(data, null, space)}\n`;
  await atomicWriteFile(filePath, json, 'utf-8');
}

/**
 * Atomic Write Utilities
 *
 * Output files are written to a temporary sibling and renamed into place, so
 * a crash mid-write leaves either the previous workbook or the new one. The
 * temporary name carries the PID and a timestamp.
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Atomically write string or binary data to a file
 *
 * @throws Error if write or rename fails
 */
export async function atomicWriteFile(
  filePath: string,
  data: string | Uint8Array,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    if (typeof data === 'string') {
      await writeFile(tempPath, data, encoding);
    } else {
      await writeFile(tempPath, data);
    }
    await rename(tempPath, filePath);
  } catch (error) {
    // The temp file may never have been created
    await unlink(tempPath).catch(() => undefined);
    throw error;
  }
}

/**
 * Atomically write JSON data to a file
 *
 * @example
 * ```typescript
 * await atomicWriteJSON('out/catalog.json', { initiatives, directPolicies });
 * ```
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  await atomicWriteFile(filePath, `${JSON.stringify(data, null, space)}\n`, 'utf-8');
}

/**
 * File I/O helpers shared by the workspace store and the interceptor.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { withCollisionSuffix, WriteFailedError } from '@sheetbox/core';

const MAX_COLLISION_ATTEMPTS = 1000;

/**
 * Node error code of a thrown value, if it has one.
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isNotFound(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function fsyncDirectoryIfSupported(dirPath: string): Promise<void> {
  let dirHandle: fs.FileHandle | undefined;
  try {
    dirHandle = await fs.open(dirPath, 'r');
    await dirHandle.sync();
  } catch {
    return;
  } finally {
    if (dirHandle) {
      await dirHandle.close();
    }
  }
}

/**
 * Write a file through a temp sibling and a rename, so readers see
 * either the old content or the new one.
 */
export async function writeFileAtomically(
  targetPath: string,
  data: string,
  options: { readonly mode?: number } = {}
): Promise<void> {
  const dirPath = path.dirname(targetPath);
  const tempPath = `${targetPath}.tmp-${process.pid}-${randomUUID()}`;

  let fileHandle: fs.FileHandle | undefined;
  try {
    fileHandle = await fs.open(tempPath, 'wx', options.mode ?? 0o600);
    await fileHandle.writeFile(data, 'utf8');
    await fileHandle.sync();
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch(() => undefined);
    throw error;
  } finally {
    if (fileHandle) {
      await fileHandle.close();
    }
  }

  try {
    await fs.rename(tempPath, targetPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch(() => undefined);
    throw error;
  }

  await fsyncDirectoryIfSupported(dirPath);
}

/**
 * Create a new file named `name` in `dir`, never overwriting.
 *
 * When the name is taken, `_1`, `_2`, … is inserted before the extension
 * until an unused name is found. The file is opened with `wx`, so the
 * claim also holds against concurrent writers and refuses to follow an
 * existing symbolic link.
 */
export async function openExclusive(
  dir: string,
  name: string
): Promise<{ path: string; handle: fs.FileHandle }> {
  for (let counter = 0; counter < MAX_COLLISION_ATTEMPTS; counter++) {
    const candidate = path.join(dir, withCollisionSuffix(name, counter));
    try {
      const handle = await fs.open(candidate, 'wx');
      return { path: candidate, handle };
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') {
        throw new WriteFailedError(candidate, errorMessage(error));
      }
    }
  }
  throw new WriteFailedError(path.join(dir, name), 'too many files with the same name');
}

/**
 * Write `data` to a new file in `dir` (see {@link openExclusive}).
 * A partially written file is removed before the error propagates.
 *
 * @returns Absolute path of the written file
 */
export async function writeExclusive(dir: string, name: string, data: string | Uint8Array): Promise<string> {
  const { path: filePath, handle } = await openExclusive(dir, name);
  try {
    await handle.writeFile(data);
  } catch (error) {
    await handle.close().catch(() => undefined);
    await fs.rm(filePath, { force: true }).catch(() => undefined);
    throw new WriteFailedError(filePath, errorMessage(error));
  }
  await handle.close();
  return filePath;
}

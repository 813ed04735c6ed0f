/**
 * File access for the document flows
 *
 * Outputs are written to a temporary file in the destination directory and
 * renamed over the target, so a failed write never leaves partial output.
 */

import { randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import { basename, dirname, join } from 'path';
import { IOError, toError } from '@chronicle/shared';

/**
 * errno code of a failed fs call, if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}

export async function readFileBytes(path: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await fs.readFile(path));
  } catch (error) {
    const code = errnoCode(error);
    throw new IOError(
      'PathNotFound',
      code === 'ENOENT' ? `File not found: ${path}` : `Cannot read ${path}: ${code ?? 'unknown error'}`,
      { operation: 'readFileBytes', component: 'storage', data: { path, code } },
      toError(error)
    );
  }
}

export async function readTextFile(path: string): Promise<string> {
  return new TextDecoder('utf-8').decode(await readFileBytes(path));
}

/**
 * Replace `path` with `data` in one rename
 */
export async function writeFileAtomic(path: string, data: Uint8Array): Promise<void> {
  const tempPath = join(dirname(path), `.${basename(path)}.${randomBytes(6).toString('hex')}.tmp`);

  try {
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    const code = errnoCode(error);
    throw new IOError(
      'PathNotWritable',
      `Cannot write ${path}: ${code ?? 'unknown error'}`,
      { operation: 'writeFileAtomic', component: 'storage', data: { path, code } },
      toError(error)
    );
  }
}

/**
 * Filesystem helpers
 *
 * Atomic writes go to a sibling temp file that is renamed over the target, so a
 * reader never observes a partially written file. Writes to the same path
 * are serialized through a per-path promise chain.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { randomBytes } from 'node:crypto';

const writeChains = new Map<string, Promise<void>>();

async function writeOnce(path: string, contents: string): Promise<void> {
  const tempPath = `${path}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;
  await mkdir(dirname(path), { recursive: true });

  try {
    await writeFile(tempPath, contents, 'utf8');
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Atomically replace `path` with `contents`.
 *
 * Concurrent calls for the same path run one after another in call order;
 * a failed write does not block the ones queued behind it.
 */
export function writeFileAtomic(path: string, contents: string): Promise<void> {
  const previous = writeChains.get(path) ?? Promise.resolve();
  const next = previous.catch(() => undefined).then(() => writeOnce(path, contents));

  const tail = next.catch(() => undefined);
  writeChains.set(path, tail);
  void tail.then(() => {
    if (writeChains.get(path) === tail) {
      writeChains.delete(path);
    }
  });

  return next;
}

/**
 * Serialize `value` as pretty JSON and write it atomically.
 */
export function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  return writeFileAtomic(path, `${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Resolves once every queued write has settled.
 */
export async function flushPendingWrites(): Promise<void> {
  await Promise.all([...writeChains.values()]);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Read a UTF-8 file, resolving null when it does not exist.
 */
export async function readFileIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

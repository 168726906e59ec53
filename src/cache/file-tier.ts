/**
 * File tier
 *
 * One JSON file per record:
 * ```
 * cacheDir/
 * ├── <key>.json
 * └── .health_check   (written and removed by probe())
 * ```
 *
 * Files that fail to parse or validate are treated as expired and removed.
 *
 * @module cache/file-tier
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import type { Logger } from 'pino';
import type { CacheRecord } from '../types/cache.js';
import { CacheRecordSchema } from '../types/schemas/cache.js';
import { isErrnoException, readFileIfExists, writeJsonAtomic } from '../utils/fs-helpers.js';

const RECORD_EXTENSION = '.json';
const HEALTH_FILE = '.health_check';
const SAFE_KEY = /^[A-Za-z0-9_-]{1,128}$/;

export type FileReadResult =
  | { status: 'hit'; record: CacheRecord }
  | { status: 'miss' }
  | { status: 'expired' }
  | { status: 'corrupt'; reason: string };

export class FileTier {
  private readonly cacheDir: string;
  private readonly logger?: Logger;

  constructor(cacheDir: string, logger?: Logger) {
    this.cacheDir = path.resolve(cacheDir);
    this.logger = logger;
  }

  public get directory(): string {
    return this.cacheDir;
  }

  public async initialize(): Promise<void> {
    await fs.mkdir(this.cacheDir, { recursive: true });
  }

  /**
   * Path of the record file. Keys that are not filename-safe are hashed.
   */
  public pathFor(key: string): string {
    const fileName = SAFE_KEY.test(key)
      ? key
      : crypto.createHash('sha256').update(key).digest('hex');
    return path.join(this.cacheDir, `${fileName}${RECORD_EXTENSION}`);
  }

  /**
   * Read a record. Expired and corrupt files are deleted before returning.
   * I/O errors other than a missing file propagate.
   */
  public async read(key: string, now: number): Promise<FileReadResult> {
    const filePath = this.pathFor(key);

    const raw = await readFileIfExists(filePath);
    if (raw === null) {
      return { status: 'miss' };
    }

    const record = this.parse(raw);
    if (!record || record.key !== key) {
      const reason = record ? 'key mismatch' : 'unparsable record';
      this.logger?.warn({ key, filePath, reason }, 'Removing corrupted cache file');
      await this.removeFile(filePath);
      return { status: 'corrupt', reason };
    }

    if (now > record.expiresAt) {
      await this.removeFile(filePath);
      return { status: 'expired' };
    }

    return { status: 'hit', record };
  }

  public async write(record: CacheRecord): Promise<void> {
    await writeJsonAtomic(this.pathFor(record.key), record);
  }

  public async delete(key: string): Promise<boolean> {
    return this.removeFile(this.pathFor(key));
  }

  /**
   * Remove every record file. Returns the number removed.
   */
  public async clear(): Promise<number> {
    let removed = 0;
    for (const fileName of await this.listRecordFiles()) {
      if (await this.removeFile(path.join(this.cacheDir, fileName))) {
        removed++;
      }
    }
    return removed;
  }

  /**
   * Remove expired and unparsable records. Returns the number removed.
   */
  public async cleanupExpired(now: number): Promise<number> {
    let removed = 0;

    for (const fileName of await this.listRecordFiles()) {
      const filePath = path.join(this.cacheDir, fileName);
      const raw = await readFileIfExists(filePath);
      if (raw === null) {
        continue;
      }

      const record = this.parse(raw);
      if (!record || now > record.expiresAt) {
        if (await this.removeFile(filePath)) {
          removed++;
        }
      }
    }

    return removed;
  }

  public async count(): Promise<number> {
    return (await this.listRecordFiles()).length;
  }

  /**
   * Write and remove a probe file to confirm the directory is writable.
   */
  public async probe(): Promise<void> {
    const probePath = path.join(this.cacheDir, HEALTH_FILE);
    await fs.writeFile(probePath, new Date().toISOString(), 'utf8');
    await fs.rm(probePath, { force: true });
  }

  private parse(raw: string): CacheRecord | null {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return null;
    }
    const result = CacheRecordSchema.safeParse(json);
    return result.success ? result.data : null;
  }

  private async listRecordFiles(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.cacheDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
    return entries.filter((name) => name.endsWith(RECORD_EXTENSION) && !name.startsWith('.'));
  }

  private async removeFile(filePath: string): Promise<boolean> {
    try {
      await fs.unlink(filePath);
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }
}

/**
 * ImageStorage — scratch files for raw clipboard images.
 *
 * Image entries reference these files by path. The store only ever deletes
 * files under its own directory.
 *
 * `compare` is a heuristic, not a content hash: equal size plus equal
 * leading bytes counts as the same image.
 *
 * @module image-storage
 */

import * as fs from 'fs';
import * as fsp from 'fs/promises';
import * as path from 'path';
import { createHash, randomBytes } from 'crypto';
import { createLogger } from './logger';
import { ClipringError, ErrorCode } from '../../shared/types';
import type { ImageFormat } from '../../shared/types';
import type { ClipboardBackend } from '../../shared/types/clipboard-backend';
import { DEFAULT_IMAGE_COMPARE_BYTES, IMAGE_FILE_PREFIX } from '../../shared/constants';

const log = createLogger('ImageStorage');

const EXTENSIONS: Record<ImageFormat, string> = {
  PNG: 'png',
  JPEG: 'jpg',
  TIFF: 'tiff',
};

export interface ImageStorageOptions {
  imageDir: string;
  /** Leading bytes compared by `compare` */
  compareBytes?: number;
  /** Unix-seconds clock used in file names */
  now?: () => number;
}

export class ImageStorage {
  private readonly dir: string;
  private readonly compareBytes: number;
  private readonly now: () => number;

  constructor(
    private readonly backend: ClipboardBackend,
    options: ImageStorageOptions,
  ) {
    this.dir = path.resolve(options.imageDir);
    this.compareBytes = options.compareBytes ?? DEFAULT_IMAGE_COMPARE_BYTES;
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
  }

  get directory(): string {
    return this.dir;
  }

  /**
   * Save the clipboard's raw image to a new scratch file and return its path.
   */
  async persist(formatHint: string): Promise<string> {
    const filePath = path.join(this.dir, this.generateFileName(formatHint));

    try {
      await fsp.mkdir(this.dir, { recursive: true });
      await this.backend.saveImage(toImageFormat(formatHint), filePath);
      return filePath;
    } catch (err) {
      await fsp.rm(filePath, { force: true }).catch((cleanupErr: unknown) => {
        log.warn(`Could not remove partial image ${filePath}:`, cleanupErr);
      });
      throw new ClipringError(`Failed to save clipboard image`, ErrorCode.SAVE_FAILED, {
        originalError: err instanceof Error ? err : undefined,
        context: { formatHint, filePath },
      });
    }
  }

  /**
   * Heuristic equality: same size and same leading `compareBytes` bytes.
   * Unreadable files never compare equal.
   */
  async compare(pathA: string, pathB: string): Promise<boolean> {
    let a: fsp.FileHandle | null = null;
    let b: fsp.FileHandle | null = null;
    try {
      a = await fsp.open(pathA, 'r');
      b = await fsp.open(pathB, 'r');

      const [statA, statB] = await Promise.all([a.stat(), b.stat()]);
      if (statA.size !== statB.size) return false;
      if (statA.size === 0) return true;

      const length = Math.min(statA.size, this.compareBytes);
      const bufA = Buffer.alloc(length);
      const bufB = Buffer.alloc(length);
      const [readA, readB] = await Promise.all([a.read(bufA, 0, length, 0), b.read(bufB, 0, length, 0)]);
      if (readA.bytesRead !== length || readB.bytesRead !== length) return false;

      return bufA.equals(bufB);
    } catch (err) {
      log.debug(`Cannot compare ${pathA} and ${pathB}`, err);
      return false;
    } finally {
      await a?.close();
      await b?.close();
    }
  }

  /**
   * Digest of the same size and leading bytes `compare` looks at, so two
   * files that compare equal share a fingerprint. Null when unreadable.
   */
  async fingerprint(filePath: string): Promise<string | null> {
    let handle: fsp.FileHandle | null = null;
    try {
      handle = await fsp.open(filePath, 'r');
      const { size } = await handle.stat();
      const length = Math.min(size, this.compareBytes);
      const head = Buffer.alloc(length);
      const { bytesRead } = await handle.read(head, 0, length, 0);
      return createHash('sha256').update(`${size}:`).update(head.subarray(0, bytesRead)).digest('hex');
    } catch (err) {
      log.debug(`Cannot fingerprint ${filePath}`, err);
      return null;
    } finally {
      await handle?.close();
    }
  }

  /**
   * Delete a scratch file. Paths outside the store are refused.
   */
  async delete(filePath: string): Promise<void> {
    if (!this.isOwnedPath(filePath)) {
      throw new ClipringError(`Refusing to delete file outside image storage: ${filePath}`, ErrorCode.INVALID_PATH, {
        context: { filePath, imageDir: this.dir },
      });
    }
    await fsp.rm(path.resolve(filePath), { force: true });
  }

  isOwnedPath(filePath: string): boolean {
    if (filePath.length === 0 || filePath.includes('\0')) return false;
    const resolved = path.resolve(filePath);
    return resolved.startsWith(this.dir + path.sep);
  }

  /**
   * Remove scratch files that no entry references any more — leftovers
   * from a previous run that exited before cleanup.
   */
  async purgeOrphans(referenced: Iterable<string>): Promise<number> {
    if (!fs.existsSync(this.dir)) return 0;

    const keep = new Set<string>();
    for (const p of referenced) {
      if (this.isOwnedPath(p)) keep.add(path.resolve(p));
    }

    let removed = 0;
    for (const name of await fsp.readdir(this.dir)) {
      if (!name.startsWith(IMAGE_FILE_PREFIX)) continue;
      const filePath = path.join(this.dir, name);
      if (keep.has(filePath)) continue;
      await fsp.rm(filePath, { force: true });
      removed++;
    }

    if (removed > 0) {
      log.info(`Purged ${removed} orphaned image file(s)`);
    }
    return removed;
  }

  private generateFileName(formatHint: string): string {
    const ext = EXTENSIONS[toImageFormat(formatHint)];
    return `${IMAGE_FILE_PREFIX}${this.now()}_${randomBytes(8).toString('hex')}.${ext}`;
  }
}

/** Map a free-form format hint (`PNG`, `PNGf`, `JPEG`, `TIFF`) to a known format; PNG otherwise */
export function toImageFormat(hint: string): ImageFormat {
  const upper = hint.toUpperCase();
  if (upper === 'JPEG' || upper === 'JPG') return 'JPEG';
  if (upper === 'TIFF' || upper === 'TIF') return 'TIFF';
  return 'PNG';
}

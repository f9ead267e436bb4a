/**
 * LinuxClipboardBackend — X11 clipboard through xclip.
 *
 * Content types are discovered from the TARGETS list; file references are
 * read from `text/uri-list`.
 */

import * as fsp from 'fs/promises';
import { fileURLToPath, pathToFileURL } from 'url';
import type { ImageFormat } from '../../../shared/types';
import type { ClipboardBackend, QueryLimits } from '../../../shared/types/clipboard-backend';
import { runBinaryQuery, runQuery, runWithInput } from './process-runner';
import { createLogger } from '../logger';

const log = createLogger('LinuxClipboard');

const XCLIP = 'xclip';
const SELECTION = ['-selection', 'clipboard'];

const MIME_BY_FORMAT: Record<ImageFormat, string> = {
  PNG: 'image/png',
  JPEG: 'image/jpeg',
  TIFF: 'image/tiff',
};

const DETECTION_ORDER: ImageFormat[] = ['PNG', 'JPEG', 'TIFF'];

export class LinuxClipboardBackend implements ClipboardBackend {
  readonly name = 'linux';

  constructor(private readonly limits: QueryLimits) {}

  async readFileReference(): Promise<string | null> {
    const targets = await this.readTargets();
    if (!targets.includes('text/uri-list')) return null;

    const list = await runQuery(XCLIP, [...SELECTION, '-t', 'text/uri-list', '-o'], this.limits.maxFetchBytes);
    const first = list
      .split(/\r?\n/)
      .map((line) => line.trim())
      .find((line) => line.length > 0 && !line.startsWith('#'));

    if (!first?.startsWith('file://')) return null;
    try {
      return fileURLToPath(first);
    } catch (err) {
      log.debug(`Ignoring malformed file URI: ${first}`, err);
      return null;
    }
  }

  async detectImageFormat(): Promise<ImageFormat | null> {
    const targets = await this.readTargets();
    return DETECTION_ORDER.find((format) => targets.includes(MIME_BY_FORMAT[format])) ?? null;
  }

  readText(): Promise<string> {
    return runQuery(XCLIP, [...SELECTION, '-o'], this.limits.maxFetchBytes);
  }

  async saveImage(format: ImageFormat, destPath: string): Promise<void> {
    const bytes = await runBinaryQuery(
      XCLIP,
      [...SELECTION, '-t', MIME_BY_FORMAT[format], '-o'],
      this.limits.maxImageBytes,
    );
    await fsp.writeFile(destPath, bytes);
  }

  writeText(text: string): Promise<void> {
    return runWithInput(XCLIP, SELECTION, text);
  }

  writeFileReference(filePath: string): Promise<void> {
    return runWithInput(XCLIP, [...SELECTION, '-t', 'text/uri-list'], `${pathToFileURL(filePath).href}\n`);
  }

  writeImage(filePath: string): Promise<void> {
    const lower = filePath.toLowerCase();
    const mime = lower.endsWith('.jpg') || lower.endsWith('.jpeg') ? MIME_BY_FORMAT.JPEG : MIME_BY_FORMAT.PNG;
    return runWithInput(XCLIP, [...SELECTION, '-t', mime, '-i', filePath]);
  }

  /** TARGETS fails on an empty clipboard; that reads as "no targets" */
  private async readTargets(): Promise<string[]> {
    try {
      const out = await runQuery(XCLIP, [...SELECTION, '-t', 'TARGETS', '-o'], this.limits.maxFetchBytes);
      return out.split(/\r?\n/).map((t) => t.trim());
    } catch (err) {
      log.debug('TARGETS query failed', err);
      return [];
    }
  }
}

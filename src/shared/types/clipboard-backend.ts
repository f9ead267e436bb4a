/**
 * ClipboardBackend — capability interface over the OS clipboard.
 *
 * One implementation per platform. The classifier depends only on this
 * interface, so tests substitute an in-memory fake.
 */

import type { ImageFormat } from './clipboard';

/** Byte ceilings applied to every read a backend performs */
export interface QueryLimits {
  /** Text and metadata queries */
  maxFetchBytes: number;
  /** Raw image reads that pass through a pipe */
  maxImageBytes: number;
}

export interface ClipboardBackend {
  readonly name: string;

  /** Path of a file reference on the clipboard, or null when there is none */
  readFileReference(): Promise<string | null>;
  /** Raw image format on the clipboard (PNG checked before JPEG), or null */
  detectImageFormat(): Promise<ImageFormat | null>;
  /** Plain text; '' when the clipboard holds none */
  readText(): Promise<string>;
  /** Write the clipboard's raw image bytes to `destPath` */
  saveImage(format: ImageFormat, destPath: string): Promise<void>;

  writeText(text: string): Promise<void>;
  writeFileReference(filePath: string): Promise<void>;
  /** Put the image stored at `filePath` back on the clipboard */
  writeImage(filePath: string): Promise<void>;
}

/**
 * In-memory ClipboardBackend for tests. Never touches the real clipboard.
 */

import * as fsp from 'fs/promises';
import { vi } from 'vitest';
import type { ClipboardBackend } from '../../src/shared/types/clipboard-backend';
import type { ImageFormat } from '../../src/shared/types';

export interface FakeClipboardState {
  fileRef: string | null;
  image: ImageFormat | null;
  imageBytes: Buffer;
  text: string;
}

export class FakeClipboardBackend implements ClipboardBackend {
  readonly name = 'fake';
  state: FakeClipboardState = { fileRef: null, image: null, imageBytes: Buffer.from('fake-image'), text: '' };

  readFileReference = vi.fn(async (): Promise<string | null> => this.state.fileRef);
  detectImageFormat = vi.fn(async (): Promise<ImageFormat | null> => this.state.image);
  readText = vi.fn(async (): Promise<string> => this.state.text);

  saveImage = vi.fn(async (_format: ImageFormat, destPath: string): Promise<void> => {
    await fsp.writeFile(destPath, this.state.imageBytes);
  });

  writeText = vi.fn(async (text: string): Promise<void> => {
    this.state = { fileRef: null, image: null, imageBytes: this.state.imageBytes, text };
  });

  writeFileReference = vi.fn(async (filePath: string): Promise<void> => {
    this.state = { ...this.state, fileRef: filePath, image: null };
  });

  writeImage = vi.fn(async (_filePath: string): Promise<void> => {
    this.state = { ...this.state, fileRef: null, image: 'PNG' };
  });

  setText(text: string): void {
    this.state = { ...this.state, fileRef: null, image: null, text };
  }
}

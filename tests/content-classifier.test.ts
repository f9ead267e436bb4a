/**
 * Tests for ContentClassifier — precedence, kind detection, limits and apply fallbacks.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as fsp from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

vi.mock('../src/main/services/logger', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(),
  })),
}));

import { ContentClassifier } from '../src/main/services/content-classifier';
import { ImageStorage } from '../src/main/services/image-storage';
import { ErrorCode } from '../src/shared/types';
import { FakeClipboardBackend } from './helpers/fake-clipboard-backend';

describe('ContentClassifier', () => {
  let tmpDir: string;
  let backend: FakeClipboardBackend;
  let images: ImageStorage;
  let classifier: ContentClassifier;

  beforeEach(async () => {
    tmpDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'clipring-classifier-'));
    backend = new FakeClipboardBackend();
    images = new ImageStorage(backend, { imageDir: path.join(tmpDir, 'images') });
    classifier = new ContentClassifier(backend, images, { maxContentBytes: 64 });
  });

  afterEach(async () => {
    await fsp.rm(tmpDir, { recursive: true, force: true });
  });

  // ─── Precedence ───

  describe('classify precedence', () => {
    it('returns a file entry for an existing file reference', async () => {
      const file = path.join(tmpDir, 'report.pdf');
      await fsp.writeFile(file, 'pdf');
      backend.state = { ...backend.state, fileRef: file, image: 'PNG', text: 'ignored' };

      await expect(classifier.classify()).resolves.toEqual({ content: file, kind: 'file' });
      expect(backend.detectImageFormat).not.toHaveBeenCalled();
    });

    it('ignores a file reference whose path does not exist', async () => {
      backend.state = { ...backend.state, fileRef: path.join(tmpDir, 'gone.txt'), text: 'plain words' };

      await expect(classifier.classify()).resolves.toEqual({ content: 'plain words', kind: 'text' });
    });

    it('uses the file reference as image content when one accompanies the image', async () => {
      const ref = path.join(tmpDir, 'missing.png');
      backend.state = { ...backend.state, fileRef: ref, image: 'PNG' };

      await expect(classifier.classify()).resolves.toEqual({ content: ref, kind: 'image' });
      expect(backend.saveImage).not.toHaveBeenCalled();
    });

    it('uses short accompanying text as the image caption', async () => {
      backend.state = { ...backend.state, image: 'JPEG', text: 'https://example.test/cat.jpg\n' };

      await expect(classifier.classify()).resolves.toEqual({
        content: 'https://example.test/cat.jpg',
        kind: 'image',
      });
    });

    it('saves the raw image when there is no caption', async () => {
      backend.state = { ...backend.state, image: 'PNG', text: '[Image: PNG]', imageBytes: Buffer.from('png-bytes') };

      const payload = await classifier.classify();

      expect(payload.kind).toBe('image');
      expect(path.dirname(payload.content)).toBe(images.directory);
      expect(path.basename(payload.content)).toMatch(/^clipring_\d+_[0-9a-f]{16}\.png$/);
      expect(fs.readFileSync(payload.content, 'utf8')).toBe('png-bytes');
    });

    it('falls back to a placeholder when the image cannot be saved', async () => {
      backend.state = { ...backend.state, image: 'TIFF', text: '' };
      backend.saveImage.mockRejectedValueOnce(new Error('osascript failed'));

      await expect(classifier.classify()).resolves.toEqual({ content: '[Image: TIFF]', kind: 'image' });
    });
  });

  // ─── Text ───

  describe('text handling', () => {
    it('rejects an empty clipboard with NO_CONTENT', async () => {
      backend.setText('');
      await expect(classifier.classify()).rejects.toMatchObject({ code: ErrorCode.NO_CONTENT });
    });

    it('rejects text over the size limit with NO_CONTENT', async () => {
      backend.setText('x'.repeat(65));
      await expect(classifier.classify()).rejects.toMatchObject({ code: ErrorCode.NO_CONTENT });
    });

    it('accepts text exactly at the size limit', async () => {
      backend.setText('x'.repeat(64));
      await expect(classifier.classify()).resolves.toEqual({ content: 'x'.repeat(64), kind: 'text' });
    });

    it('trims exactly one trailing newline', async () => {
      backend.setText('line one\n\n');
      await expect(classifier.classify()).resolves.toEqual({ content: 'line one\n', kind: 'text' });

      backend.setText('windows\r\n');
      await expect(classifier.classify()).resolves.toEqual({ content: 'windows', kind: 'text' });
    });

    it('rejects a lone newline with NO_CONTENT', async () => {
      backend.setText('\n');
      await expect(classifier.classify()).rejects.toMatchObject({ code: ErrorCode.NO_CONTENT });
    });

    it('re-classifies urls and colors', async () => {
      backend.setText('https://example.test/page');
      await expect(classifier.classify()).resolves.toEqual({ content: 'https://example.test/page', kind: 'url' });

      backend.setText('#FF8800');
      await expect(classifier.classify()).resolves.toEqual({ content: '#FF8800', kind: 'color' });
    });
  });

  // ─── detectKind ───

  describe('detectKind', () => {
    it.each([
      ['https://example.test', 'url'],
      ['HTTP://EXAMPLE.TEST', 'url'],
      ['mailto:someone@example.test', 'url'],
      ['wss://socket.example.test/feed', 'url'],
      ['https://', 'text'],
      ['https://example.test/a b', 'text'],
      ['see https://example.test', 'text'],
      ['#fff', 'color'],
      ['#a1b2c3', 'color'],
      ['#a1b2c3d4', 'color'],
      ['#12345', 'text'],
      ['#ggg', 'text'],
      ['rgb(1, 2, 3)', 'color'],
      ['rgba(255,0,0,0.5)', 'color'],
      ['hsl(120deg 50% 50%)', 'color'],
      ['rgb(0 0 0 / 50%)', 'color'],
      ['rgb(1, 2)', 'text'],
      ['hello world', 'text'],
    ] as const)('%s → %s', (input, expected) => {
      expect(ContentClassifier.detectKind(input)).toBe(expected);
    });
  });

  describe('image placeholders', () => {
    it('recognises placeholders with and without a format', () => {
      expect(ContentClassifier.isImagePlaceholder('[Image]')).toBe(true);
      expect(ContentClassifier.isImagePlaceholder('[Image: PNG]')).toBe(true);
      expect(ContentClassifier.isImagePlaceholder('[Image: png]')).toBe(false);
      expect(ContentClassifier.imagePlaceholder('JPEG')).toBe('[Image: JPEG]');
    });
  });

  // ─── apply ───

  describe('apply', () => {
    it('writes text, url and color entries as text', async () => {
      await classifier.apply('#fff', 'color');
      expect(backend.writeText).toHaveBeenCalledWith('#fff');
    });

    it('restores an existing file as a file reference', async () => {
      const file = path.join(tmpDir, 'notes.txt');
      await fsp.writeFile(file, 'notes');

      await classifier.apply(file, 'file');

      expect(backend.writeFileReference).toHaveBeenCalledWith(file);
      expect(backend.writeText).not.toHaveBeenCalled();
    });

    it('restores an existing image file as an image', async () => {
      const file = path.join(tmpDir, 'shot.png');
      await fsp.writeFile(file, 'png');

      await classifier.apply(file, 'image');

      expect(backend.writeImage).toHaveBeenCalledWith(file);
      expect(backend.writeText).not.toHaveBeenCalled();
    });

    it('falls back to text when the image file no longer exists', async () => {
      await classifier.apply('[Image: PNG]', 'image');

      expect(backend.writeImage).not.toHaveBeenCalled();
      expect(backend.writeText).toHaveBeenCalledWith('[Image: PNG]');
    });

    it('falls back to text for paths containing traversal segments', async () => {
      const sneaky = `${tmpDir}/../etc/passwd`;
      await classifier.apply(sneaky, 'file');

      expect(backend.writeFileReference).not.toHaveBeenCalled();
      expect(backend.writeText).toHaveBeenCalledWith(sneaky);
    });

    it('falls back to text when the reference write fails', async () => {
      const file = path.join(tmpDir, 'shot.png');
      await fsp.writeFile(file, 'png');
      backend.writeImage.mockRejectedValueOnce(new Error('script failed'));

      await classifier.apply(file, 'image');

      expect(backend.writeText).toHaveBeenCalledWith(file);
    });
  });
});

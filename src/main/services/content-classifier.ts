/**
 * ContentClassifier — reads the live clipboard through a ClipboardBackend
 * and returns a typed payload; `apply` performs the inverse.
 *
 * Precedence (each step short-circuits):
 * 1. File  — a file reference whose path exists on disk
 * 2. Image — raw PNG/JPEG/TIFF data
 * 3. Text  — re-classified as url or color where it qualifies
 *
 * @module content-classifier
 */

import * as fs from 'fs';
import { createLogger } from './logger';
import { ClipringError, ErrorCode } from '../../shared/types';
import type { ClipboardPayload, EntryKind, ImageFormat } from '../../shared/types';
import type { ClipboardBackend } from '../../shared/types/clipboard-backend';
import type { ImageStorage } from './image-storage';
import { validateScriptPath } from './script-safety';
import { MAX_IMAGE_CAPTION_BYTES } from '../../shared/constants';

const log = createLogger('Classifier');

// ─── Content type detection patterns ───

const URL_SCHEMES = ['http://', 'https://', 'ftp://', 'ftps://', 'file://', 'ws://', 'wss://', 'mailto:'];
const HEX_COLOR_PATTERN = /^#(?:[0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i;
const FUNCTIONAL_COLOR_PATTERN =
  /^(?:rgba?|hsla?)\(\s*[-+]?[\d.]+(?:deg|%)?(?:\s*[,/\s]\s*[-+]?[\d.]+(?:deg|%)?){2,3}\s*\)$/i;
const IMAGE_PLACEHOLDER_PATTERN = /^\[Image(?:: [A-Z]+)?\]$/;

export interface ClassifierLimits {
  /** Largest text entry accepted (bytes) */
  maxContentBytes: number;
}

export class ContentClassifier {
  constructor(
    private readonly backend: ClipboardBackend,
    private readonly images: ImageStorage,
    private readonly limits: ClassifierLimits,
  ) {}

  /**
   * Classify the current clipboard content.
   * Rejects with NO_CONTENT or COMMAND_FAILED for transient conditions.
   */
  async classify(): Promise<ClipboardPayload> {
    const fileRef = await this.backend.readFileReference();
    if (fileRef !== null && fs.existsSync(fileRef)) {
      return { content: fileRef, kind: 'file' };
    }

    const format = await this.backend.detectImageFormat();
    if (format !== null) {
      return { content: await this.resolveImageContent(format, fileRef), kind: 'image' };
    }

    const text = await this.backend.readText();
    if (text.length === 0) {
      throw new ClipringError('Clipboard is empty', ErrorCode.NO_CONTENT);
    }
    const size = Buffer.byteLength(text, 'utf8');
    if (size > this.limits.maxContentBytes) {
      throw new ClipringError(`Clipboard text too large (${size} bytes)`, ErrorCode.NO_CONTENT, {
        context: { size, limit: this.limits.maxContentBytes },
      });
    }

    const content = trimTrailingNewline(text);
    if (content.length === 0) {
      throw new ClipringError('Clipboard holds only a newline', ErrorCode.NO_CONTENT);
    }
    return { content, kind: ContentClassifier.detectKind(content) };
  }

  /**
   * Put `content` back on the clipboard. Image and file entries first try to
   * restore the original reference and fall back to plain text.
   */
  async apply(content: string, kind: EntryKind): Promise<void> {
    if (kind === 'image' || kind === 'file') {
      const check = validateScriptPath(content);
      if (check.allowed && fs.existsSync(content)) {
        try {
          if (kind === 'image') {
            await this.backend.writeImage(content);
          } else {
            await this.backend.writeFileReference(content);
          }
          return;
        } catch (err) {
          log.warn(`Could not restore ${kind} reference, falling back to text`, err);
        }
      } else if (!check.allowed) {
        log.warn(`Refusing ${kind} path: ${check.reason}`);
      }
    }

    await this.backend.writeText(content);
  }

  // ─── Content Type Detection ───

  /**
   * Re-classify plain text as url or color; everything else stays text.
   */
  static detectKind(text: string): Extract<EntryKind, 'text' | 'url' | 'color'> {
    if (isUrl(text)) return 'url';
    if (HEX_COLOR_PATTERN.test(text) || FUNCTIONAL_COLOR_PATTERN.test(text)) return 'color';
    return 'text';
  }

  static isImagePlaceholder(text: string): boolean {
    return IMAGE_PLACEHOLDER_PATTERN.test(text);
  }

  static imagePlaceholder(format: ImageFormat): string {
    return `[Image: ${format}]`;
  }

  // ─── Private ───

  private async resolveImageContent(format: ImageFormat, fileRef: string | null): Promise<string> {
    if (fileRef !== null) return fileRef;

    const caption = await this.readCaption();
    if (caption !== null) return caption;

    try {
      return await this.images.persist(format);
    } catch (err) {
      log.warn(`Image save failed, storing placeholder`, err);
      return ContentClassifier.imagePlaceholder(format);
    }
  }

  /** Short text that accompanies an image (e.g. a copied image's URL) */
  private async readCaption(): Promise<string | null> {
    try {
      const text = trimTrailingNewline(await this.backend.readText()).trim();
      if (text.length === 0 || Buffer.byteLength(text, 'utf8') > MAX_IMAGE_CAPTION_BYTES) return null;
      if (ContentClassifier.isImagePlaceholder(text)) return null;
      return text;
    } catch (err) {
      if (ClipringError.hasCode(err, ErrorCode.NO_CONTENT, ErrorCode.COMMAND_FAILED)) return null;
      throw err;
    }
  }
}

function isUrl(text: string): boolean {
  if (/\s/.test(text)) return false;
  const lower = text.toLowerCase();
  return URL_SCHEMES.some((scheme) => lower.startsWith(scheme) && text.length > scheme.length);
}

function trimTrailingNewline(text: string): string {
  if (text.endsWith('\r\n')) return text.slice(0, -2);
  if (text.endsWith('\n')) return text.slice(0, -1);
  return text;
}

/**
 * MacOSClipboardBackend — pbpaste/pbcopy for text, AppleScript (osascript)
 * for file references and raw image data.
 */

import { ClipringError, ErrorCode } from '../../../shared/types';
import type { ImageFormat } from '../../../shared/types';
import type { ClipboardBackend, QueryLimits } from '../../../shared/types/clipboard-backend';
import { escapeScriptString } from '../script-safety';
import { runQuery, runWithInput } from './process-runner';
import { createLogger } from '../logger';

const log = createLogger('MacOSClipboard');

/** `clipboard info` class names, in detection order */
const IMAGE_CLASSES: [ImageFormat, RegExp][] = [
  ['PNG', /«class PNGf»/],
  ['JPEG', /JPEG picture|«class JPEG»/],
  ['TIFF', /TIFF picture|«class TIFF»/],
];

const READ_AS: Record<ImageFormat, string> = {
  PNG: '«class PNGf»',
  JPEG: 'JPEG picture',
  TIFF: 'TIFF picture',
};

export class MacOSClipboardBackend implements ClipboardBackend {
  readonly name = 'macos';

  constructor(private readonly limits: QueryLimits) {}

  async readFileReference(): Promise<string | null> {
    try {
      const out = await runQuery(
        'osascript',
        ['-e', 'POSIX path of (the clipboard as «class furl»)'],
        this.limits.maxFetchBytes,
      );
      const filePath = out.trim();
      return filePath.length > 0 ? filePath : null;
    } catch (err) {
      // osascript exits non-zero whenever the clipboard holds no file
      log.debug('No file reference on clipboard', err);
      return null;
    }
  }

  async detectImageFormat(): Promise<ImageFormat | null> {
    const info = await runQuery('osascript', ['-e', 'clipboard info'], this.limits.maxFetchBytes);
    for (const [format, pattern] of IMAGE_CLASSES) {
      if (pattern.test(info)) return format;
    }
    return null;
  }

  readText(): Promise<string> {
    return runQuery('pbpaste', [], this.limits.maxFetchBytes);
  }

  async saveImage(format: ImageFormat, destPath: string): Promise<void> {
    const target = escapeScriptString(destPath);
    const primary = READ_AS[format];
    const script = [
      'try',
      `  set imgData to the clipboard as ${primary}`,
      `  set imgFile to open for access file POSIX file "${target}" with write permission`,
      '  write imgData to imgFile',
      '  close access imgFile',
      '  return "success"',
      'on error',
      '  try',
      '    set imgData to the clipboard as JPEG picture',
      `    set imgFile to open for access file POSIX file "${target}" with write permission`,
      '    write imgData to imgFile',
      '    close access imgFile',
      '    return "success"',
      '  on error',
      '    return "failed"',
      '  end try',
      'end try',
    ].join('\n');

    const out = await runQuery('osascript', ['-e', script], this.limits.maxFetchBytes);
    if (out.trim() !== 'success') {
      throw new ClipringError('osascript could not write clipboard image', ErrorCode.COMMAND_FAILED, {
        context: { format, destPath },
      });
    }
  }

  writeText(text: string): Promise<void> {
    return runWithInput('pbcopy', [], text);
  }

  writeFileReference(filePath: string): Promise<void> {
    return runWithInput('osascript', ['-e', `set the clipboard to (POSIX file "${escapeScriptString(filePath)}")`]);
  }

  writeImage(filePath: string): Promise<void> {
    const readAs = READ_AS[formatFromExtension(filePath)];
    return runWithInput('osascript', [
      '-e',
      `set the clipboard to (read (POSIX file "${escapeScriptString(filePath)}") as ${readAs})`,
    ]);
  }
}

function formatFromExtension(filePath: string): ImageFormat {
  const lower = filePath.toLowerCase();
  if (lower.endsWith('.jpg') || lower.endsWith('.jpeg')) return 'JPEG';
  if (lower.endsWith('.tif') || lower.endsWith('.tiff')) return 'TIFF';
  return 'PNG';
}

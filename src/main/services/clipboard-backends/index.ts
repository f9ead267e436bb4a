/**
 * Clipboard backend implementations — barrel export and platform factory.
 */

import { ClipringError, ErrorCode } from '../../../shared/types';
import type { ClipboardBackend, QueryLimits } from '../../../shared/types/clipboard-backend';
import { MacOSClipboardBackend } from './macos-backend';
import { LinuxClipboardBackend } from './linux-backend';

export { MacOSClipboardBackend } from './macos-backend';
export { LinuxClipboardBackend } from './linux-backend';

/**
 * Pick the backend for `platform`. Anything but macOS and Linux is fatal.
 */
export function createClipboardBackend(limits: QueryLimits, platform: NodeJS.Platform = process.platform): ClipboardBackend {
  switch (platform) {
    case 'darwin':
      return new MacOSClipboardBackend(limits);
    case 'linux':
      return new LinuxClipboardBackend(limits);
    default:
      throw new ClipringError(`Clipboard access is not supported on ${platform}`, ErrorCode.UNSUPPORTED_PLATFORM, {
        severity: 'fatal',
        recoverable: false,
        context: { platform },
      });
  }
}

/**
 * Guards for values that end up inside OS-level clipboard scripts.
 *
 * Text is escaped before it is embedded in an AppleScript string literal;
 * paths are validated before any backend touches them.
 */

import { MAX_SCRIPT_PATH_LENGTH } from '../../shared/constants';

export interface PathCheck {
  allowed: boolean;
  reason?: string;
}

/**
 * Escape text for a double-quoted AppleScript string literal.
 * Backslashes first, then quotes, then control characters.
 */
export function escapeScriptString(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t')
    .replace(/[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/g, '');
}

/**
 * Validate a path before it is handed to a clipboard script.
 */
export function validateScriptPath(filePath: string): PathCheck {
  if (filePath.length === 0) {
    return { allowed: false, reason: 'Empty path' };
  }
  if (filePath.length > MAX_SCRIPT_PATH_LENGTH) {
    return { allowed: false, reason: `Path longer than ${MAX_SCRIPT_PATH_LENGTH} characters` };
  }
  if (filePath.includes('\0')) {
    return { allowed: false, reason: 'Path contains a NUL byte' };
  }
  if (filePath.split(/[\\/]/).includes('..')) {
    return { allowed: false, reason: 'Path traversal (..) is not allowed' };
  }
  return { allowed: true };
}

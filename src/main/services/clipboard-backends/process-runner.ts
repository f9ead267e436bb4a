/**
 * Child-process helpers shared by the clipboard backends.
 *
 * Queries are bounded by a byte ceiling and a timeout. Output over the
 * ceiling is NO_CONTENT (size policy); any other failure is COMMAND_FAILED.
 */

import { execFile, spawn } from 'child_process';
import { ClipringError, ErrorCode } from '../../../shared/types';
import { QUERY_TIMEOUT_MS } from '../../../shared/constants';
import { createLogger } from '../logger';

const log = createLogger('ProcessRunner');

const MAX_BUFFER_CODE = 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER';

function queryError(command: string, error: Error & { code?: string | number | null }): ClipringError {
  if (error.code === MAX_BUFFER_CODE) {
    return new ClipringError(`${command} output exceeds the fetch limit`, ErrorCode.NO_CONTENT, {
      originalError: error,
      context: { command },
    });
  }
  return new ClipringError(`${command} failed: ${error.message}`, ErrorCode.COMMAND_FAILED, {
    originalError: error,
    context: { command, exitCode: error.code },
  });
}

/**
 * Run a clipboard query and return its stdout as text.
 */
export function runQuery(command: string, args: string[], maxBytes: number): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { encoding: 'utf8', maxBuffer: maxBytes, timeout: QUERY_TIMEOUT_MS },
      (error, stdout) => {
        if (error) reject(queryError(command, error));
        else resolve(stdout);
      },
    );
  });
}

/**
 * Run a clipboard query and return its stdout as raw bytes.
 */
export function runBinaryQuery(command: string, args: string[], maxBytes: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { encoding: 'buffer', maxBuffer: maxBytes, timeout: QUERY_TIMEOUT_MS },
      (error, stdout) => {
        if (error) reject(queryError(command, error));
        else resolve(stdout);
      },
    );
  });
}

/**
 * Run a setter, optionally feeding `input` on stdin. Resolves on exit code 0.
 *
 * Output is ignored: setters such as xclip fork a child that keeps serving
 * the selection, so waiting for stdout to close would hang.
 */
export function runWithInput(command: string, args: string[], input?: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: [input === undefined ? 'ignore' : 'pipe', 'ignore', 'ignore'] });

    const timer = setTimeout(() => {
      child.kill();
    }, QUERY_TIMEOUT_MS);

    child.on('error', (error) => {
      clearTimeout(timer);
      reject(queryError(command, error));
    });

    child.on('exit', (code, signal) => {
      clearTimeout(timer);
      if (code === 0) {
        resolve();
      } else {
        reject(
          new ClipringError(`${command} exited with ${code ?? signal}`, ErrorCode.COMMAND_FAILED, {
            context: { command, exitCode: code, signal },
          }),
        );
      }
    });

    if (input !== undefined && child.stdin) {
      // EPIPE also surfaces through the exit code
      child.stdin.on('error', (err) => log.debug(`${command} stdin closed early`, err));
      child.stdin.end(input);
    }
  });
}

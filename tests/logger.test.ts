/**
 * Tests for the tagged logger — level filtering and stderr output.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, getLogLevel, setLogLevel } from '../src/main/services/logger';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('writes tagged lines to stderr, never stdout', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const stdout = vi.spyOn(process.stdout, 'write');

    createLogger('Gateway').info('ready');

    expect(stderr.mock.calls[0][0]).toBe('[Gateway] ready\n');
    expect(stdout).not.toHaveBeenCalled();
  });

  it('drops messages below the current level', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    setLogLevel('warn');

    const log = createLogger('Poller');
    log.info('hidden');
    log.debug('hidden');
    log.warn('shown');

    expect(getLogLevel()).toBe('warn');
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr.mock.calls[0][0]).toBe('[Poller] shown\n');
  });
});

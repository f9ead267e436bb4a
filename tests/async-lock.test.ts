/**
 * Tests for AsyncLock — FIFO ordering, exclusion and release on failure.
 */

import { describe, it, expect } from 'vitest';
import { AsyncLock } from '../src/main/services/async-lock';

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('AsyncLock', () => {
  it('runs sections one at a time in call order', async () => {
    const lock = new AsyncLock();
    const events: string[] = [];

    const section = (name: string) =>
      lock.runExclusive(async () => {
        events.push(`${name}:start`);
        await tick();
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([section('a'), section('b'), section('c')]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('releases the lock when a section throws', async () => {
    const lock = new AsyncLock();

    await expect(
      lock.runExclusive(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(lock.runExclusive(() => 'next')).resolves.toBe('next');
    expect(lock.locked).toBe(false);
  });

  it('reports whether a section is in progress', async () => {
    const lock = new AsyncLock();
    let release: () => void = () => {};
    const held = lock.runExclusive(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
    );

    await tick();
    expect(lock.locked).toBe(true);
    release();
    await held;
    expect(lock.locked).toBe(false);
  });
});

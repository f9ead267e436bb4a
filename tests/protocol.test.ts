/**
 * Tests for the gateway protocol vocabulary: command parsing and message encoding.
 */

import { describe, it, expect } from 'vitest';
import { encodeMessage, parseCommand, toProtocolEntries } from '../src/shared/protocol';

describe('parseCommand', () => {
  it.each([
    ['get-entries', { kind: 'get-entries' }],
    ['clear', { kind: 'clear' }],
    ['wipe', { kind: 'wipe' }],
    ['quit', { kind: 'quit' }],
    ['select-entry:1', { kind: 'select-entry', rank: 1 }],
    ['select-entry: 12', { kind: 'select-entry', rank: 12 }],
    ['remove-entry:3', { kind: 'remove-entry', rank: 3 }],
    ['select-entry:0', { kind: 'select-entry', rank: 0 }],
  ] as const)('parses %j', (line, expected) => {
    expect(parseCommand(line)).toEqual(expected);
  });

  it.each(['select-entry:', 'select-entry:-1', 'select-entry:abc', 'remove-entry:2.5', 'remove-entry:1e3'])(
    'flags %j as an invalid index',
    (line) => {
      expect(parseCommand(line)).toMatchObject({ kind: 'invalid-index' });
    },
  );

  it('keeps the raw argument of an invalid index', () => {
    expect(parseCommand('remove-entry:two')).toEqual({ kind: 'invalid-index', raw: 'two' });
  });

  it.each(['GET-ENTRIES', 'get', 'select', 'clear all'])('treats %j as unknown', (line) => {
    expect(parseCommand(line)).toEqual({ kind: 'unknown', raw: line });
  });
});

describe('toProtocolEntries', () => {
  it('numbers entries from 1, marks the first current and renders milliseconds', () => {
    expect(
      toProtocolEntries([
        { content: 'newest', createdAt: 20, kind: 'url' },
        { content: 'older', createdAt: 10, kind: 'text' },
      ]),
    ).toEqual([
      { id: 1, content: 'newest', timestamp: 20_000, type: 'url', isCurrent: true },
      { id: 2, content: 'older', timestamp: 10_000, type: 'text', isCurrent: false },
    ]);
  });

  it('renders an empty history as an empty array', () => {
    expect(toProtocolEntries([])).toEqual([]);
  });
});

describe('encodeMessage', () => {
  it('writes one JSON object per line', () => {
    expect(encodeMessage({ type: 'select-success', index: 2 })).toBe('{"type":"select-success","index":2}\n');
  });

  it('escapes newlines inside content so a message stays on one line', () => {
    const line = encodeMessage({
      type: 'entries',
      data: [{ id: 1, content: 'a\nb', timestamp: 0, type: 'text', isCurrent: true }],
    });
    expect(line.indexOf('\n')).toBe(line.length - 1);
    expect(line).toContain('"content":"a\\nb"');
  });
});

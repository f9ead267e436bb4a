/**
 * Tests for ProtocolGateway — command routing over in-memory streams
 * backed by a real HistoryStore with stubbed clipboard effects.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PassThrough } from 'stream';

vi.mock('../src/main/services/logger', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(),
  })),
}));

import { ProtocolGateway } from '../src/main/services/protocol-gateway';
import { HistoryStore } from '../src/main/services/history-store';

// ─── Helpers ───

function createStore() {
  const apply = vi.fn(async (_content: string, _kind: string): Promise<void> => {});
  const wipe = vi.fn(async (): Promise<void> => {});
  const store = new HistoryStore(
    {
      classifier: { apply },
      images: { compare: async () => false, delete: async () => {}, isOwnedPath: () => false },
      saver: { wipe },
    },
    { maxEntries: 5, now: () => 1000 },
  );
  return { store, apply, wipe };
}

function createGateway(store: HistoryStore) {
  const input = new PassThrough();
  const output = new PassThrough();
  let buffer = '';
  output.on('data', (chunk: Buffer) => {
    buffer += chunk.toString('utf8');
  });

  const gateway = new ProtocolGateway(store, input, output);
  return {
    gateway,
    input,
    /** Every complete line written so far, parsed */
    messages: (): unknown[] =>
      buffer
        .split('\n')
        .filter((line) => line.length > 0)
        .map((line): unknown => JSON.parse(line)),
  };
}

/** Let pending stream writes reach the data listener */
function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** Feed commands followed by quit and wait for the gateway to finish */
async function runCommands(store: HistoryStore, ...commands: string[]): Promise<unknown[]> {
  const { gateway, input, messages } = createGateway(store);
  const done = gateway.run();
  input.write(`${[...commands, 'quit'].join('\n')}\n`);
  await done;
  await flush();
  return messages();
}

describe('ProtocolGateway', () => {
  let ctx: ReturnType<typeof createStore>;

  beforeEach(async () => {
    ctx = createStore();
    for (const content of ['x', 'y', 'z']) {
      await ctx.store.add({ content, kind: 'text' });
    }
  });

  it('announces readiness first', async () => {
    const messages = await runCommands(ctx.store);
    expect(messages).toEqual([{ type: 'ready' }]);
  });

  it('lists entries most recent first with rank ids and millisecond timestamps', async () => {
    const [, entries] = await runCommands(ctx.store, 'get-entries');

    expect(entries).toEqual({
      type: 'entries',
      data: [
        { id: 1, content: 'z', timestamp: 1_000_000, type: 'text', isCurrent: true },
        { id: 2, content: 'y', timestamp: 1_000_000, type: 'text', isCurrent: false },
        { id: 3, content: 'x', timestamp: 1_000_000, type: 'text', isCurrent: false },
      ],
    });
  });

  it('answers select with select-success followed by the reordered listing', async () => {
    const [, success, listing] = await runCommands(ctx.store, 'select-entry:3');

    expect(success).toEqual({ type: 'select-success', index: 3 });
    expect(listing).toMatchObject({
      type: 'entries',
      data: [{ content: 'x', isCurrent: true }, { content: 'z' }, { content: 'y' }],
    });
    expect(ctx.apply).toHaveBeenCalledWith('x', 'text');
  });

  it('answers remove with remove-success followed by the listing', async () => {
    const [, success, listing] = await runCommands(ctx.store, 'remove-entry:1');

    expect(success).toEqual({ type: 'remove-success', index: 1 });
    expect(listing).toMatchObject({ type: 'entries', data: [{ id: 1, content: 'y' }, { id: 2, content: 'x' }] });
  });

  it('reports out-of-range ranks with the store error message', async () => {
    const messages = await runCommands(ctx.store, 'select-entry:9', 'remove-entry:0');

    expect(messages.slice(1)).toEqual([
      { type: 'error', message: 'Invalid index 9: history has 3 entries' },
      { type: 'error', message: 'Invalid index 0: history has 3 entries' },
    ]);
  });

  it('reports malformed ranks and unknown commands', async () => {
    const messages = await runCommands(ctx.store, 'select-entry:abc', 'paste');

    expect(messages.slice(1)).toEqual([
      { type: 'error', message: 'Invalid index' },
      { type: 'error', message: 'Unknown command' },
    ]);
  });

  it('clears to the current entry', async () => {
    const messages = await runCommands(ctx.store, 'clear', 'get-entries');

    expect(messages[1]).toEqual({ type: 'success', message: 'History cleared' });
    expect(messages[2]).toMatchObject({ type: 'entries', data: [{ id: 1, content: 'z', isCurrent: true }] });
  });

  it('wipes everything including the history file', async () => {
    const messages = await runCommands(ctx.store, 'wipe', 'get-entries');

    expect(messages.slice(1)).toEqual([
      { type: 'success', message: 'History wiped' },
      { type: 'entries', data: [] },
    ]);
    expect(ctx.wipe).toHaveBeenCalledTimes(1);
  });

  it('reports clipboard write failures as errors', async () => {
    ctx.apply.mockRejectedValueOnce(new Error('pbcopy exited with code 1'));

    const messages = await runCommands(ctx.store, 'select-entry:2');

    expect(messages.slice(1)).toEqual([{ type: 'error', message: 'pbcopy exited with code 1' }]);
  });

  it('skips blank lines and surrounding whitespace', async () => {
    const messages = await runCommands(ctx.store, '', '   ', '  clear  ');
    expect(messages.slice(1)).toEqual([{ type: 'success', message: 'History cleared' }]);
  });

  it('pushes a listing when the poller adds an entry, and stops after quit', async () => {
    const { gateway, input, messages } = createGateway(ctx.store);
    const done = gateway.run();

    await ctx.store.add({ content: 'pushed', kind: 'text' });
    await flush();
    expect(messages()[1]).toMatchObject({ type: 'entries', data: [{ id: 1, content: 'pushed', isCurrent: true }] });

    input.write('quit\n');
    await done;
    await ctx.store.add({ content: 'after quit', kind: 'text' });
    await flush();
    expect(messages()).toHaveLength(2);
  });

  it('ends when input closes without quit', async () => {
    const { gateway, input, messages } = createGateway(ctx.store);
    const done = gateway.run();
    input.end('get-entries\n');

    await done;
    await flush();
    expect(messages()).toHaveLength(2);
  });
});

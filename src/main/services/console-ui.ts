/**
 * ConsoleUI — interactive command console over a text stream.
 *
 * Commands: get, get <n>, rm <n>, clear, wipe, start, stop, help, exit.
 * The listing is re-rendered whenever the poller adds an entry.
 */

import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import { ClipringError } from '../../shared/types';
import type { ClipboardEntry, HistoryChange } from '../../shared/types';
import { CONSOLE_PREVIEW_LENGTH } from '../../shared/constants';
import type { HistoryStore } from './history-store';
import type { ClipboardPoller } from './clipboard-poller';

const HELP = [
  'Commands:',
  '  get           - Show all clipboard entries',
  '  get <n>       - Copy entry n back to the clipboard',
  '  rm <n>        - Remove entry n',
  '  clear         - Keep only the current entry',
  '  wipe          - Delete all entries and the history file',
  '  start         - Start monitoring the clipboard',
  '  stop          - Stop monitoring the clipboard',
  '  help          - Show this help',
  '  exit          - Quit',
].join('\n');

type ConsoleStore = Pick<HistoryStore, 'list' | 'selectByRank' | 'removeByRank' | 'clearHistory' | 'wipe' | 'onChange'>;
type ConsolePoller = Pick<ClipboardPoller, 'start' | 'stop' | 'running'>;

export function formatListing(mostRecentFirst: readonly ClipboardEntry[]): string {
  const lines = [`Clipboard History (${mostRecentFirst.length} entries):`];
  mostRecentFirst.forEach((entry, i) => {
    lines.push(`${i + 1}. [${entry.kind}] ${preview(entry.content)}`);
  });
  return lines.join('\n');
}

function preview(content: string): string {
  const flat = content.replace(/\s+/g, ' ');
  return flat.length > CONSOLE_PREVIEW_LENGTH ? `${flat.slice(0, CONSOLE_PREVIEW_LENGTH - 3)}...` : flat;
}

export class ConsoleUI {
  constructor(
    private readonly store: ConsoleStore,
    private readonly poller: ConsolePoller,
    private readonly input: Readable,
    private readonly output: Writable,
  ) {}

  async run(): Promise<void> {
    const unsubscribe = this.store.onChange((change) => this.onHistoryChange(change));
    const rl = readline.createInterface({ input: this.input, crlfDelay: Infinity, terminal: false });

    this.print('clipring - interactive mode');
    this.print(HELP);

    try {
      for await (const line of rl) {
        const trimmed = line.trim();
        if (trimmed.length === 0) continue;
        if (trimmed === 'exit' || trimmed === 'quit') {
          this.print('Goodbye!');
          break;
        }
        await this.execute(trimmed);
      }
    } finally {
      unsubscribe();
      rl.close();
    }
  }

  async execute(line: string): Promise<void> {
    const [command, arg] = line.split(/\s+/, 2);

    try {
      switch (command) {
        case 'get':
          if (arg === undefined) {
            await this.printEntries();
          } else {
            const entry = await this.store.selectByRank(parseRank(arg));
            this.print(`Copied [${entry.kind}] ${preview(entry.content)}`);
          }
          return;
        case 'rm':
          await this.store.removeByRank(parseRank(arg));
          await this.printEntries();
          return;
        case 'clear':
          this.print(`Removed ${await this.store.clearHistory()} entries`);
          return;
        case 'wipe':
          await this.store.wipe();
          this.print('History wiped');
          return;
        case 'start':
          this.poller.start();
          return;
        case 'stop':
          await this.poller.stop();
          return;
        case 'help':
          this.print(HELP);
          return;
        default:
          this.print('Unknown command. Type "help" for the command list.');
      }
    } catch (err) {
      this.print(`Error: ${ClipringError.from(err).message}`);
    }
  }

  private onHistoryChange(change: HistoryChange): void {
    if (change.reason !== 'add') return;
    this.print(formatListing([...change.entries].reverse()));
  }

  private async printEntries(): Promise<void> {
    this.print(formatListing(await this.store.list()));
  }

  private print(text: string): void {
    this.output.write(`${text}\n`);
  }
}

/** Non-numeric input maps to NaN, which the store rejects as an invalid index */
function parseRank(arg: string | undefined): number {
  return arg !== undefined && /^\d+$/.test(arg) ? Number.parseInt(arg, 10) : Number.NaN;
}

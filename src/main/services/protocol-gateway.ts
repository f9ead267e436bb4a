/**
 * ProtocolGateway — line-oriented command loop for external front-ends.
 *
 * Reads one command per line, writes one JSON object per line. Owns no
 * state beyond routing: every effect is a HistoryStore call, and every
 * listing is most-recent-first with rank-based ids.
 *
 * Poller-driven additions are pushed as unsolicited `entries` messages.
 *
 * @module protocol-gateway
 */

import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import { createLogger } from './logger';
import { ClipringError, ErrorCode } from '../../shared/types';
import type { ClipboardEntry, GatewayCommand, GatewayMessage, HistoryChange } from '../../shared/types';
import { Msg, encodeMessage, parseCommand, toProtocolEntries } from '../../shared/protocol';
import type { HistoryStore } from './history-store';

const log = createLogger('Gateway');

type GatewayStore = Pick<
  HistoryStore,
  'list' | 'selectByRank' | 'removeByRank' | 'clearHistory' | 'wipe' | 'onChange'
>;

export class ProtocolGateway {
  private closed = false;

  constructor(
    private readonly store: GatewayStore,
    private readonly input: Readable,
    private readonly output: Writable,
  ) {}

  /**
   * Serve commands until `quit` or end of input.
   */
  async run(): Promise<void> {
    const unsubscribe = this.store.onChange((change) => this.onHistoryChange(change));
    const rl = readline.createInterface({ input: this.input, crlfDelay: Infinity, terminal: false });

    this.send({ type: 'ready' });
    log.info('Gateway ready');

    try {
      for await (const line of rl) {
        const trimmed = line.trim();
        if (trimmed.length === 0) continue;

        const command = parseCommand(trimmed);
        if (command.kind === 'quit') break;
        await this.handle(command);
      }
    } finally {
      this.closed = true;
      unsubscribe();
      rl.close();
      log.info('Gateway closed');
    }
  }

  /**
   * Execute one parsed command and write its response(s).
   */
  async handle(command: GatewayCommand): Promise<void> {
    switch (command.kind) {
      case 'get-entries':
        await this.sendEntries();
        return;

      case 'select-entry':
        await this.respond(async () => {
          await this.store.selectByRank(command.rank);
          this.send({ type: 'select-success', index: command.rank });
          await this.sendEntries();
        });
        return;

      case 'remove-entry':
        await this.respond(async () => {
          await this.store.removeByRank(command.rank);
          this.send({ type: 'remove-success', index: command.rank });
          await this.sendEntries();
        });
        return;

      case 'clear':
        await this.respond(async () => {
          await this.store.clearHistory();
          this.send({ type: 'success', message: Msg.HISTORY_CLEARED });
        });
        return;

      case 'wipe':
        await this.respond(async () => {
          await this.store.wipe();
          this.send({ type: 'success', message: Msg.HISTORY_WIPED });
        });
        return;

      case 'quit':
        return;

      case 'invalid-index':
        this.send({ type: 'error', message: Msg.INVALID_INDEX });
        return;

      case 'unknown':
        log.debug(`Unknown command: ${command.raw}`);
        this.send({ type: 'error', message: Msg.UNKNOWN_COMMAND });
        return;
    }
  }

  // ─── Private ───

  private onHistoryChange(change: HistoryChange): void {
    // Command-driven changes answer with their own listing
    if (change.reason !== 'add' || this.closed) return;
    this.sendListing([...change.entries].reverse());
  }

  /** Run a store call; recoverable errors become an `error` message */
  private async respond(action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (err) {
      const error = ClipringError.from(err);
      if (!error.recoverable || error.code === ErrorCode.UNKNOWN_ERROR) {
        log.error('Command failed:', error);
      }
      this.send({ type: 'error', message: error.message });
    }
  }

  private async sendEntries(): Promise<void> {
    this.sendListing(await this.store.list());
  }

  private sendListing(mostRecentFirst: readonly ClipboardEntry[]): void {
    this.send({ type: 'entries', data: toProtocolEntries(mostRecentFirst) });
  }

  private send(message: GatewayMessage): void {
    this.output.write(encodeMessage(message));
  }
}

/**
 * HistoryStore — bounded, deduplicated, ordered clipboard history.
 *
 * Entries are kept oldest-first; the tail is the current clipboard. Callers
 * address entries by rank (1 = most recent), which maps to index
 * `count - rank`.
 *
 * Every public operation, reads included, runs under one AsyncLock so the
 * poller and the command loop never interleave inside a mutation.
 * Mutations emit `change` (HistoryChange); persistence and the gateway
 * subscribe to it instead of being called from here.
 *
 * @module history-store
 */

import { EventEmitter } from 'events';
import { createLogger } from './logger';
import { AsyncLock } from './async-lock';
import { ClipringError, ErrorCode } from '../../shared/types';
import type { ClipboardEntry, ClipboardPayload, HistoryChange, HistoryChangeReason } from '../../shared/types';
import type { ContentClassifier } from './content-classifier';
import type { ImageStorage } from './image-storage';
import type { BatchedSaver } from './persistence';
import { DEFAULT_IMAGE_DUPLICATE_WINDOW_SEC } from '../../shared/constants';

const log = createLogger('HistoryStore');

export interface HistoryStoreOptions {
  maxEntries: number;
  /** Image entries younger than this are checked for byte-level duplicates */
  imageDuplicateWindowSec?: number;
  /** Unix-seconds clock */
  now?: () => number;
}

export interface HistoryStoreDeps {
  classifier: Pick<ContentClassifier, 'apply'>;
  images: Pick<ImageStorage, 'compare' | 'delete' | 'isOwnedPath'>;
  /** Owns the persisted document; wipe() must not race its batched writes */
  saver: Pick<BatchedSaver, 'wipe'>;
}

/**
 * Map a 1-based rank to an index into the oldest-first array.
 * Throws INVALID_INDEX when the rank is 0, negative, fractional or past the end.
 */
export function rankToIndex(rank: number, count: number): number {
  if (!Number.isInteger(rank) || rank < 1 || rank > count) {
    throw new ClipringError(`Invalid index ${rank}: history has ${count} entries`, ErrorCode.INVALID_INDEX, {
      severity: 'warning',
      context: { rank, count },
    });
  }
  return count - rank;
}

export class HistoryStore extends EventEmitter {
  private entries: ClipboardEntry[] = [];
  private readonly lock = new AsyncLock();
  private readonly maxEntries: number;
  private readonly imageWindowSec: number;
  private readonly now: () => number;

  constructor(
    private readonly deps: HistoryStoreDeps,
    options: HistoryStoreOptions,
  ) {
    super();
    this.maxEntries = options.maxEntries;
    this.imageWindowSec = options.imageDuplicateWindowSec ?? DEFAULT_IMAGE_DUPLICATE_WINDOW_SEC;
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
  }

  /**
   * Subscribe to history changes. Returns an unsubscribe function.
   */
  onChange(listener: (change: HistoryChange) => void): () => void {
    this.on('change', listener);
    return () => {
      this.off('change', listener);
    };
  }

  // ─── Reads ───

  /** Most-recent-first copy; index 0 is rank 1 */
  list(): Promise<ClipboardEntry[]> {
    return this.lock.runExclusive(() => [...this.entries].reverse());
  }

  /** Oldest-first copy, as persisted */
  snapshot(): Promise<ClipboardEntry[]> {
    return this.lock.runExclusive(() => [...this.entries]);
  }

  count(): Promise<number> {
    return this.lock.runExclusive(() => this.entries.length);
  }

  // ─── Mutations ───

  /**
   * Replace the history with previously persisted entries (oldest-first).
   * Keeps the newest `maxEntries`; a later duplicate wins over an earlier one.
   */
  load(entries: readonly ClipboardEntry[]): Promise<void> {
    return this.lock.runExclusive(() => {
      const kept: ClipboardEntry[] = [];
      const seen = new Set<string>();
      for (let i = entries.length - 1; i >= 0 && kept.length < this.maxEntries; i--) {
        const entry = entries[i];
        const key = `${entry.kind}\u0000${entry.content}`;
        if (seen.has(key)) continue;
        seen.add(key);
        kept.push(entry);
      }
      this.entries = kept.reverse();
      log.info(`Loaded ${this.entries.length} entries`);
      this.emitChange('load');
    });
  }

  /**
   * Append a payload as the newest entry.
   * Resolves false when it duplicates an existing entry (exact match, or a
   * byte-identical image added within the duplicate window).
   */
  add(payload: ClipboardPayload): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      if (this.entries.some((e) => e.content === payload.content && e.kind === payload.kind)) {
        return false;
      }

      if (
        payload.kind === 'image' &&
        this.deps.images.isOwnedPath(payload.content) &&
        (await this.isRecentImageDuplicate(payload.content))
      ) {
        log.debug(`Discarding duplicate image ${payload.content}`);
        await this.freeScratch(payload.content);
        return false;
      }

      const entry: ClipboardEntry = { content: payload.content, createdAt: this.now(), kind: payload.kind };

      while (this.entries.length >= this.maxEntries) {
        const evicted = this.entries.shift();
        if (evicted) await this.release(evicted);
      }
      this.entries.push(entry);

      this.emitChange('add');
      return true;
    });
  }

  /**
   * Put the entry at `rank` back on the clipboard and move it to the tail.
   * If the clipboard write fails the order is left untouched.
   */
  selectByRank(rank: number): Promise<ClipboardEntry> {
    return this.lock.runExclusive(async () => {
      const index = rankToIndex(rank, this.entries.length);
      const entry = this.entries[index];

      await this.deps.classifier.apply(entry.content, entry.kind);

      this.entries.splice(index, 1);
      this.entries.push(entry);
      this.emitChange('select');
      return entry;
    });
  }

  /**
   * Delete the entry at `rank`. Rank 1 (the current clipboard) is removable
   * like any other; the live clipboard itself is not touched.
   */
  removeByRank(rank: number): Promise<ClipboardEntry> {
    return this.lock.runExclusive(async () => {
      const index = rankToIndex(rank, this.entries.length);
      const [removed] = this.entries.splice(index, 1);
      await this.release(removed);
      this.emitChange('remove');
      return removed;
    });
  }

  /**
   * Drop every entry except the current clipboard. Resolves the number removed.
   */
  clearHistory(): Promise<number> {
    return this.lock.runExclusive(async () => {
      if (this.entries.length <= 1) return 0;

      const current = this.entries[this.entries.length - 1];
      const dropped = this.entries.slice(0, -1);
      this.entries = [current];
      for (const entry of dropped) {
        await this.release(entry);
      }

      log.info(`Cleared ${dropped.length} entries`);
      this.emitChange('clear');
      return dropped.length;
    });
  }

  /**
   * Full reset: every entry, every scratch file and the persisted document.
   */
  wipe(): Promise<void> {
    return this.lock.runExclusive(async () => {
      const dropped = this.entries;
      this.entries = [];
      for (const entry of dropped) {
        await this.release(entry);
      }

      try {
        await this.deps.saver.wipe();
      } catch (err) {
        log.error('Failed to delete history file:', err);
      }

      log.info('History wiped');
      this.emitChange('wipe');
    });
  }

  // ─── Private ───

  private async isRecentImageDuplicate(candidate: string): Promise<boolean> {
    const cutoff = this.now() - this.imageWindowSec;
    for (const entry of this.entries) {
      if (entry.kind !== 'image' || entry.createdAt < cutoff) continue;
      if (!this.deps.images.isOwnedPath(entry.content)) continue;
      if (await this.deps.images.compare(entry.content, candidate)) return true;
    }
    return false;
  }

  private async release(entry: ClipboardEntry): Promise<void> {
    if (entry.kind === 'image' && this.deps.images.isOwnedPath(entry.content)) {
      await this.freeScratch(entry.content);
    }
  }

  private async freeScratch(filePath: string): Promise<void> {
    try {
      await this.deps.images.delete(filePath);
    } catch (err) {
      log.warn(`Failed to delete image file ${filePath}:`, err);
    }
  }

  private emitChange(reason: HistoryChangeReason): void {
    const change: HistoryChange = { reason, entries: [...this.entries] };
    this.emit('change', change);
  }
}

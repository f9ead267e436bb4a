/**
 * History persistence — versioned JSON document plus a batching policy.
 *
 * HistoryPersistence:
 * - Atomic write (temp file + rename); the entries array is rebuilt each save
 * - Load never throws: missing or malformed files yield an empty history
 * - Version 1 documents (no `type`) load as text
 *
 * BatchedSaver:
 * - markDirty() on every history change
 * - trySave() writes only when dirty AND the batch interval has elapsed
 * - forceSave() for shutdown
 * - wipe() deletes the document once no write is in flight
 * - One write in flight; calls arriving meanwhile run once afterwards
 *
 * @module persistence
 */

import * as fsp from 'fs/promises';
import * as path from 'path';
import { createLogger } from './logger';
import { ClipringError, ErrorCode, isEntryKind } from '../../shared/types';
import type { ClipboardEntry, EntryKind } from '../../shared/types';
import { HistoryDocumentSchema, PersistedItemSchema } from '../../shared/schemas/history-schema';
import { HISTORY_FORMAT_VERSION } from '../../shared/constants';

const log = createLogger('Persistence');

export class HistoryPersistence {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async save(entries: readonly ClipboardEntry[]): Promise<void> {
    const document = {
      version: HISTORY_FORMAT_VERSION,
      entries: entries.map((e) => ({ content: e.content, timestamp: e.createdAt, type: e.kind })),
    };

    const tmpPath = `${this.filePath}.tmp`;
    try {
      await fsp.mkdir(path.dirname(this.filePath), { recursive: true });
      await fsp.writeFile(tmpPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
      await fsp.rename(tmpPath, this.filePath);
    } catch (err) {
      throw new ClipringError(`Failed to save history to ${this.filePath}`, ErrorCode.SAVE_FAILED, {
        originalError: err instanceof Error ? err : undefined,
        context: { filePath: this.filePath },
      });
    }
  }

  /**
   * Read the persisted history, oldest-first.
   */
  async load(): Promise<ClipboardEntry[]> {
    let raw: string;
    try {
      raw = await fsp.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return [];
      log.error('Failed to read history file, starting empty:', ClipringError.from(err, ErrorCode.LOAD_FAILED));
      return [];
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      log.error('History file is not valid JSON, starting empty:', ClipringError.from(err, ErrorCode.LOAD_FAILED));
      return [];
    }

    const parsed = HistoryDocumentSchema.safeParse(json);
    if (!parsed.success) {
      log.error('History file has an unexpected shape, starting empty:', parsed.error.issues);
      return [];
    }

    const { version, entries } = parsed.data;
    const docVersion = typeof version === 'number' && Number.isInteger(version) ? version : 1;

    const loaded: ClipboardEntry[] = [];
    for (const item of entries) {
      const entry = PersistedItemSchema.safeParse(item);
      if (!entry.success) continue;
      loaded.push({
        content: entry.data.content,
        createdAt: entry.data.timestamp,
        kind: docVersion >= 2 ? toEntryKind(entry.data.type) : 'text',
      });
    }
    return loaded;
  }

  /** Delete the history file; a missing file is fine */
  async wipe(): Promise<void> {
    await fsp.rm(this.filePath, { force: true });
  }
}

export interface BatchedSaverOptions {
  /** Minimum seconds between two batched saves */
  batchSaveIntervalSec: number;
  /** Unix-seconds clock */
  now?: () => number;
}

export class BatchedSaver {
  private dirty = false;
  private lastSaveTime = 0;
  private saving: Promise<boolean> | null = null;
  private pendingSave = false;
  private readonly intervalSec: number;
  private readonly now: () => number;

  constructor(
    private readonly persistence: Pick<HistoryPersistence, 'save' | 'wipe'>,
    private readonly snapshot: () => Promise<readonly ClipboardEntry[]>,
    options: BatchedSaverOptions,
  ) {
    this.intervalSec = options.batchSaveIntervalSec;
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  markDirty(): void {
    this.dirty = true;
  }

  /**
   * Save when dirty and the batch interval has elapsed.
   * Resolves true when a write happened.
   */
  async trySave(): Promise<boolean> {
    if (!this.dirty || this.now() - this.lastSaveTime < this.intervalSec) return false;
    return this.flush();
  }

  /**
   * Save now if anything changed, regardless of the interval.
   */
  async forceSave(): Promise<boolean> {
    while (this.saving) {
      await this.saving;
    }
    if (!this.dirty) return false;
    return this.flush();
  }

  /**
   * Delete the persisted document. Waits for an in-flight write so it cannot
   * land after the delete, and drops any pending or dirty state.
   */
  async wipe(): Promise<void> {
    while (this.saving) {
      await this.saving;
    }
    this.dirty = false;
    this.pendingSave = false;
    await this.persistence.wipe();
  }

  private async flush(): Promise<boolean> {
    if (this.saving) {
      this.pendingSave = true;
      return false;
    }

    this.saving = this.write();
    try {
      return await this.saving;
    } finally {
      this.saving = null;
      if (this.pendingSave) {
        this.pendingSave = false;
        void this.trySave();
      }
    }
  }

  private async write(): Promise<boolean> {
    // Cleared before the snapshot: a change that lands mid-write marks it dirty again
    this.dirty = false;
    try {
      const entries = await this.snapshot();
      await this.persistence.save(entries);
      this.lastSaveTime = this.now();
      log.debug(`Saved ${entries.length} entries`);
      return true;
    } catch (err) {
      this.dirty = true;
      log.error('Failed to save clipboard history:', err);
      return false;
    }
  }
}

function toEntryKind(value: unknown): EntryKind {
  return isEntryKind(value) ? value : 'text';
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

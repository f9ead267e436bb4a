/**
 * ClipboardPoller — background loop feeding clipboard changes into the history.
 *
 * Two independent knobs:
 * - Failure backoff: NO_CONTENT / COMMAND_FAILED sleep
 *   min(maxPoll, minPoll + failures * 50ms)
 * - Activity cadence: minPoll while changes are recent, maxPoll once nothing
 *   was accepted for `inactiveThresholdSec`
 *
 * A payload equal to the previous poll's is not offered to the store again,
 * so removing or wiping the current entry sticks until the clipboard
 * changes. Raw images compare by fingerprint since every read lands in a
 * new scratch file.
 *
 * Sleeps are sliced (50ms) so stop() is observed quickly, and every
 * `forceSaveCycles` slices the batched saver gets a chance to flush.
 * Any other classifier error ends the loop and is emitted as `fatal`.
 *
 * @module clipboard-poller
 */

import { EventEmitter } from 'events';
import { createLogger } from './logger';
import { ClipringError, ErrorCode, TRANSIENT_CLIPBOARD_CODES } from '../../shared/types';
import type { ClipboardPayload } from '../../shared/types';
import type { ContentClassifier } from './content-classifier';
import type { HistoryStore } from './history-store';
import type { BatchedSaver } from './persistence';
import type { ImageStorage } from './image-storage';
import { FAILURE_BACKOFF_STEP_MS, POLL_SLICE_MS, POLLER_STOP_GRACE_MS } from '../../shared/constants';

const log = createLogger('Poller');

export interface PollerTiming {
  minPollIntervalMs: number;
  maxPollIntervalMs: number;
  inactiveThresholdSec: number;
  forceSaveCycles: number;
}

export interface PollerDeps {
  classifier: Pick<ContentClassifier, 'classify'>;
  store: Pick<HistoryStore, 'add'>;
  saver: Pick<BatchedSaver, 'trySave'>;
  images: Pick<ImageStorage, 'isOwnedPath' | 'fingerprint' | 'delete'>;
  /** Resolves after `ms`; injectable for tests */
  sleep?: (ms: number) => Promise<void>;
  /** Milliseconds clock */
  now?: () => number;
}

export interface PollerStatus {
  running: boolean;
  failures: number;
  lastChangeAt: number;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class ClipboardPoller extends EventEmitter {
  private loop: Promise<void> | null = null;
  private shouldRun = false;
  private failures = 0;
  private lastChangeAt = 0;
  private saveCounter = 0;
  /** Signature of the last payload offered to the store */
  private lastSeen: string | null = null;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly deps: PollerDeps,
    private readonly timing: PollerTiming,
  ) {
    super();
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  getStatus(): PollerStatus {
    return { running: this.running, failures: this.failures, lastChangeAt: this.lastChangeAt };
  }

  /**
   * Start polling in the background. No-op if already running.
   */
  start(): void {
    if (this.loop) return;

    this.shouldRun = true;
    this.failures = 0;
    this.lastChangeAt = this.now();
    this.loop = this.run()
      .catch((err: unknown) => {
        log.error('Monitoring stopped on fatal error:', err);
        this.emit('fatal', err);
      })
      .finally(() => {
        this.loop = null;
        this.shouldRun = false;
      });
    log.info('Monitoring clipboard in background');
  }

  /**
   * Signal the loop to stop and wait for it, up to `graceMs`.
   * Resolves true if the loop acknowledged in time.
   */
  async stop(graceMs = POLLER_STOP_GRACE_MS): Promise<boolean> {
    const loop = this.loop;
    if (!loop) return true;

    this.shouldRun = false;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs);
    });

    const stopped = await Promise.race([loop.then(() => true as const), timedOut]);
    clearTimeout(timer);

    if (stopped) {
      log.info('Monitoring stopped');
    } else {
      log.warn(`Poller did not stop within ${graceMs}ms`);
    }
    return stopped;
  }

  /** Delay after `failures` consecutive transient failures */
  backoffDelay(failures: number): number {
    return Math.min(this.timing.maxPollIntervalMs, this.timing.minPollIntervalMs + failures * FAILURE_BACKOFF_STEP_MS);
  }

  /** Delay between successful cycles, based on time since the last accepted change */
  cadenceDelay(): number {
    const idleSec = (this.now() - this.lastChangeAt) / 1000;
    return idleSec > this.timing.inactiveThresholdSec ? this.timing.maxPollIntervalMs : this.timing.minPollIntervalMs;
  }

  // ─── Private ───

  private async run(): Promise<void> {
    while (this.shouldRun) {
      let delay: number;
      try {
        const payload = await this.deps.classifier.classify();
        this.failures = 0;
        await this.offer(payload);
        delay = this.cadenceDelay();
      } catch (err) {
        if (!ClipringError.hasCode(err, ...TRANSIENT_CLIPBOARD_CODES)) throw err;
        // Nothing storable on the clipboard: copying the old value again is a change
        if (ClipringError.hasCode(err, ErrorCode.NO_CONTENT)) this.lastSeen = null;
        this.failures++;
        delay = this.backoffDelay(this.failures);
      }

      await this.sleepSliced(delay);
    }
  }

  private async offer(payload: ClipboardPayload): Promise<void> {
    const signature = await this.signatureOf(payload);
    if (signature === this.lastSeen) {
      await this.discardScratch(payload);
      return;
    }

    this.lastSeen = signature;
    if (await this.deps.store.add(payload)) {
      this.lastChangeAt = this.now();
    }
  }

  private async signatureOf(payload: ClipboardPayload): Promise<string> {
    if (payload.kind === 'image' && this.deps.images.isOwnedPath(payload.content)) {
      const fingerprint = await this.deps.images.fingerprint(payload.content);
      if (fingerprint !== null) return `image\u0000#${fingerprint}`;
    }
    return `${payload.kind}\u0000${payload.content}`;
  }

  /** Drop the scratch file of a repeated raw image */
  private async discardScratch(payload: ClipboardPayload): Promise<void> {
    if (payload.kind !== 'image' || !this.deps.images.isOwnedPath(payload.content)) return;
    try {
      await this.deps.images.delete(payload.content);
    } catch (err) {
      log.warn(`Failed to delete repeated image ${payload.content}:`, err);
    }
  }

  private async sleepSliced(totalMs: number): Promise<void> {
    const slices = Math.max(1, Math.floor(totalMs / POLL_SLICE_MS));
    for (let i = 0; i < slices && this.shouldRun; i++) {
      await this.sleep(POLL_SLICE_MS);
      this.saveCounter++;
      if (this.saveCounter >= this.timing.forceSaveCycles) {
        this.saveCounter = 0;
        await this.deps.saver.trySave();
      }
    }
  }
}

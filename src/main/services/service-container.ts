/**
 * ServiceContainer — wires the clipboard history services in dependency order.
 *
 * Provides typed access, centralized init, and ordered graceful shutdown.
 *
 * Usage:
 *   const container = new ServiceContainer(new ConfigService({ preset: 'low-power' }));
 *   await container.init();
 *   const store = container.get('store');
 *   ...
 *   await container.shutdown();
 */

import { createLogger } from './logger';
import type { ConfigService } from './config';
import { createClipboardBackend } from './clipboard-backends';
import type { ClipboardBackend } from '../../shared/types/clipboard-backend';
import type { ClipboardEntry } from '../../shared/types';
import { ImageStorage } from './image-storage';
import { ContentClassifier } from './content-classifier';
import { HistoryStore } from './history-store';
import { BatchedSaver, HistoryPersistence } from './persistence';
import { ClipboardPoller } from './clipboard-poller';
import { POLLER_STOP_GRACE_MS } from '../../shared/constants';

const log = createLogger('Container');

// ─── Service Map — typed registry of all services ───

export interface ServiceMap {
  config: ConfigService;
  backend: ClipboardBackend;
  images: ImageStorage;
  classifier: ContentClassifier;
  persistence: HistoryPersistence;
  store: HistoryStore;
  saver: BatchedSaver;
  poller: ClipboardPoller;
}

export type ServiceKey = keyof ServiceMap;

export interface ContainerOptions {
  /** Replaces the platform backend (tests, alternative clipboards) */
  backend?: ClipboardBackend;
  /** Start the poller as part of init() */
  autoStart?: boolean;
}

export class ServiceContainer {
  private services: ServiceMap | null = null;
  private shuttingDown: Promise<void> | null = null;

  constructor(
    private readonly config: ConfigService,
    private readonly options: ContainerOptions = {},
  ) {}

  /**
   * Get a service by key (typed). Throws before init().
   */
  get<K extends ServiceKey>(key: K): ServiceMap[K] {
    if (!this.services) {
      throw new Error(`ServiceContainer not initialized — call init() first`);
    }
    return this.services[key];
  }

  /**
   * Build and start every service.
   */
  async init(): Promise<void> {
    if (this.services) {
      throw new Error('ServiceContainer already initialized');
    }

    log.info('Initializing services...');
    const t0 = Date.now();
    const cfg = this.config.getAll();

    // ── Phase 1: Platform access (fatal if unsupported) ──
    const backend =
      this.options.backend ??
      createClipboardBackend({ maxFetchBytes: cfg.maxFetchBytes, maxImageBytes: cfg.maxImageBytes });

    // ── Phase 2: Leaf services ──
    const images = new ImageStorage(backend, { imageDir: cfg.imageDir, compareBytes: cfg.imageCompareBytes });
    const classifier = new ContentClassifier(backend, images, { maxContentBytes: cfg.maxContentBytes });
    const persistence = new HistoryPersistence(cfg.historyFile);

    // ── Phase 3: History + persistence wiring ──
    // Saves write the entries of the latest change event; reading the store
    // from a save would queue behind a wipe that is waiting for that save.
    let latest: readonly ClipboardEntry[] = [];
    const saver = new BatchedSaver(persistence, async () => latest, {
      batchSaveIntervalSec: cfg.batchSaveIntervalSec,
    });
    const store = new HistoryStore(
      { classifier, images, saver },
      { maxEntries: cfg.maxEntries, imageDuplicateWindowSec: cfg.imageDuplicateWindowSec },
    );

    await store.load(await persistence.load());
    latest = await store.snapshot();
    await images.purgeOrphans(latest.map((e) => e.content));

    store.onChange((change) => {
      latest = change.entries;
      // A wipe already removed the document; saving now would recreate it
      if (change.reason === 'load' || change.reason === 'wipe') return;
      saver.markDirty();
      void saver.trySave();
    });

    // ── Phase 4: Background monitoring ──
    const poller = new ClipboardPoller({ classifier, store, saver, images }, cfg);

    this.services = { config: this.config, backend, images, classifier, persistence, store, saver, poller };

    if (this.options.autoStart ?? true) {
      poller.start();
    }

    log.info(`All services initialized in ${Date.now() - t0}ms (history: ${cfg.historyFile})`);
  }

  /**
   * Stop monitoring, then force-flush persistence. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    if (!this.services) return Promise.resolve();
    this.shuttingDown ??= this.runShutdown();
    return this.shuttingDown;
  }

  private async runShutdown(): Promise<void> {
    log.info('Graceful shutdown started');
    const t0 = Date.now();

    // ── Phase 1: Stop background work ──
    await this.get('poller').stop(POLLER_STOP_GRACE_MS);

    // ── Phase 2: Flush history ──
    await this.get('saver').forceSave();

    log.info(`Graceful shutdown completed in ${Date.now() - t0}ms`);
  }
}

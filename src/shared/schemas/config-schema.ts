/**
 * Zod schema for clipring configuration.
 *
 * Single source of truth for config shape, presets, and validation.
 * The ClipringConfig type is derived from this schema via z.infer<>.
 *
 * @module shared/schemas/config-schema
 */

import { z } from 'zod';
import {
  DEFAULT_IMAGE_COMPARE_BYTES,
  DEFAULT_IMAGE_DUPLICATE_WINDOW_SEC,
  DEFAULT_MAX_IMAGE_BYTES,
} from '../constants';

const positiveInt = z.number().int().positive();

// ─── Tuning values (what a preset fixes) ───

const TuningShape = {
  /** Polling interval while the user is active (ms) */
  minPollIntervalMs: positiveInt,
  /** Polling interval once inactive, and the backoff ceiling (ms) */
  maxPollIntervalMs: positiveInt,
  /** Seconds without a change before polling slows down */
  inactiveThresholdSec: positiveInt,
  /** Minimum seconds between two batched saves */
  batchSaveIntervalSec: z.number().int().nonnegative(),
  /** Sleep slices between two periodic save checks */
  forceSaveCycles: positiveInt,
  /** Largest text entry accepted (bytes) */
  maxContentBytes: positiveInt,
  /** Largest output read from a single clipboard query (bytes) */
  maxFetchBytes: positiveInt,
  /** History capacity */
  maxEntries: positiveInt,
};

export const TuningSchema = z.object(TuningShape);
export type Tuning = z.infer<typeof TuningSchema>;

// ─── Main config schema ───

export const ClipringConfigSchema = z
  .object({
    ...TuningShape,
    imageDuplicateWindowSec: z.number().int().nonnegative().default(DEFAULT_IMAGE_DUPLICATE_WINDOW_SEC),
    imageCompareBytes: positiveInt.default(DEFAULT_IMAGE_COMPARE_BYTES),
    maxImageBytes: positiveInt.default(DEFAULT_MAX_IMAGE_BYTES),
    /** Absolute path of the persisted history document */
    historyFile: z.string().min(1),
    /** Directory that owns scratch image files */
    imageDir: z.string().min(1),
  })
  .refine((cfg) => cfg.minPollIntervalMs <= cfg.maxPollIntervalMs, {
    message: 'minPollIntervalMs must not exceed maxPollIntervalMs',
    path: ['minPollIntervalMs'],
  });

export type ClipringConfig = z.infer<typeof ClipringConfigSchema>;
export type ClipringConfigInput = z.input<typeof ClipringConfigSchema>;

// ─── Presets ───

export const PRESET_NAMES = ['balanced', 'low-power', 'ultra-low-power', 'responsive'] as const;
export type PresetName = (typeof PRESET_NAMES)[number];

const CONTENT_LIMITS = {
  maxContentBytes: 100 * 1024,
  maxFetchBytes: 512 * 1024,
};

export const PRESETS: Record<PresetName, Tuning> = {
  balanced: {
    minPollIntervalMs: 100,
    maxPollIntervalMs: 250,
    inactiveThresholdSec: 300,
    batchSaveIntervalSec: 5,
    forceSaveCycles: 200,
    ...CONTENT_LIMITS,
    maxEntries: 10,
  },
  'low-power': {
    minPollIntervalMs: 250,
    maxPollIntervalMs: 1000,
    inactiveThresholdSec: 180,
    batchSaveIntervalSec: 30,
    forceSaveCycles: 100,
    ...CONTENT_LIMITS,
    maxEntries: 10,
  },
  'ultra-low-power': {
    minPollIntervalMs: 500,
    maxPollIntervalMs: 2000,
    inactiveThresholdSec: 120,
    batchSaveIntervalSec: 60,
    forceSaveCycles: 50,
    ...CONTENT_LIMITS,
    maxEntries: 5,
  },
  responsive: {
    minPollIntervalMs: 50,
    maxPollIntervalMs: 150,
    inactiveThresholdSec: 600,
    batchSaveIntervalSec: 2,
    forceSaveCycles: 300,
    ...CONTENT_LIMITS,
    maxEntries: 10,
  },
};

// ─── Environment overrides ───

export const EnvOverridesSchema = z.object({
  CLIPRING_MAX_ENTRIES: z.coerce.number().int().positive().optional(),
  CLIPRING_HISTORY_FILE: z.string().min(1).optional(),
  CLIPRING_IMAGE_DIR: z.string().min(1).optional(),
  CLIPRING_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export type EnvOverrides = z.infer<typeof EnvOverridesSchema>;

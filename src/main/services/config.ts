/**
 * ConfigService — typed, validated, immutable configuration.
 *
 * Features:
 * - Named performance presets (balanced, low-power, ultra-low-power, responsive)
 * - Environment overrides for capacity, file locations and log level
 * - Zod validation on load (invalid input → CONFIG_VALIDATION_ERROR at startup)
 * - Frozen after construction; typed get<K>() accessor
 *
 * @module main/services/config
 */

import * as os from 'os';
import * as path from 'path';
import { createLogger } from './logger';
import type { LogLevel } from './logger';
import { ClipringError, ErrorCode } from '../../shared/types';
import {
  ClipringConfigSchema,
  EnvOverridesSchema,
  PRESETS,
  PRESET_NAMES,
} from '../../shared/schemas/config-schema';
import type { ClipringConfig, PresetName } from '../../shared/schemas/config-schema';
import { HISTORY_FILE_NAME, IMAGE_DIR_NAME } from '../../shared/constants';

export type { ClipringConfig, PresetName } from '../../shared/schemas/config-schema';

const log = createLogger('Config');

export interface ConfigSources {
  preset?: PresetName;
  env?: NodeJS.ProcessEnv;
  /** Defaults to os.homedir() */
  homeDir?: string;
  /** Defaults to os.tmpdir() */
  tmpDir?: string;
}

export function isPresetName(value: string): value is PresetName {
  return PRESET_NAMES.some((name) => name === value);
}

export class ConfigService {
  readonly preset: PresetName;
  /** Log level requested through the environment, if any */
  readonly logLevel?: LogLevel;
  private readonly config: Readonly<ClipringConfig>;

  constructor(sources: ConfigSources = {}) {
    this.preset = sources.preset ?? 'balanced';

    const env = EnvOverridesSchema.safeParse(sources.env ?? process.env);
    if (!env.success) {
      throw new ClipringError(`Invalid environment: ${formatIssues(env.error.issues)}`, ErrorCode.CONFIG_VALIDATION_ERROR, {
        severity: 'fatal',
        recoverable: false,
      });
    }
    const overrides = env.data;
    this.logLevel = overrides.CLIPRING_LOG_LEVEL;

    const homeDir = sources.homeDir ?? os.homedir();
    const tmpDir = sources.tmpDir ?? os.tmpdir();

    const result = ClipringConfigSchema.safeParse({
      ...PRESETS[this.preset],
      ...(overrides.CLIPRING_MAX_ENTRIES !== undefined && { maxEntries: overrides.CLIPRING_MAX_ENTRIES }),
      historyFile: path.resolve(overrides.CLIPRING_HISTORY_FILE ?? path.join(homeDir, HISTORY_FILE_NAME)),
      imageDir: path.resolve(overrides.CLIPRING_IMAGE_DIR ?? path.join(tmpDir, IMAGE_DIR_NAME)),
    });

    if (!result.success) {
      throw new ClipringError(`Invalid configuration: ${formatIssues(result.error.issues)}`, ErrorCode.CONFIG_VALIDATION_ERROR, {
        severity: 'fatal',
        recoverable: false,
        context: { preset: this.preset },
      });
    }

    this.config = Object.freeze(result.data);
    log.debug(`Loaded preset "${this.preset}"`, this.config);
  }

  get<K extends keyof ClipringConfig>(key: K): ClipringConfig[K] {
    return this.config[key];
  }

  getAll(): Readonly<ClipringConfig> {
    return this.config;
  }
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

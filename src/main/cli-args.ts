/**
 * Command-line parsing for the clipring entry point.
 */

import { parseArgs } from 'util';
import { ClipringError, ErrorCode } from '../shared/types';
import { PRESET_NAMES } from '../shared/schemas/config-schema';
import type { PresetName } from '../shared/schemas/config-schema';
import { isPresetName } from './services/config';

export type RunMode = 'console' | 'gateway';

export interface CliOptions {
  mode: RunMode;
  preset: PresetName;
  help: boolean;
  /** Poll from startup; the console waits for `start` */
  autoStart: boolean;
}

export const USAGE = [
  'Usage: clipring [options]',
  '',
  'Options:',
  '  -c, --cli               Interactive console (default; type start to monitor)',
  '  -j, --json-api          Line-delimited JSON protocol on stdin/stdout',
  `      --preset <name>     Performance preset: ${PRESET_NAMES.join(', ')}`,
  '      --low-power         Same as --preset low-power',
  '      --ultra-low-power   Same as --preset ultra-low-power',
  '      --responsive        Same as --preset responsive',
  '  -h, --help              Show this help',
  '',
  'Environment:',
  '  CLIPRING_MAX_ENTRIES    History capacity',
  '  CLIPRING_HISTORY_FILE   History file (default ~/.clipring_history.json)',
  '  CLIPRING_IMAGE_DIR      Scratch directory for clipboard images',
  '  CLIPRING_LOG_LEVEL      debug | info | warn | error',
].join('\n');

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        cli: { type: 'boolean', short: 'c' },
        'json-api': { type: 'boolean', short: 'j' },
        preset: { type: 'string' },
        'low-power': { type: 'boolean' },
        'ultra-low-power': { type: 'boolean' },
        responsive: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    }).values;
  } catch (err) {
    throw ClipringError.from(err, ErrorCode.CONFIG_VALIDATION_ERROR);
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const values = readFlags(argv);

  const presets: PresetName[] = [];
  if (values.preset !== undefined) {
    if (!isPresetName(values.preset)) {
      throw new ClipringError(
        `Unknown preset '${values.preset}' (expected one of: ${PRESET_NAMES.join(', ')})`,
        ErrorCode.CONFIG_VALIDATION_ERROR,
      );
    }
    presets.push(values.preset);
  }
  if (values['low-power']) presets.push('low-power');
  if (values['ultra-low-power']) presets.push('ultra-low-power');
  if (values.responsive) presets.push('responsive');

  // --preset beats the shortcut flags
  const preset = presets[0] ?? 'balanced';

  const mode: RunMode = values['json-api'] ? 'gateway' : 'console';
  return {
    mode,
    preset,
    help: values.help ?? false,
    autoStart: mode === 'gateway',
  };
}

/**
 * Gateway protocol vocabulary — single source of truth.
 *
 * Front-ends write one command per line and read one JSON object per line.
 * Parameterized commands use `name:<argument>` format.
 */

import { z } from 'zod';
import type { ClipboardEntry, GatewayCommand, GatewayMessage, ProtocolEntry } from './types';

// ─── Commands (front-end → gateway) ───

export const Cmd = {
  GET_ENTRIES: 'get-entries',
  SELECT_ENTRY: 'select-entry:',
  REMOVE_ENTRY: 'remove-entry:',
  CLEAR: 'clear',
  WIPE: 'wipe',
  QUIT: 'quit',
} as const;

// ─── Fixed messages (gateway → front-end) ───

export const Msg = {
  UNKNOWN_COMMAND: 'Unknown command',
  INVALID_INDEX: 'Invalid index',
  HISTORY_CLEARED: 'History cleared',
  HISTORY_WIPED: 'History wiped',
} as const;

const RankArgSchema = z
  .string()
  .regex(/^\d+$/)
  .transform((raw) => Number.parseInt(raw, 10))
  .pipe(z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER));

/**
 * Parse one trimmed input line. Never throws — malformed input maps to
 * `unknown` or `invalid-index` so the gateway can answer with an error.
 */
export function parseCommand(line: string): GatewayCommand {
  switch (line) {
    case Cmd.GET_ENTRIES:
      return { kind: 'get-entries' };
    case Cmd.CLEAR:
      return { kind: 'clear' };
    case Cmd.WIPE:
      return { kind: 'wipe' };
    case Cmd.QUIT:
      return { kind: 'quit' };
  }

  for (const [prefix, kind] of [
    [Cmd.SELECT_ENTRY, 'select-entry'],
    [Cmd.REMOVE_ENTRY, 'remove-entry'],
  ] as const) {
    if (line.startsWith(prefix)) {
      const raw = line.slice(prefix.length).trim();
      const parsed = RankArgSchema.safeParse(raw);
      return parsed.success ? { kind, rank: parsed.data } : { kind: 'invalid-index', raw };
    }
  }

  return { kind: 'unknown', raw: line };
}

/**
 * Render a most-recent-first listing. Rank 1 is the current clipboard.
 */
export function toProtocolEntries(mostRecentFirst: readonly ClipboardEntry[]): ProtocolEntry[] {
  return mostRecentFirst.map((entry, i) => ({
    id: i + 1,
    content: entry.content,
    timestamp: entry.createdAt * 1000,
    type: entry.kind,
    isCurrent: i === 0,
  }));
}

export function encodeMessage(message: GatewayMessage): string {
  return `${JSON.stringify(message)}\n`;
}

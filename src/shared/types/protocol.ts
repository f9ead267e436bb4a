/**
 * Wire types for the line-oriented gateway protocol.
 * One command per line in, one JSON object per line out.
 */

import type { EntryKind } from './clipboard';

/** Entry as rendered to front-ends — `id` is the 1-based rank */
export interface ProtocolEntry {
  id: number;
  content: string;
  /** Milliseconds since epoch */
  timestamp: number;
  type: EntryKind;
  isCurrent: boolean;
}

export type GatewayMessage =
  | { type: 'ready' }
  | { type: 'entries'; data: ProtocolEntry[] }
  | { type: 'select-success'; index: number }
  | { type: 'remove-success'; index: number }
  | { type: 'success'; message: string }
  | { type: 'error'; message: string };

export type GatewayCommand =
  | { kind: 'get-entries' }
  | { kind: 'select-entry'; rank: number }
  | { kind: 'remove-entry'; rank: number }
  | { kind: 'clear' }
  | { kind: 'wipe' }
  | { kind: 'quit' }
  | { kind: 'invalid-index'; raw: string }
  | { kind: 'unknown'; raw: string };

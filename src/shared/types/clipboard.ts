/**
 * Clipboard history types — shared by every service and the protocol layer.
 *
 * @module clipboard
 */

/** Kind of content an entry holds. Persisted and sent over the wire as-is. */
export type EntryKind = 'text' | 'image' | 'file' | 'url' | 'color';

export const ENTRY_KINDS: readonly EntryKind[] = ['text', 'image', 'file', 'url', 'color'];

/** Raw image formats the backends can detect */
export type ImageFormat = 'PNG' | 'JPEG' | 'TIFF';

/** Result of classifying the live clipboard */
export interface ClipboardPayload {
  /** Text, or a filesystem path for file/image kinds */
  content: string;
  kind: EntryKind;
}

/** Single retained history entry */
export interface ClipboardEntry {
  readonly content: string;
  /** Unix seconds */
  readonly createdAt: number;
  readonly kind: EntryKind;
}

/** Why the history changed */
export type HistoryChangeReason = 'load' | 'add' | 'select' | 'remove' | 'clear' | 'wipe';

/** Payload of the store's `change` event */
export interface HistoryChange {
  reason: HistoryChangeReason;
  /** Oldest-first snapshot taken right after the mutation */
  entries: readonly ClipboardEntry[];
}

export function isEntryKind(value: unknown): value is EntryKind {
  return typeof value === 'string' && ENTRY_KINDS.some((kind) => kind === value);
}
